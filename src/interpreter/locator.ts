import { existsSync } from 'node:fs';
import path from 'node:path';
import type { Logger } from '../logging/logger.js';
import type { CommandRunner } from '../tools/process.js';

const VERSION_TOKEN = /(\d+\.\d+\.\d+)/;

export interface LocatedInterpreter {
  path: string;
  version: string;
}

export function parseVersion(output: string): string | undefined {
  return VERSION_TOKEN.exec(output)?.[1];
}

function isPathLike(candidate: string): boolean {
  return path.isAbsolute(candidate) || path.win32.isAbsolute(candidate);
}

/**
 * Returns the first candidate that runs `--version` successfully and reports a
 * parseable version. Bare names are resolved by the OS search path on spawn;
 * absolute paths must exist first. Discovery only, nothing is installed.
 */
export async function locateInterpreter(
  candidates: readonly string[],
  runner: CommandRunner,
  logger: Logger
): Promise<LocatedInterpreter | undefined> {
  for (const candidate of candidates) {
    if (isPathLike(candidate) && !existsSync(candidate)) continue;

    const result = await runner(candidate, ['--version']);
    if (!result.ok) {
      logger.info(`Interpreter candidate ${candidate} unavailable (exit ${result.exitCode})`, { quiet: true });
      continue;
    }

    // Python 2 printed its version to stderr.
    const version = parseVersion(`${result.stdout}\n${result.stderr}`);
    if (!version) {
      logger.info(`Interpreter candidate ${candidate} reported no version`, { quiet: true });
      continue;
    }

    return { path: candidate, version };
  }
  return undefined;
}
