import type { Logger } from '../logging/logger.js';
import type { InputPort } from '../prompt/input.js';
import type { ExternalTools } from '../tools/commands.js';
import type { ExecutionContext } from './types.js';

export interface ExitDeps {
  logger: Logger;
  input: InputPort;
  tools: Pick<ExternalTools, 'openInViewer'>;
}

function releaseEnvironment(ctx: ExecutionContext, logger: Logger): void {
  if (!ctx.environmentActive) return;
  ctx.environmentActive = false;
  logger.info(`Released virtual environment ${ctx.envDir}`, { quiet: true });
}

/**
 * The single exit path of a run. Always returns `exitCode` unchanged; the
 * caller hands it to the process.
 */
export async function finish(
  ctx: ExecutionContext,
  exitCode: number,
  waitForKeypress: boolean,
  deps: ExitDeps
): Promise<number> {
  const { logger, input, tools } = deps;
  releaseEnvironment(ctx, logger);

  try {
    if (exitCode !== 0) {
      logger.prompt('Do you want to open the log file? (Y/N)');
      const answer = await input.ask('> ');
      if (answer === 'y' || answer === 'Y') {
        const opened = await tools.openInViewer(ctx.logFile);
        if (!opened.ok) {
          logger.warn(`Could not open a viewer; the log is at ${ctx.logFile}`);
        }
      } else {
        logger.info(`Log file: ${ctx.logFile}`);
      }
    } else if (waitForKeypress) {
      await input.ask('Press Enter to exit...');
    }
  } finally {
    input.close();
  }

  return exitCode;
}
