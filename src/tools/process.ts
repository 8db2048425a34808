import { execa } from 'execa';

export interface ExecResult {
  ok: boolean;
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  cwd?: string;
}

/** Every external tool (interpreter, venv, pip, git, viewer) is reached through this port. */
export type CommandRunner = (file: string, args: string[], options?: RunOptions) => Promise<ExecResult>;

function normalizeText(value: unknown): string {
  if (value === undefined || value === null) return '';
  return String(value).trim();
}

export const execCmd: CommandRunner = async (file, args, options = {}) => {
  const res = await execa(file, args, {
    cwd: options.cwd,
    encoding: 'utf8',
    reject: false,
    stdin: 'ignore',
  });

  return {
    ok: !res.failed && (res.exitCode ?? 1) === 0,
    exitCode: res.exitCode ?? 1,
    stdout: normalizeText(res.stdout),
    stderr: normalizeText(res.stderr),
  };
};

export function formatCommand(file: string, args: string[]): string {
  return [file, ...args].map((part) => (/\s/.test(part) ? `"${part}"` : part)).join(' ');
}
