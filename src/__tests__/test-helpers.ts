import { mkdirSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import type { LogRecord } from '../logging/logger.js';
import type { InputPort } from '../prompt/input.js';
import type { CommandRunner, ExecResult } from '../tools/process.js';

export interface RecordedCall {
  file: string;
  args: string[];
  cwd?: string;
}

export type Responder = (file: string, args: string[]) => Partial<ExecResult> | undefined;

export interface FakeRunner {
  runner: CommandRunner;
  calls: RecordedCall[];
  /** Calls rendered as `file arg1 arg2` for compact assertions. */
  lines: () => string[];
}

export function createFakeRunner(responder: Responder = () => undefined): FakeRunner {
  const calls: RecordedCall[] = [];
  const runner: CommandRunner = async (file, args, options = {}) => {
    calls.push({ file, args, cwd: options.cwd });
    const partial = responder(file, args) ?? {};
    const exitCode = partial.exitCode ?? (partial.ok === false ? 1 : 0);
    return {
      ok: partial.ok ?? exitCode === 0,
      exitCode,
      stdout: partial.stdout ?? '',
      stderr: partial.stderr ?? '',
    };
  };
  return { runner, calls, lines: () => calls.map((c) => [c.file, ...c.args].join(' ')) };
}

export interface ScriptedInput extends InputPort {
  questions: string[];
  closed: boolean;
}

/** Answers in order; once exhausted every question reads as an empty line. */
export function createScriptedInput(answers: string[]): ScriptedInput {
  const queue = [...answers];
  const port: ScriptedInput = {
    questions: [],
    closed: false,
    async ask(question: string): Promise<string> {
      port.questions.push(question);
      return queue.shift() ?? '';
    },
    close(): void {
      port.closed = true;
    },
  };
  return port;
}

export function captureDisplay(): { records: LogRecord[]; sink: (record: LogRecord) => void } {
  const records: LogRecord[] = [];
  return { records, sink: (record) => records.push(record) };
}

export interface TempProject {
  root: string;
  write: (relativePath: string, content?: string) => string;
  logLines: () => string[];
  cleanup: () => void;
}

export function createTempProject(files: string[] = ['requirements.txt']): TempProject {
  const root = mkdtempSync(join(tmpdir(), 'devsetup-project-'));
  const write = (relativePath: string, content = ''): string => {
    const full = join(root, relativePath);
    mkdirSync(dirname(full), { recursive: true });
    writeFileSync(full, content, 'utf8');
    return full;
  };
  for (const file of files) write(file, 'requests\n');

  return {
    root,
    write,
    logLines: () => {
      const logs = readdirSync(root).filter((name) => name.startsWith('devsetup_') && name.endsWith('.log'));
      if (logs.length !== 1) throw new Error(`expected one session log, found ${logs.length}`);
      return readFileSync(join(root, logs[0]), 'utf8').split('\n').filter((line) => line.length > 0);
    },
    cleanup: () => rmSync(root, { recursive: true, force: true }),
  };
}

export interface MachineOptions {
  dirtyTree?: boolean;
  failPull?: boolean;
  createsEnv?: boolean;
  failNativeLib?: boolean;
  failDeps?: boolean;
  failApp?: boolean;
  failUi?: boolean;
}

/**
 * A POSIX machine with `python3` 3.11.4 on PATH. Creating the venv writes its
 * activation script so the post-creation check passes.
 */
export function posixMachine(project: TempProject, opts: MachineOptions = {}): Responder {
  return (file, args) => {
    if (args[0] === '--version') {
      return file === 'python3' ? { stdout: 'Python 3.11.4' } : { exitCode: 127 };
    }
    if (args[0] === '-m' && args[1] === 'venv') {
      if (opts.createsEnv !== false) project.write('.venv/bin/activate', '# activate\n');
      return {};
    }
    if (file === 'git' && args[0] === 'status') {
      return { stdout: opts.dirtyTree ? 'M README.md' : '' };
    }
    if (file === 'git' && args[0] === 'pull') {
      return opts.failPull ? { exitCode: 1, stderr: 'fatal: unable to access remote' } : { stdout: 'Already up to date.' };
    }
    if (args[1] === 'pip' && args.includes('ta-lib')) {
      return opts.failNativeLib ? { exitCode: 1, stderr: 'ERROR: no matching distribution' } : {};
    }
    if (args[1] === 'pip' && args.includes('-r')) {
      return opts.failDeps ? { exitCode: 1, stderr: 'ERROR: resolution failed' } : {};
    }
    if (args[1] === 'pip' && args.includes('-e')) {
      return opts.failApp ? { exitCode: 1 } : {};
    }
    if (args[0] === 'install-ui') {
      return opts.failUi ? { exitCode: 2 } : {};
    }
    return undefined;
  };
}
