import { appendFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

export type LogLevel = 'INFO' | 'WARNING' | 'ERROR' | 'PROMPT';

export interface LogRecord {
  level: LogLevel;
  message: string;
  timestamp: Date;
}

export type DisplaySink = (record: LogRecord) => void;

export interface LogOptions {
  /** Write to the log file only. */
  quiet?: boolean;
}

const COLORS: Record<LogLevel, string> = {
  INFO: '',
  WARNING: '\x1b[33m',
  ERROR: '\x1b[31m',
  PROMPT: '\x1b[36m',
};
const RESET = '\x1b[0m';

export function consoleDisplay(record: LogRecord): void {
  const color = COLORS[record.level];
  const line = color ? `${color}${record.message}${RESET}` : record.message;
  if (record.level === 'ERROR') {
    process.stderr.write(line + '\n');
  } else {
    process.stdout.write(line + '\n');
  }
}

export function sessionLogPath(sessionId: string, dir: string = tmpdir()): string {
  return join(dir, `devsetup_${sessionId}.log`);
}

/**
 * Run-scoped log sink. The file is created by the first append and only
 * ever appended to, one `LEVEL: message` line per message line.
 */
export class Logger {
  readonly filePath: string;
  private readonly display: DisplaySink;

  constructor(filePath: string, display: DisplaySink = consoleDisplay) {
    this.filePath = filePath;
    this.display = display;
  }

  log(message: string, level: LogLevel = 'INFO', options: LogOptions = {}): void {
    const record: LogRecord = { level, message, timestamp: new Date() };
    const lines = message.split(/\r?\n/).map((line) => `${level}: ${line}\n`);
    appendFileSync(this.filePath, lines.join(''), 'utf8');
    if (!options.quiet) this.display(record);
  }

  info(message: string, options?: LogOptions): void {
    this.log(message, 'INFO', options);
  }

  warn(message: string, options?: LogOptions): void {
    this.log(message, 'WARNING', options);
  }

  error(message: string, options?: LogOptions): void {
    this.log(message, 'ERROR', options);
  }

  prompt(message: string): void {
    this.log(message, 'PROMPT');
  }
}
