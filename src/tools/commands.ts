import path from 'node:path';
import type { HostPlatform, SetupSettings } from '../config/settings.js';
import type { Logger } from '../logging/logger.js';
import { formatCommand, type CommandRunner, type ExecResult } from './process.js';

export type WorkingTreeState = 'clean' | 'dirty' | 'unknown';

/**
 * Argv for each external collaborator. Output is captured into the session
 * log so a failed install can be diagnosed after the fact.
 */
export class ExternalTools {
  constructor(
    private readonly runner: CommandRunner,
    private readonly logger: Logger,
    private readonly settings: SetupSettings
  ) {}

  private async run(file: string, args: string[]): Promise<ExecResult> {
    this.logger.info(`> ${formatCommand(file, args)}`);
    const result = await this.runner(file, args, { cwd: this.settings.cwd });
    if (result.stdout) this.logger.info(result.stdout, { quiet: true });
    if (result.stderr) this.logger.warn(result.stderr, { quiet: true });
    if (!result.ok) {
      this.logger.warn(`${path.basename(file)} exited with status ${result.exitCode}`, { quiet: true });
    }
    return result;
  }

  createEnvironment(interpreter: string): Promise<ExecResult> {
    return this.run(interpreter, ['-m', 'venv', this.settings.envDir]);
  }

  async workingTreeState(): Promise<WorkingTreeState> {
    const status = await this.run('git', ['status', '--porcelain']);
    if (!status.ok) return 'unknown';
    return status.stdout === '' ? 'clean' : 'dirty';
  }

  pullSource(): Promise<ExecResult> {
    return this.run('git', ['pull']);
  }

  installNativeLibrary(): Promise<ExecResult> {
    const { cacheDir, packageName } = this.settings.nativeLibrary;
    return this.pip(['install', `--find-links=${cacheDir}`, '--prefer-binary', packageName]);
  }

  installManifests(files: string[]): Promise<ExecResult> {
    return this.pip(['install', ...files.flatMap((file) => ['-r', file])]);
  }

  installApplication(): Promise<ExecResult> {
    return this.pip(['install', '-e', '.']);
  }

  installUi(): Promise<ExecResult> {
    const { envBinDir, appCommand, uiInstallArgs, platform } = this.settings;
    const executable = path.join(envBinDir, platform === 'win32' ? `${appCommand}.exe` : appCommand);
    return this.run(executable, [...uiInstallArgs]);
  }

  openInViewer(file: string): Promise<ExecResult> {
    return this.run(viewerCommand(this.settings.platform), [file]);
  }

  private pip(args: string[]): Promise<ExecResult> {
    return this.run(this.settings.envPython, ['-m', 'pip', ...args]);
  }
}

export function viewerCommand(platform: HostPlatform): string {
  if (platform === 'win32') return 'notepad.exe';
  if (platform === 'darwin') return 'open';
  return 'xdg-open';
}
