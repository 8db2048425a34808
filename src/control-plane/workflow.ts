import { existsSync } from 'node:fs';
import path from 'node:path';
import type { SetupSettings } from '../config/settings.js';
import { environmentExists, hasInstalledModule } from '../environment/venv.js';
import { locateInterpreter } from '../interpreter/locator.js';
import type { Logger } from '../logging/logger.js';
import type { InputPort } from '../prompt/input.js';
import { createOptionList, select } from '../prompt/selection.js';
import type { ExternalTools } from '../tools/commands.js';
import type { CommandRunner } from '../tools/process.js';
import { SetupError } from './errors.js';
import type { ExecutionContext, PipelineStep } from './types.js';

export interface PipelineDeps {
  settings: SetupSettings;
  tools: ExternalTools;
  runner: CommandRunner;
  logger: Logger;
  input: InputPort;
}

const UI_OPTIONS = ['Yes', 'No'];

export function buildPipeline(deps: PipelineDeps): PipelineStep[] {
  const { settings, tools, runner, logger, input } = deps;

  return [
    {
      name: 'check_interpreter',
      title: 'Locate a Python interpreter',
      reaches: 'INTERPRETER_CHECKED',
      policy: 'fatal',
      execute: async (ctx) => {
        const found = await locateInterpreter(settings.interpreterCandidates, runner, logger);
        if (!found) {
          throw new SetupError(
            'InterpreterNotFound',
            'No usable Python interpreter found. Install Python 3 and make sure it is on PATH.'
          );
        }
        ctx.interpreterPath = found.path;
        ctx.interpreterVersion = found.version;
        logger.info(`Using Python ${found.version} at ${found.path}`);
      },
    },
    {
      name: 'create_environment',
      title: 'Create the virtual environment',
      reaches: 'ENV_READY',
      policy: 'fatal',
      skipWhen: async (ctx) => {
        if (!environmentExists(settings)) return undefined;
        ctx.environmentActive = true;
        return `virtual environment already present at ${settings.envDir}`;
      },
      execute: async (ctx) => {
        if (!ctx.interpreterPath) {
          throw new SetupError('EnvironmentCreationFailed', 'No interpreter resolved before environment creation');
        }
        await tools.createEnvironment(ctx.interpreterPath);
        if (!environmentExists(settings)) {
          throw new SetupError(
            'EnvironmentCreationFailed',
            `Virtual environment not found at ${settings.envDir} after creation`
          );
        }
        ctx.environmentActive = true;
      },
    },
    {
      name: 'sync_source',
      title: 'Update the source from the remote',
      reaches: 'SOURCE_SYNCED',
      policy: 'fatal',
      skipWhen: async () => {
        const tree = await tools.workingTreeState();
        if (tree === 'dirty') return 'working tree has local changes';
        if (tree === 'unknown') return 'working tree status unavailable';
        return undefined;
      },
      execute: async () => {
        const pulled = await tools.pullSource();
        if (!pulled.ok) {
          throw new SetupError('SyncFailed', `git pull failed with exit code ${pulled.exitCode}`);
        }
      },
    },
    {
      name: 'install_native_library',
      title: 'Install the native technical-analysis library',
      reaches: 'NATIVE_LIB_READY',
      policy: 'best-effort',
      skipWhen: async () =>
        hasInstalledModule(settings, settings.nativeLibrary.moduleDir)
          ? `${settings.nativeLibrary.packageName} already installed`
          : undefined,
      execute: async () => {
        const installed = await tools.installNativeLibrary();
        if (!installed.ok) {
          throw new SetupError(
            'NativeLibraryInstallFailed',
            `${settings.nativeLibrary.packageName} install from ${settings.nativeLibrary.cacheDir} failed ` +
            `with exit code ${installed.exitCode}`
          );
        }
      },
    },
    {
      name: 'select_dependencies',
      title: 'Choose dependency manifests',
      reaches: 'DEPS_SELECTED',
      policy: 'fatal',
      execute: async (ctx) => {
        const options = createOptionList(settings.manifests.map((m) => m.label));
        const choice = await select(
          { input, logger },
          'Select which requirements files to install:',
          options,
          'A',
          true
        );
        if (choice.kind === 'invalid') {
          throw new SetupError('InvalidSelection', `Invalid selection: ${choice.reason}`);
        }

        const files = choice.indices.map((i) => settings.manifests[i].file);
        for (const file of files) {
          if (!existsSync(path.join(ctx.cwd, file))) {
            throw new SetupError('ManifestNotFound', `Requirements file ${file} not found in ${ctx.cwd}`);
          }
        }
        ctx.selectedManifests = files;
        logger.info(`Selected: ${files.join(', ')}`);
      },
    },
    {
      name: 'install_dependencies',
      title: 'Install selected dependencies',
      reaches: 'DEPS_INSTALLED',
      policy: 'fatal',
      execute: async (ctx) => {
        const installed = await tools.installManifests(ctx.selectedManifests);
        if (!installed.ok) {
          throw new SetupError(
            'DependencyInstallFailed',
            `Installing ${ctx.selectedManifests.join(', ')} failed with exit code ${installed.exitCode}`
          );
        }
      },
    },
    {
      name: 'install_application',
      title: 'Install the application in editable mode',
      reaches: 'APP_INSTALLED',
      policy: 'fatal',
      execute: async () => {
        const installed = await tools.installApplication();
        if (!installed.ok) {
          throw new SetupError(
            'ApplicationInstallFailed',
            `Editable install failed with exit code ${installed.exitCode}`
          );
        }
      },
    },
    {
      name: 'decide_ui',
      title: 'Optionally install the UI',
      reaches: 'UI_DECIDED',
      policy: 'fatal',
      execute: async () => {
        const choice = await select(
          { input, logger },
          `Do you want to install the ${settings.appCommand} UI?`,
          createOptionList(UI_OPTIONS),
          'B',
          false
        );
        if (choice.kind === 'invalid') {
          throw new SetupError('InvalidSelection', `Invalid selection: ${choice.reason}`);
        }
        if (choice.index === 1) {
          logger.info('Skipping UI installation.');
          return;
        }
        // Exclusive selection over two options can only yield 0 or 1.
        if (choice.index !== 0) {
          throw new SetupError('InvalidSelection', `Unexpected UI selection index ${choice.index}`);
        }
        const installed = await tools.installUi();
        if (!installed.ok) {
          throw new SetupError('UiInstallFailed', `UI installation failed with exit code ${installed.exitCode}`);
        }
      },
    },
  ];
}

export function createExecutionContext(
  settings: SetupSettings,
  logFile: string,
  sessionId: string
): ExecutionContext {
  return {
    cwd: settings.cwd,
    envDir: settings.envDir,
    logFile,
    sessionId,
    selectedManifests: [],
    environmentActive: false,
    state: 'START',
    stepResults: [],
  };
}
