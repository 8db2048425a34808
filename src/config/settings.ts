import path from 'node:path';

export type HostPlatform = 'win32' | 'darwin' | 'posix';

export interface ManifestOption {
  readonly label: string;
  readonly file: string;
}

export interface NativeLibrarySettings {
  /** Name passed to the package installer. */
  readonly packageName: string;
  /** Directory the installed package occupies inside site-packages. */
  readonly moduleDir: string;
  /** Local directory of prebuilt wheels. */
  readonly cacheDir: string;
}

/** Resolved once per run and frozen; nothing downstream may change it. */
export interface SetupSettings {
  readonly platform: HostPlatform;
  readonly cwd: string;
  readonly envDir: string;
  readonly activationScript: string;
  readonly envPython: string;
  readonly envBinDir: string;
  readonly nativeLibrary: NativeLibrarySettings;
  readonly manifests: readonly ManifestOption[];
  readonly appCommand: string;
  readonly uiInstallArgs: readonly string[];
  readonly interpreterCandidates: readonly string[];
}

export const SUPPORTED_PYTHON_VERSIONS = ['3.12', '3.11', '3.10'] as const;

export const ENV_DIR_NAME = '.venv';
export const PACKAGE_CACHE_DIR = 'build_helpers';
export const APP_COMMAND = 'freqtrade';

export const DEFAULT_MANIFESTS: readonly ManifestOption[] = Object.freeze([
  { label: 'Core requirements (requirements.txt)', file: 'requirements.txt' },
  { label: 'Development tools (requirements-dev.txt)', file: 'requirements-dev.txt' },
  { label: 'Hyperopt (requirements-hyperopt.txt)', file: 'requirements-hyperopt.txt' },
  { label: 'FreqAI (requirements-freqai.txt)', file: 'requirements-freqai.txt' },
  { label: 'FreqAI reinforcement learning (requirements-freqai-rl.txt)', file: 'requirements-freqai-rl.txt' },
  { label: 'Plotting (requirements-plot.txt)', file: 'requirements-plot.txt' },
]);

export function hostPlatform(platform: NodeJS.Platform = process.platform): HostPlatform {
  if (platform === 'win32') return 'win32';
  if (platform === 'darwin') return 'darwin';
  return 'posix';
}

function userName(env: NodeJS.ProcessEnv): string | undefined {
  const name = env['USERNAME'] ?? env['USER'];
  return name && name.trim() ? name.trim() : undefined;
}

function compact(version: string): string {
  return version.replace('.', '');
}

/**
 * Ordered interpreter candidates: bare names, then versioned names, then
 * well-known absolute install locations. Versions run newest first.
 */
export function interpreterCandidates(
  platform: HostPlatform,
  env: NodeJS.ProcessEnv,
  versions: readonly string[] = SUPPORTED_PYTHON_VERSIONS
): string[] {
  const user = userName(env);

  if (platform === 'win32') {
    const candidates = ['python', 'python3', ...versions.map((v) => `python${v}`)];
    if (user) {
      for (const v of versions) {
        candidates.push(
          path.win32.join('C:\\Users', user, 'AppData', 'Local', 'Programs', 'Python', `Python${compact(v)}`, 'python.exe')
        );
      }
    }
    for (const v of versions) {
      candidates.push(path.win32.join('C:\\', `Python${compact(v)}`, 'python.exe'));
    }
    return candidates;
  }

  const candidates = ['python3', 'python', ...versions.map((v) => `python${v}`)];
  if (user) {
    const home = platform === 'darwin' ? '/Users' : '/home';
    candidates.push(path.posix.join(home, user, '.pyenv', 'shims', 'python3'));
  }
  for (const prefix of ['/opt/homebrew/bin', '/usr/local/bin', '/usr/bin']) {
    for (const v of versions) {
      candidates.push(path.posix.join(prefix, `python${v}`));
    }
  }
  return candidates;
}

export function loadSettings(
  env: NodeJS.ProcessEnv = process.env,
  platform: HostPlatform = hostPlatform(),
  cwd: string = process.cwd()
): SetupSettings {
  const envDir = path.resolve(cwd, ENV_DIR_NAME);
  const windows = platform === 'win32';
  const envBinDir = path.join(envDir, windows ? 'Scripts' : 'bin');

  return Object.freeze({
    platform,
    cwd,
    envDir,
    activationScript: path.join(envBinDir, windows ? 'Activate.ps1' : 'activate'),
    envPython: path.join(envBinDir, windows ? 'python.exe' : 'python'),
    envBinDir,
    nativeLibrary: Object.freeze({
      packageName: 'ta-lib',
      moduleDir: 'talib',
      cacheDir: path.resolve(cwd, PACKAGE_CACHE_DIR),
    }),
    manifests: Object.freeze(DEFAULT_MANIFESTS.map((m) => Object.freeze({ ...m }))),
    appCommand: APP_COMMAND,
    uiInstallArgs: Object.freeze(['install-ui']),
    interpreterCandidates: Object.freeze(interpreterCandidates(platform, env)),
  });
}
