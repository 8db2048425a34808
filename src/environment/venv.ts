import { existsSync, readdirSync } from 'node:fs';
import path from 'node:path';
import type { SetupSettings } from '../config/settings.js';

export function environmentExists(settings: SetupSettings): boolean {
  return existsSync(settings.activationScript);
}

/** Windows venvs use Lib/site-packages; POSIX ones nest it under lib/pythonX.Y. */
export function sitePackagesDirs(settings: SetupSettings): string[] {
  if (settings.platform === 'win32') {
    return [path.join(settings.envDir, 'Lib', 'site-packages')];
  }
  const libDir = path.join(settings.envDir, 'lib');
  if (!existsSync(libDir)) return [];
  return readdirSync(libDir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory() && entry.name.startsWith('python'))
    .map((entry) => path.join(libDir, entry.name, 'site-packages'));
}

export function hasInstalledModule(settings: SetupSettings, moduleDir: string): boolean {
  return sitePackagesDirs(settings).some((dir) => existsSync(path.join(dir, moduleDir)));
}
