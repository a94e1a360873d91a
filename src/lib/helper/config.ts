import { config as dotenvConfig } from 'dotenv';
import { join, resolve } from 'path';

import type { RootPaths } from './types.js';

export const AUTOMATION_DIR_NAME = 'automation_helper';
export const PACKAGES_DIR_NAME = 'packages';
export const CONFIG_ROOT_ENV = 'AUTOMATION_HELPER_CONFIG_ROOT';

export function resolveRootPaths(configRoot: string): RootPaths {
  const root = resolve(configRoot);
  return {
    configRoot: root,
    automationDir: join(root, AUTOMATION_DIR_NAME),
    packagesDir: join(root, PACKAGES_DIR_NAME),
  };
}

/**
 * Root precedence: explicit option, then AUTOMATION_HELPER_CONFIG_ROOT (from the
 * environment or `.env`), then the working directory.
 */
export function loadRootPaths(configRoot?: string, envPath = '.env'): RootPaths {
  dotenvConfig({ path: envPath });
  return resolveRootPaths(configRoot || process.env[CONFIG_ROOT_ENV] || process.cwd());
}
