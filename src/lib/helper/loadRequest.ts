import { readFileSync } from 'fs';
import { createJiti } from 'jiti';
import { extname, resolve } from 'path';

import { parseYaml } from '../utils/formatYaml.js';

/**
 * Reads a service request from a YAML file, or from the default export of a
 * TS/JS/JSON module.
 */
export async function loadRequestFile(filePath: string): Promise<unknown> {
  const absolutePath = resolve(filePath);
  const extension = extname(absolutePath).toLowerCase();

  if (extension === '.yaml' || extension === '.yml') {
    return parseYaml(readFileSync(absolutePath, 'utf8'));
  }

  const jiti = createJiti(import.meta.url);
  const requestModule: unknown = await jiti.import(absolutePath);

  if (typeof requestModule === 'object' && requestModule !== null && 'default' in requestModule) {
    return requestModule.default;
  }
  return requestModule;
}
