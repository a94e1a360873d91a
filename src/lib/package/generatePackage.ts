import { join } from 'path';

import type { FileResult, PackageOptions, RootPaths, WriteBehavior } from '../helper/types.js';
import { deriveSlug, humanize } from '../naming/deriveSlug.js';
import { MissingNameError } from '../utils/errors.js';
import { ensureDirSync, resolveInside, safeWriteFileSync } from '../utils/safeWrite.js';
import {
  buildAutomationsYaml,
  buildBlueprintYaml,
  buildReadme,
  buildScenesYaml,
  buildScriptsYaml,
} from './buildPackageFiles.js';

export interface PackageFile {
  /** Path relative to the package directory. */
  path: string;
  content: string;
}

export function packageSlug(name: string): string {
  const trimmed = typeof name === 'string' ? name.trim() : '';
  if (!trimmed) {
    throw new MissingNameError('name');
  }
  return deriveSlug(trimmed);
}

/**
 * Renders every file of a package without touching the filesystem.
 */
export function generatePackage(options: PackageOptions): PackageFile[] {
  const slug = packageSlug(options.name);
  const title = humanize(options.name.trim());
  const {
    description,
    include_scripts: includeScripts = false,
    include_scenes: includeScenes = false,
    include_blueprint: includeBlueprint = false,
    blueprint_domain: blueprintDomain = 'automation',
    include_example: includeExample = true,
  } = options;

  const files: PackageFile[] = [
    {
      path: 'automations.yaml',
      content: buildAutomationsYaml(title, description, options.automations, includeExample),
    },
  ];

  if (includeScripts) {
    files.push({ path: 'scripts.yaml', content: buildScriptsYaml(title, includeExample) });
  }

  if (includeScenes) {
    files.push({ path: 'scenes.yaml', content: buildScenesYaml(title, includeExample) });
  }

  files.push({
    path: 'README.md',
    content: buildReadme(title, description, { includeScripts, includeScenes, includeBlueprint }),
  });

  if (includeBlueprint) {
    files.push({
      path: join('blueprints', blueprintDomain, `${slug}.yaml`),
      content: buildBlueprintYaml(title, description, blueprintDomain),
    });
  }

  return files;
}

export function generateAndWritePackage(
  options: PackageOptions,
  rootPaths: RootPaths,
  behavior: WriteBehavior = {},
): FileResult[] {
  const packageDir = resolveInside(rootPaths.packagesDir, packageSlug(options.name));
  const files = generatePackage(options);

  // Fail before any file is attempted if the package itself cannot exist
  ensureDirSync(packageDir);

  const results = files.map(({ path, content }) => {
    const target = join(packageDir, path);
    const outcome = safeWriteFileSync(target, content, {
      root: packageDir,
      overwrite: options.overwrite ?? false,
      failOnConflict: behavior.failOnConflict,
    });
    return { path: target, outcome };
  });

  console.log(`✅ Package scaffolding ready at ${packageDir}`);
  return results;
}
