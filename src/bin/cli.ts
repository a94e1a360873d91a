#!/usr/bin/env node
import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

import { loadRootPaths } from '../lib/helper/config.js';
import { loadRequestFile } from '../lib/helper/loadRequest.js';
import {
  callService,
  createServiceRegistry,
  SERVICE_GENERATE_AUTOMATION,
  SERVICE_GENERATE_PACKAGE,
} from '../lib/helper/services.js';
import type { FileResult } from '../lib/helper/types.js';
import {
  FileExistsConflict,
  HelperError,
  MissingNameError,
  PathEscapeError,
} from '../lib/utils/errors.js';

// Get package.json for version sync
const __dirname = dirname(fileURLToPath(import.meta.url));
const pkg = JSON.parse(readFileSync(join(__dirname, '../../package.json'), 'utf8'));

interface WriteFlags {
  configRoot?: string;
  overwrite?: boolean;
  strict?: boolean;
}

function run(service: string, data: unknown, flags: WriteFlags): FileResult[] {
  const rootPaths = loadRootPaths(flags.configRoot);
  const registry = createServiceRegistry(rootPaths, { failOnConflict: flags.strict });
  return callService(registry, service, data);
}

function report(results: FileResult[]) {
  const skipped = results.filter((result) => result.outcome === 'skipped_exists');
  const written = results.length - skipped.length;

  console.log(`📋 ${written} file(s) written, ${skipped.length} skipped`);
  if (skipped.length > 0) {
    console.log('💡 Re-run with --overwrite to replace the skipped files.');
  }
}

function fail(error: unknown): never {
  if (error instanceof HelperError) {
    console.error(`❌ ${error.name}: ${error.message}`);

    if (error instanceof MissingNameError) {
      console.log(`💡 Provide "${error.field}" in the request.`);
    } else if (error instanceof FileExistsConflict) {
      console.log('💡 Use --overwrite to replace it, or drop --strict to skip it.');
    } else if (error instanceof PathEscapeError) {
      console.log('💡 File names may not point outside the helper directories.');
    }
  } else {
    console.error('❌ Error:', error);
  }
  process.exit(1);
}

const withRequestFile = (data: unknown, overrides: Record<string, unknown>) =>
  typeof data === 'object' && data !== null && !Array.isArray(data)
    ? { ...data, ...overrides }
    : data;

const program = new Command();

program.name(pkg.name).description(pkg.description).version(pkg.version);

program
  .command('generate-automation <file>')
  .description('Write an automation from a YAML, JSON or TS request file')
  .option('-f, --filename <name>', 'Custom file name (defaults to the slugified alias)')
  .option('-r, --config-root <path>', 'Configuration root directory')
  .option('--overwrite', 'Overwrite existing files without warning')
  .option('--strict', 'Fail instead of skipping when a file already exists')
  .action(async (file: string, options: WriteFlags & { filename?: string }) => {
    try {
      const overrides: Record<string, unknown> = {};
      if (options.filename) overrides.filename = options.filename;
      if (options.overwrite) overrides.overwrite = true;

      const data = withRequestFile(await loadRequestFile(file), overrides);
      const results = run(SERVICE_GENERATE_AUTOMATION, data, options);
      report(results);
    } catch (error) {
      fail(error);
    }
  });

program
  .command('generate-package <name>')
  .description('Scaffold a package directory with automations, scripts, scenes and a README')
  .option('-d, --description <text>', 'Package description')
  .option('--include-scripts', 'Add scripts.yaml')
  .option('--include-scenes', 'Add scenes.yaml')
  .option('--include-blueprint', 'Add a blueprint stub')
  .option('--blueprint-domain <domain>', 'Blueprint domain: automation or script', 'automation')
  .option('--no-example', 'Leave the generated files without example entries')
  .option('-r, --config-root <path>', 'Configuration root directory')
  .option('--overwrite', 'Overwrite existing files without warning')
  .option('--strict', 'Fail instead of skipping when a file already exists')
  .action(
    (
      name: string,
      options: WriteFlags & {
        description?: string;
        includeScripts?: boolean;
        includeScenes?: boolean;
        includeBlueprint?: boolean;
        blueprintDomain: string;
        example: boolean;
      },
    ) => {
      try {
        const data: Record<string, unknown> = {
          name,
          description: options.description,
          overwrite: options.overwrite ?? false,
          include_example: options.example,
          include_scripts: options.includeScripts ?? false,
          include_scenes: options.includeScenes ?? false,
          include_blueprint: options.includeBlueprint ?? false,
          blueprint_domain: options.blueprintDomain,
        };

        const results = run(SERVICE_GENERATE_PACKAGE, data, options);
        report(results);
      } catch (error) {
        fail(error);
      }
    },
  );

program
  .command('call <service> <file>')
  .description('Invoke a helper service by name with the request in <file>')
  .option('-r, --config-root <path>', 'Configuration root directory')
  .option('--strict', 'Fail instead of skipping when a file already exists')
  .action(async (service: string, file: string, options: WriteFlags) => {
    try {
      const results = run(service, await loadRequestFile(file), options);
      report(results);
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync().catch(fail);
