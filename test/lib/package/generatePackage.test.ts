import { mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  buildAutomationsYaml,
  buildReadme,
  buildScenesYaml,
  buildScriptsYaml,
} from '../../../src/lib/package/buildPackageFiles.js';
import {
  generateAndWritePackage,
  generatePackage,
} from '../../../src/lib/package/generatePackage.js';
import { DirectoryCreateError, MissingNameError } from '../../../src/lib/utils/errors.js';
import { InputReference, parseYaml } from '../../../src/lib/utils/formatYaml.js';
import { createSandbox, listFiles, type Sandbox, silenceConsole } from '../../utils.js';

describe('package file builders', () => {
  it('writes an empty automation list without the example', () => {
    expect(buildAutomationsYaml('Hallway Lighting', undefined, undefined, false)).toBe(
      '# Automations for the Hallway Lighting package\nautomation: []\n',
    );
  });

  it('adds an example automation by default', () => {
    const content = buildAutomationsYaml(
      'Hallway Lighting',
      'Lights for the hallway',
      undefined,
      true,
    );

    expect(parseYaml(content)).toEqual({
      automation: [
        {
          alias: 'Hallway Lighting – example',
          description: 'Lights for the hallway',
          trigger: [{ platform: 'state', entity_id: 'binary_sensor.example', to: 'on' }],
          condition: [],
          action: [
            {
              service: 'logbook.log',
              data: { name: 'Hallway Lighting', message: 'Replace this with useful actions.' },
            },
          ],
          mode: 'single',
        },
      ],
    });
  });

  it('uses supplied automations instead of the example', () => {
    const automations = [{ alias: 'Custom', trigger: [], action: [] }];
    const content = buildAutomationsYaml('Hallway Lighting', undefined, automations, true);

    expect(parseYaml(content)).toEqual({ automation: automations });
  });

  it('writes empty scripts and scenes without examples', () => {
    expect(buildScriptsYaml('Hallway Lighting', false)).toBe(
      '# Scripts for the Hallway Lighting package\nscript: {}\n',
    );
    expect(buildScenesYaml('Hallway Lighting', false)).toBe(
      '# Scenes for the Hallway Lighting package\nscene: []\n',
    );
  });

  it('keys the example script by its slug', () => {
    const parsed = parseYaml(buildScriptsYaml('Hallway Lighting', true));

    expect(parsed).toEqual({
      script: {
        hallway_lighting_helper: {
          alias: 'Hallway Lighting helper',
          sequence: [
            {
              service: 'logbook.log',
              data: {
                name: 'Hallway Lighting',
                message: 'Replace this script with your real sequence.',
              },
            },
          ],
        },
      },
    });
  });

  it('lists only the included files in the README', () => {
    const readme = buildReadme('Hallway Lighting', 'Lights for the hallway', {
      includeScripts: true,
      includeScenes: false,
      includeBlueprint: false,
    });

    expect(readme).toBe(
      [
        '# Hallway Lighting package',
        '',
        'Lights for the hallway',
        '',
        '## Contents',
        '',
        '- `automations.yaml`',
        '- `scripts.yaml`',
        '',
        '## Getting started',
        '',
        '1. Adjust the example entries to match your devices.',
        '2. Load the package by enabling `packages:` in `configuration.yaml`.',
        '3. Restart Home Assistant and verify the automations appear as expected.',
        '',
      ].join('\n'),
    );
  });
});

describe('generatePackage', () => {
  it('renders only automations and README by default', () => {
    const files = generatePackage({ name: 'hallway_lighting' });
    expect(files.map((file) => file.path)).toEqual(['automations.yaml', 'README.md']);
  });

  it('places the blueprint under its domain directory', () => {
    const files = generatePackage({
      name: 'Garage Door',
      include_blueprint: true,
      blueprint_domain: 'script',
    });
    const blueprint = files.find((file) => file.path.startsWith('blueprints'));

    expect(blueprint?.path).toBe(join('blueprints', 'script', 'garage_door.yaml'));
    expect(parseYaml(blueprint?.content ?? '')).toEqual({
      blueprint: {
        name: 'Garage Door helper blueprint',
        description: 'Adapt this blueprint to create reusable automations or scripts.',
        domain: 'script',
        input: {
          target_entity: {
            name: 'Target entity',
            description: 'Entity that should receive the action.',
            selector: { entity: {} },
          },
        },
        sequence: [
          {
            service: 'logbook.log',
            data: {
              name: 'Garage Door',
              message: 'Blueprint executed – replace with useful steps.',
            },
          },
        ],
      },
    });
  });

  it('references the blueprint input from the automation trigger', () => {
    const files = generatePackage({ name: 'hallway_lighting', include_blueprint: true });
    const [blueprint] = files.slice(-1);

    expect(blueprint.content).toContain('entity_id: !input target_entity');
    expect(parseYaml(blueprint.content)).toMatchObject({
      blueprint: {
        domain: 'automation',
        trigger: [{ platform: 'state', entity_id: new InputReference('target_entity'), to: 'on' }],
      },
    });
  });

  it('requires a name', () => {
    expect(() => generatePackage({ name: '  ' })).toThrow(MissingNameError);
  });
});

describe('generateAndWritePackage', () => {
  let sandbox: Sandbox;

  beforeEach(() => {
    sandbox = createSandbox();
    silenceConsole();
  });

  afterEach(() => {
    sandbox.cleanup();
  });

  it('writes every optional file when requested', () => {
    const results = generateAndWritePackage(
      {
        name: 'hallway_lighting',
        include_scripts: true,
        include_scenes: true,
        include_blueprint: true,
      },
      sandbox.roots,
    );
    const packageDir = join(sandbox.roots.packagesDir, 'hallway_lighting');

    expect(results).toEqual([
      { path: join(packageDir, 'automations.yaml'), outcome: 'created' },
      { path: join(packageDir, 'scripts.yaml'), outcome: 'created' },
      { path: join(packageDir, 'scenes.yaml'), outcome: 'created' },
      { path: join(packageDir, 'README.md'), outcome: 'created' },
      {
        path: join(packageDir, 'blueprints', 'automation', 'hallway_lighting.yaml'),
        outcome: 'created',
      },
    ]);
    expect(listFiles(packageDir)).toEqual([
      'README.md',
      'automations.yaml',
      join('blueprints', 'automation', 'hallway_lighting.yaml'),
      'scenes.yaml',
      'scripts.yaml',
    ]);
  });

  it('writes only automations and README when nothing is included', () => {
    generateAndWritePackage(
      {
        name: 'hallway_lighting',
        include_scripts: false,
        include_scenes: false,
        include_blueprint: false,
      },
      sandbox.roots,
    );

    expect(listFiles(sandbox.roots.packagesDir)).toEqual([
      join('hallway_lighting', 'README.md'),
      join('hallway_lighting', 'automations.yaml'),
    ]);
  });

  it('skips existing files without stopping the rest', () => {
    const packageDir = join(sandbox.roots.packagesDir, 'hallway_lighting');
    mkdirSync(packageDir, { recursive: true });
    writeFileSync(join(packageDir, 'README.md'), 'keep me\n');

    const results = generateAndWritePackage(
      { name: 'hallway_lighting', include_scripts: true },
      sandbox.roots,
    );

    expect(results.map((result) => result.outcome)).toEqual([
      'created',
      'created',
      'skipped_exists',
    ]);
    expect(readFileSync(join(packageDir, 'README.md'), 'utf8')).toBe('keep me\n');
  });

  it('overwrites every file when asked', () => {
    generateAndWritePackage({ name: 'hallway_lighting' }, sandbox.roots);
    const results = generateAndWritePackage(
      { name: 'hallway_lighting', description: 'Second pass', overwrite: true },
      sandbox.roots,
    );

    expect(results.map((result) => result.outcome)).toEqual(['overwritten', 'overwritten']);
    expect(
      readFileSync(join(sandbox.roots.packagesDir, 'hallway_lighting', 'README.md'), 'utf8'),
    ).toContain('\nSecond pass\n');
  });

  it('keeps crafted names inside the packages directory', () => {
    const results = generateAndWritePackage({ name: '../../outside' }, sandbox.roots);

    expect(results[0].path).toBe(join(sandbox.roots.packagesDir, 'outside', 'automations.yaml'));
  });

  it('fails before writing when the package directory cannot be created', () => {
    writeFileSync(sandbox.roots.packagesDir, 'not a directory');

    expect(() => generateAndWritePackage({ name: 'hallway_lighting' }, sandbox.roots)).toThrow(
      DirectoryCreateError,
    );
    expect(readFileSync(sandbox.roots.packagesDir, 'utf8')).toBe('not a directory');
  });
});
