import type { BlueprintDomain } from '../helper/types.js';
import { deriveSlug } from '../naming/deriveSlug.js';
import { formatYaml, InputReference } from '../utils/formatYaml.js';

type Mapping = Record<string, unknown>;

const logbookAction = (name: string, message: string): Mapping => ({
  service: 'logbook.log',
  data: {
    name,
    message,
  },
});

export function buildAutomationsYaml(
  title: string,
  description: string | undefined,
  automations: Mapping[] | undefined,
  includeExample: boolean,
): string {
  const entries: Mapping[] = automations ? [...automations] : [];

  if (!automations?.length && includeExample) {
    entries.push({
      alias: `${title} – example`,
      description:
        description || 'Replace the trigger and actions with your real automation logic.',
      trigger: [
        {
          platform: 'state',
          entity_id: 'binary_sensor.example',
          to: 'on',
        },
      ],
      condition: [],
      action: [logbookAction(title, 'Replace this with useful actions.')],
      mode: 'single',
    });
  }

  return `# Automations for the ${title} package\n` + formatYaml({ automation: entries });
}

export function buildScriptsYaml(title: string, includeExample: boolean): string {
  const scripts: Mapping = {};

  if (includeExample) {
    scripts[deriveSlug(`${title} helper`)] = {
      alias: `${title} helper`,
      sequence: [logbookAction(title, 'Replace this script with your real sequence.')],
    };
  }

  return `# Scripts for the ${title} package\n` + formatYaml({ script: scripts });
}

export function buildScenesYaml(title: string, includeExample: boolean): string {
  const scenes: Mapping[] = [];

  if (includeExample) {
    scenes.push({
      name: `${title} scene`,
      icon: 'mdi:palette',
      entities: {
        'light.example': {
          state: 'on',
          brightness: 200,
        },
      },
    });
  }

  return `# Scenes for the ${title} package\n` + formatYaml({ scene: scenes });
}

export interface ReadmeContents {
  includeScripts: boolean;
  includeScenes: boolean;
  includeBlueprint: boolean;
}

export function buildReadme(
  title: string,
  description: string | undefined,
  contents: ReadmeContents,
): string {
  const lines = [`# ${title} package`, ''];

  lines.push(description || 'Describe the goal of this automation package.');
  lines.push('', '## Contents', '', '- `automations.yaml`');

  if (contents.includeScripts) lines.push('- `scripts.yaml`');
  if (contents.includeScenes) lines.push('- `scenes.yaml`');
  if (contents.includeBlueprint) lines.push('- `blueprints/` automation or script blueprint');

  lines.push(
    '',
    '## Getting started',
    '',
    '1. Adjust the example entries to match your devices.',
    '2. Load the package by enabling `packages:` in `configuration.yaml`.',
    '3. Restart Home Assistant and verify the automations appear as expected.',
  );

  return lines.join('\n') + '\n';
}

export function buildBlueprintYaml(
  title: string,
  description: string | undefined,
  domain: BlueprintDomain,
): string {
  const blueprint: Mapping = {
    name: `${title} helper blueprint`,
    description: description || 'Adapt this blueprint to create reusable automations or scripts.',
    domain,
    input: {
      target_entity: {
        name: 'Target entity',
        description: 'Entity that should receive the action.',
        selector: { entity: {} },
      },
    },
  };

  if (domain === 'automation') {
    blueprint.trigger = [
      {
        platform: 'state',
        entity_id: new InputReference('target_entity'),
        to: 'on',
      },
    ];
    blueprint.action = [
      logbookAction(title, 'Blueprint triggered – replace with useful actions.'),
    ];
  } else {
    blueprint.sequence = [
      logbookAction(title, 'Blueprint executed – replace with useful steps.'),
    ];
  }

  return formatYaml({ blueprint });
}
