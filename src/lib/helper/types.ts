import type { WriteOutcome } from '../utils/safeWrite.js';

export interface RootPaths {
  configRoot: string;
  /** `<configRoot>/automation_helper` */
  automationDir: string;
  /** `<configRoot>/packages` */
  packagesDir: string;
}

export type AutomationPayload = {
  alias?: string;
  description?: string;
  mode?: string;
} & Record<string, unknown>;

export type AutomationRequest = AutomationPayload & {
  overwrite?: boolean;
  /** Custom file name, slugified like an alias. */
  filename?: string;
};

export type BlueprintDomain = 'automation' | 'script';

export interface PackageOptions {
  name: string;
  description?: string;
  include_scripts?: boolean;
  include_scenes?: boolean;
  include_blueprint?: boolean;
  blueprint_domain?: BlueprintDomain;
  include_example?: boolean;
  automations?: Array<Record<string, unknown>>;
  overwrite?: boolean;
}

export interface FileResult {
  path: string;
  outcome: WriteOutcome;
}

export interface WriteBehavior {
  failOnConflict?: boolean;
}
