export { deriveSlug, humanize, FALLBACK_SLUG } from './naming/deriveSlug.js';
export { safeWriteFileSync, resolveInside, ensureDirSync } from './utils/safeWrite.js';
export type { SafeWriteOptions, WriteOutcome } from './utils/safeWrite.js';
export { formatYaml, parseYaml, formatCommentHeader, InputReference } from './utils/formatYaml.js';
export {
  generateAutomation,
  generateAndWriteAutomation,
  automationFileName,
} from './automation/generateAutomation.js';
export { generatePackage, generateAndWritePackage } from './package/generatePackage.js';
export type { PackageFile } from './package/generatePackage.js';
export { loadRootPaths, resolveRootPaths } from './helper/config.js';
export {
  createServiceRegistry,
  callService,
  SERVICE_GENERATE_AUTOMATION,
  SERVICE_GENERATE_PACKAGE,
} from './helper/services.js';
export type { ScaffoldOperation, ServiceRegistry } from './helper/services.js';
export type {
  AutomationPayload,
  AutomationRequest,
  BlueprintDomain,
  FileResult,
  PackageOptions,
  RootPaths,
  WriteBehavior,
} from './helper/types.js';
export * from './utils/errors.js';
