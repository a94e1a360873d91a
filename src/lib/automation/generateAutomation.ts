import { join } from 'path';

import type {
  AutomationPayload,
  AutomationRequest,
  FileResult,
  RootPaths,
  WriteBehavior,
} from '../helper/types.js';
import { deriveSlug } from '../naming/deriveSlug.js';
import { MissingNameError } from '../utils/errors.js';
import { formatCommentHeader, formatYaml } from '../utils/formatYaml.js';
import { safeWriteFileSync } from '../utils/safeWrite.js';

export const DEFAULT_MODE = 'single';

export function automationFileName(request: AutomationRequest): string {
  const alias = typeof request.alias === 'string' ? request.alias.trim() : '';
  if (!alias) {
    throw new MissingNameError('alias');
  }

  const base = request.filename?.trim().replace(/\.ya?ml$/i, '') || alias;
  return `${deriveSlug(base)}.yaml`;
}

export function generateAutomation(request: AutomationRequest): string {
  const { overwrite: _overwrite, filename: _filename, ...rest } = request;
  const payload: AutomationPayload = { ...rest };

  if (payload.mode === undefined) {
    payload.mode = DEFAULT_MODE;
  }

  const header = payload.description?.trim() ? formatCommentHeader(payload.description.trim()) : '';
  return header + formatYaml(payload);
}

export function generateAndWriteAutomation(
  request: AutomationRequest,
  rootPaths: RootPaths,
  behavior: WriteBehavior = {},
): FileResult {
  const path = join(rootPaths.automationDir, automationFileName(request));
  const content = generateAutomation(request);

  const outcome = safeWriteFileSync(path, content, {
    root: rootPaths.automationDir,
    overwrite: request.overwrite ?? false,
    failOnConflict: behavior.failOnConflict,
  });

  return { path, outcome };
}
