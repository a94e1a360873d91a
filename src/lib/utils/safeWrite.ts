import { randomUUID } from 'crypto';
import { existsSync, linkSync, mkdirSync, renameSync, rmSync, writeFileSync } from 'fs';
import { basename, dirname, isAbsolute, join, relative, resolve, sep } from 'path';

import {
  DirectoryCreateError,
  FileExistsConflict,
  isErrnoException,
  PathEscapeError,
} from './errors.js';

export type WriteOutcome = 'created' | 'skipped_exists' | 'overwritten';

export interface SafeWriteOptions {
  /** Directory the target must resolve inside of. */
  root: string;
  overwrite?: boolean;
  /** Throw FileExistsConflict instead of returning `skipped_exists`. */
  failOnConflict?: boolean;
}

// Filesystems without hard links; creation falls back to check-then-rename
const NO_LINK_CODES = new Set(['EPERM', 'ENOTSUP', 'EOPNOTSUPP', 'ENOSYS', 'EXDEV']);

export function resolveInside(root: string, target: string): string {
  if (root.includes('\0') || target.includes('\0')) {
    throw new PathEscapeError(target.replace(/\0/g, '\\0'), root.replace(/\0/g, '\\0'));
  }

  const absoluteRoot = resolve(root);
  const absoluteTarget = resolve(absoluteRoot, target);
  const fromRoot = relative(absoluteRoot, absoluteTarget);

  if (!fromRoot || fromRoot === '..' || fromRoot.startsWith(`..${sep}`) || isAbsolute(fromRoot)) {
    throw new PathEscapeError(target, absoluteRoot);
  }

  return absoluteTarget;
}

export function ensureDirSync(path: string): void {
  try {
    mkdirSync(path, { recursive: true });
  } catch (error) {
    throw new DirectoryCreateError(path, error);
  }
}

function conflict(path: string, failOnConflict: boolean): WriteOutcome {
  if (failOnConflict) {
    throw new FileExistsConflict(path);
  }

  console.warn(`⚠️  File already exists: ${path}`);
  console.warn('   Use --overwrite flag to overwrite existing files');
  return 'skipped_exists';
}

function createExclusive(tempPath: string, path: string): boolean {
  try {
    linkSync(tempPath, path);
    return true;
  } catch (error) {
    if (!isErrnoException(error)) throw error;
    if (error.code === 'EEXIST') return false;
    if (!NO_LINK_CODES.has(error.code ?? '')) throw error;
  }

  // No hard links: the check and the rename run back to back in this process
  if (existsSync(path)) return false;
  renameSync(tempPath, path);
  return true;
}

/**
 * Writes `content` to `path` without ever exposing a partially written file.
 *
 * New files are staged in a temp file and hard-linked into place: the link fails
 * with EEXIST if the target appeared after the existence check. Overwrites are
 * staged the same way and renamed over the target.
 */
export function safeWriteFileSync(
  path: string,
  content: string,
  options: SafeWriteOptions,
): WriteOutcome {
  const { root, overwrite = false, failOnConflict = false } = options;
  const target = resolveInside(root, path);

  ensureDirSync(dirname(target));

  if (!overwrite && existsSync(target)) {
    return conflict(target, failOnConflict);
  }

  const tempPath = join(dirname(target), `.${basename(target)}.${randomUUID()}.tmp`);

  try {
    writeFileSync(tempPath, content, { encoding: 'utf8', flag: 'wx' });

    if (!overwrite) {
      if (!createExclusive(tempPath, target)) {
        return conflict(target, failOnConflict);
      }
      console.log(`✅ Created: ${target}`);
      return 'created';
    }

    const existed = existsSync(target);
    renameSync(tempPath, target);
    console.log(`✅ ${existed ? 'Overwrote' : 'Created'}: ${target}`);
    return existed ? 'overwritten' : 'created';
  } finally {
    rmSync(tempPath, { force: true });
  }
}
