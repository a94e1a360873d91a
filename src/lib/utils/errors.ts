/**
 * Base class for every failure the helper reports to its caller.
 * `field` names the input that caused it, when one did.
 */
export class HelperError extends Error {
  readonly field?: string;

  constructor(message: string, field?: string) {
    super(message);
    this.name = new.target.name;
    this.field = field;
  }
}

export class MissingNameError extends HelperError {
  constructor(field: string) {
    super(`A non-empty "${field}" is required`, field);
  }
}

export class FileExistsConflict extends HelperError {
  readonly path: string;

  constructor(path: string) {
    super(`Refusing to overwrite existing file: ${path}`);
    this.path = path;
  }
}

export class PathEscapeError extends HelperError {
  readonly path: string;
  readonly root: string;

  constructor(path: string, root: string) {
    super(`Path "${path}" resolves outside of "${root}"`);
    this.path = path;
    this.root = root;
  }
}

const describeCause = (cause: unknown) => (cause instanceof Error ? cause.message : String(cause));

export class DirectoryCreateError extends HelperError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Could not create directory ${path}: ${describeCause(cause)}`);
    this.path = path;
    this.cause = cause;
  }
}

export class ServiceInputError extends HelperError {}

export class UnknownServiceError extends HelperError {
  constructor(service: string) {
    super(`Unknown service "${service}"`, 'service');
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
