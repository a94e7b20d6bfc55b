export type IngestErrorCode = 'NOT_FOUND' | 'INVALID_PATH' | 'EMPTY_SELECTION' | 'FILE_READ';

export class IngestError extends Error {
  readonly code: IngestErrorCode;

  constructor(code: IngestErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class NotFoundError extends IngestError {
  constructor(readonly path: string) {
    super('NOT_FOUND', `Path does not exist: ${path}`);
  }
}

export class InvalidPathError extends IngestError {
  constructor(readonly path: string) {
    super('INVALID_PATH', `Path is neither a regular file nor a directory: ${path}`);
  }
}

/** Filters matched nothing. Distinct from NotFoundError so callers can suggest loosening them. */
export class EmptySelectionError extends IngestError {
  constructor(readonly path: string) {
    super('EMPTY_SELECTION', `No files matched include/exclude filters for '${path}'`);
  }
}

export class FileReadError extends IngestError {
  constructor(readonly file: string, cause: unknown) {
    super('FILE_READ', `Error reading file: ${describeError(cause)}`, { cause });
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
