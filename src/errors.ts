// src/errors.ts
// What: Error taxonomy for the intake pipeline.
// How: Every failure the pipeline distinguishes is a PipelineError subclass carrying a stable code.
//      Per-file errors are caught by the crawler/ingestor and turned into counters; only SetupError
//      is allowed to abort a run.

export type PipelineErrorCode =
  | 'HASH_UNAVAILABLE'
  | 'CLASSIFICATION_REJECTED'
  | 'BACKUP_WRITE'
  | 'LINK_CONFLICT'
  | 'CATALOG_ADD_FAILURE'
  | 'CATALOG_LIST_FAILURE'
  | 'SETUP';

export class PipelineError extends Error {
  code: PipelineErrorCode;
  path?: string;
  constructor(code: PipelineErrorCode, message: string, options: { path?: string; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'PipelineError';
    this.code = code;
    this.path = options.path;
  }
}

export class HashUnavailable extends PipelineError {
  constructor(path: string, message: string, cause?: unknown) {
    super('HASH_UNAVAILABLE', message, { path, cause });
    this.name = 'HashUnavailable';
  }
}

export class ClassificationRejected extends PipelineError {
  constructor(path: string) {
    super('CLASSIFICATION_REJECTED', `Unsupported format: ${path}`, { path });
    this.name = 'ClassificationRejected';
  }
}

export class BackupWriteError extends PipelineError {
  constructor(path: string, message: string, cause?: unknown) {
    super('BACKUP_WRITE', message, { path, cause });
    this.name = 'BackupWriteError';
  }
}

export class LinkConflict extends PipelineError {
  stagedPath: string;
  constructor(path: string, stagedPath: string) {
    super('LINK_CONFLICT', `File already exists in staging: ${stagedPath}`, { path });
    this.name = 'LinkConflict';
    this.stagedPath = stagedPath;
  }
}

export class CatalogAddFailure extends PipelineError {
  stderr?: string;
  constructor(path: string, message: string, stderr?: string, cause?: unknown) {
    super('CATALOG_ADD_FAILURE', message, { path, cause });
    this.name = 'CatalogAddFailure';
    this.stderr = stderr;
  }
}

export class CatalogListFailure extends PipelineError {
  stderr?: string;
  constructor(message: string, stderr?: string, cause?: unknown) {
    super('CATALOG_LIST_FAILURE', message, { cause });
    this.name = 'CatalogListFailure';
    this.stderr = stderr;
  }
}

export class SetupError extends PipelineError {
  constructor(message: string, options: { path?: string; cause?: unknown } = {}) {
    super('SETUP', message, options);
    this.name = 'SetupError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Node's errno code (ENOENT, EEXIST, ...) when present. */
export function errnoCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    const { code } = err;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
