/**
 * Error classes for failures that mean a requested artifact cannot exist.
 * Missing roots and unreadable cache indexes are not errors; they degrade
 * to empty results instead.
 */

export type CollectErrorCode =
  | 'CACHE_DIR_UNAVAILABLE'
  | 'REPORT_WRITE_FAILED'
  | 'FILE_NOT_FOUND'
  | 'FILE_READ_FAILED';

export class CollectError extends Error {
  constructor(
    message: string,
    public readonly code: CollectErrorCode,
    public readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'CollectError';
  }
}

/** The cache directory could not be created or written */
export class CacheDirectoryError extends CollectError {
  constructor(path: string, cause?: unknown) {
    super(`Cannot use cache directory ${path}: ${describeCause(cause)}`, 'CACHE_DIR_UNAVAILABLE', path, { cause });
    this.name = 'CacheDirectoryError';
  }
}

/** The output report could not be written */
export class ReportWriteError extends CollectError {
  constructor(path: string, cause?: unknown) {
    super(`Cannot write report ${path}: ${describeCause(cause)}`, 'REPORT_WRITE_FAILED', path, { cause });
    this.name = 'ReportWriteError';
  }
}

export class FileAnalysisError extends CollectError {
  constructor(path: string, code: 'FILE_NOT_FOUND' | 'FILE_READ_FAILED', cause?: unknown) {
    super(
      code === 'FILE_NOT_FOUND' ? `File not found: ${path}` : `Cannot read ${path}: ${describeCause(cause)}`,
      code,
      path,
      { cause },
    );
    this.name = 'FileAnalysisError';
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (cause === undefined) return 'unknown error';
  return String(cause);
}

/** Node's errno code, when the value carries one */
export function errorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
