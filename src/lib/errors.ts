/**
 * Error types for md2cf with discriminated unions using _tag property
 * These error types follow the Effect pattern for type-safe error handling
 */

/**
 * Missing or invalid run-level input (api url, space, credentials, files, ancestor)
 */
export class ConfigurationError extends Error {
  readonly _tag = 'ConfigurationError' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * File system operation errors
 */
export class FileSystemError extends Error {
  readonly _tag = 'FileSystemError' as const;

  constructor(message: string) {
    super(message);
    this.name = 'FileSystemError';
  }
}

/**
 * Malformed front-matter in a single document
 */
export class ParseError extends Error {
  readonly _tag = 'ParseError' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ParseError';
  }
}

/**
 * Non-2xx response from Confluence. The body is kept as returned.
 */
export class ApiError extends Error {
  readonly _tag: 'ApiError' | 'VersionConflictError' = 'ApiError';
  readonly statusCode: number;
  readonly body: string;

  constructor(message: string, statusCode: number, body = '') {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.body = body;
  }
}

/**
 * Stale version supplied on update (409)
 */
export class VersionConflictError extends ApiError {
  override readonly _tag = 'VersionConflictError' as const;
  readonly pageId: string;
  readonly localVersion: number;

  constructor(pageId: string, localVersion: number, body = '') {
    super(`Version conflict on page ${pageId}: version ${localVersion} is stale`, 409, body);
    this.name = 'VersionConflictError';
    this.pageId = pageId;
    this.localVersion = localVersion;
  }
}

/**
 * Network/connectivity errors
 */
export class NetworkError extends Error {
  readonly _tag = 'NetworkError' as const;

  constructor(message: string) {
    super(message);
    this.name = 'NetworkError';
  }
}

/**
 * Union type of all error types for comprehensive error handling
 */
export type Md2cfError =
  | ConfigurationError
  | FileSystemError
  | ParseError
  | ApiError
  | VersionConflictError
  | NetworkError;

/**
 * Exit codes for CLI
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  CONFIG_ERROR: 2,
  INVALID_ARGUMENTS: 6,
} as const;

/**
 * Get exit code for an error that stopped the run before any document was processed
 */
export function getExitCodeForError(error: Md2cfError): number {
  switch (error._tag) {
    case 'ConfigurationError':
      return EXIT_CODES.CONFIG_ERROR;
    default:
      return EXIT_CODES.GENERAL_ERROR;
  }
}

/**
 * Narrow an unknown thrown value to one of our tagged errors
 */
export function isMd2cfError(error: unknown): error is Md2cfError {
  return (
    error instanceof ConfigurationError ||
    error instanceof FileSystemError ||
    error instanceof ParseError ||
    error instanceof ApiError ||
    error instanceof NetworkError
  );
}
