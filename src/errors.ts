/**
 * Error taxonomy for the downloader
 */

export type ErrorCode = 'ERR_CONFIG' | 'ERR_AUTH' | 'ERR_TRANSPORT' | 'ERR_PERSISTENCE';

/**
 * Base error with a stable code for the CLI to report on
 */
export class DownloaderError extends Error {
  public readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'DownloaderError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Invalid or unreadable configuration. Fatal to the run.
 */
export class ConfigurationError extends DownloaderError {
  public readonly key?: string;

  constructor(message: string, options: { key?: string; cause?: unknown } = {}) {
    super(message, 'ERR_CONFIG', options.cause);
    this.name = 'ConfigurationError';
    this.key = options.key;
  }
}

/**
 * Login rejected by the catalog. Fatal to the run.
 */
export class AuthenticationError extends DownloaderError {
  public readonly statusCode?: number;

  constructor(message: string, options: { statusCode?: number; cause?: unknown } = {}) {
    super(message, 'ERR_AUTH', options.cause);
    this.name = 'AuthenticationError';
    this.statusCode = options.statusCode;
  }
}

/**
 * Network failure on a remote call
 */
export class TransportError extends DownloaderError {
  public readonly url: string;

  constructor(message: string, options: { url: string; cause?: unknown }) {
    super(message, 'ERR_TRANSPORT', options.cause);
    this.name = 'TransportError';
    this.url = options.url;
  }
}

/**
 * Ledger read, parse or write failure
 */
export class PersistenceError extends DownloaderError {
  public readonly path: string;
  public readonly operation: 'read' | 'parse' | 'write';

  constructor(
    message: string,
    options: { path: string; operation: 'read' | 'parse' | 'write'; cause?: unknown },
  ) {
    super(message, 'ERR_PERSISTENCE', options.cause);
    this.name = 'PersistenceError';
    this.path = options.path;
    this.operation = options.operation;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
