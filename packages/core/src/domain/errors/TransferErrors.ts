/** Classification used in reports and logs. */
export type ErrorCategory = 'configuration' | 'connection' | 'protocol' | 'statement' | 'data';

/**
 * Base class for every error raised by the transfer engine and its adapters.
 *
 * Errors are never retried: each one is surfaced to the caller (or recorded in a
 * batch report) exactly once.
 */
export abstract class TransferError extends Error {
  abstract readonly category: ErrorCategory;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
  }
}

/** Invalid mode or target, or a missing required setting. Raised before any remote call. */
export class ConfigurationError extends TransferError {
  readonly category = 'configuration' as const;
}

/** The destination could not be reached at all. */
export class ConnectionError extends TransferError {
  readonly category = 'connection' as const;
}

/** The remote service rejected a request (non-2xx response or malformed reply). */
export class ProtocolError extends TransferError {
  readonly category = 'protocol' as const;
  readonly statusCode?: number;
  readonly errorCode?: string;

  constructor(message: string, options?: { cause?: unknown; statusCode?: number; errorCode?: string }) {
    super(message, options);
    this.statusCode = options?.statusCode;
    this.errorCode = options?.errorCode;
  }
}

/** The destination file could not be created (permission denied, invalid path). */
export class OpenError extends ProtocolError {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown; statusCode?: number; errorCode?: string }) {
    const reason = options?.cause !== undefined ? `: ${describeError(options.cause)}` : '';
    super(`Cannot open upload handle for ${path}${reason}`, options);
    this.path = path;
  }
}

/** A SQL statement was accepted but failed, was cancelled, or timed out on the service. */
export class StatementError extends TransferError {
  readonly category = 'statement' as const;
  readonly statementId?: string;

  constructor(message: string, options?: { cause?: unknown; statementId?: string }) {
    super(message, options);
    this.statementId = options?.statementId;
  }
}

/** A value or column name cannot be represented at the destination. */
export class DataError extends TransferError {
  readonly category = 'data' as const;
}

/** Human-readable message for any thrown value. */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
