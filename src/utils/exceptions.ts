/**
 * Error codes callers can branch on without string-matching messages.
 */
export const ErrorCode = {
  UNKNOWN_ERROR: 'UNKNOWN_ERROR',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  DATABASE_ERROR: 'DATABASE_ERROR',

  // Source provider failures
  TRANSPORT_FAILURE: 'TRANSPORT_FAILURE',
  TRANSPORT_TIMEOUT: 'TRANSPORT_TIMEOUT',
  RATE_LIMITED: 'RATE_LIMITED',
  MALFORMED_PAYLOAD: 'MALFORMED_PAYLOAD',
  UNKNOWN_PROVIDER: 'UNKNOWN_PROVIDER',

  // Lookup workflow
  AMBIGUOUS_PLAYER: 'AMBIGUOUS_PLAYER',
  OPERATION_ABORTED: 'OPERATION_ABORTED',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Base class for application exceptions
 */
export class AppException extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly errorCode: ErrorCodeType = ErrorCode.UNKNOWN_ERROR
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Thrown when validation fails (configuration, import files, caller arguments)
 */
export class ValidationException extends AppException {
  constructor(message: string, errorCode: ErrorCodeType = ErrorCode.VALIDATION_ERROR) {
    super(message, 400, errorCode);
  }
}

/**
 * Thrown by maintenance code paths that require a record to exist.
 * Provider lookups report a missing record as a value instead.
 */
export class NotFoundException extends AppException {
  constructor(message: string, errorCode: ErrorCodeType = ErrorCode.NOT_FOUND) {
    super(message, 404, errorCode);
  }
}

/**
 * Thrown when an aggregator is asked for a provider it was not built with.
 */
export class UnknownProviderException extends AppException {
  constructor(public readonly providerName: string) {
    super(`Unknown provider: ${providerName}`, 400, ErrorCode.UNKNOWN_PROVIDER);
  }
}

/**
 * Thrown when a write to the historical archive fails.
 */
export class DatabaseException extends AppException {
  public readonly originalError?: Error;

  constructor(message: string, originalError?: Error) {
    super(message, 500, ErrorCode.DATABASE_ERROR);
    this.originalError = originalError;
  }

  static fromError(error: unknown, operation: string): DatabaseException {
    const originalError = error instanceof Error ? error : new Error(String(error));
    return new DatabaseException(`Database operation failed: ${operation}`, originalError);
  }
}

/**
 * Thrown when a source backend cannot be reached or answers with something
 * that cannot be read (timeout, network error, HTTP 5xx, malformed page or row).
 * This is the only failure a source provider raises.
 */
export class TransportFailureException extends AppException {
  public readonly originalError?: Error;
  public readonly source: string;
  public readonly operation: string;

  constructor(
    source: string,
    operation: string,
    message: string,
    statusCode: number = 502,
    errorCode: ErrorCodeType = ErrorCode.TRANSPORT_FAILURE,
    originalError?: Error
  ) {
    super(`[${source}] ${operation}: ${message}`, statusCode, errorCode);
    this.source = source;
    this.operation = operation;
    this.originalError = originalError;
  }

  /**
   * Creates a TransportFailureException from a caught error.
   */
  static fromError(
    source: string,
    operation: string,
    error: unknown,
    statusCode: number = 502
  ): TransportFailureException {
    const originalError = error instanceof Error ? error : new Error(String(error));
    const message = originalError.message || 'Unknown error';
    return new TransportFailureException(
      source,
      operation,
      message,
      statusCode,
      ErrorCode.TRANSPORT_FAILURE,
      originalError
    );
  }

  static timeout(source: string, operation: string): TransportFailureException {
    return new TransportFailureException(
      source,
      operation,
      'Request timed out',
      504,
      ErrorCode.TRANSPORT_TIMEOUT,
      new Error('Timeout')
    );
  }

  static rateLimited(source: string, operation: string): TransportFailureException {
    return new TransportFailureException(
      source,
      operation,
      'Rate limit exceeded',
      429,
      ErrorCode.RATE_LIMITED,
      new Error('Rate limited')
    );
  }

  static malformed(source: string, operation: string, detail: string): TransportFailureException {
    return new TransportFailureException(
      source,
      operation,
      `Malformed payload: ${detail}`,
      502,
      ErrorCode.MALFORMED_PAYLOAD
    );
  }
}

/**
 * Raised only by callers that need a single player and were given an
 * ambiguous name. Always carries the candidate ids so the caller can re-query.
 * `confirmed` is false when none of the candidates has recorded stats.
 */
export class AmbiguousPlayerException extends AppException {
  constructor(
    public readonly query: string,
    public readonly candidateIds: string[],
    public readonly confirmed = true
  ) {
    const matches = confirmed
      ? `${candidateIds.length} players with recorded stats`
      : `${candidateIds.length} players, none with confirmed stats`;
    super(
      `"${query}" matches ${matches}; re-query by id (${candidateIds.join(', ')})`,
      409,
      ErrorCode.AMBIGUOUS_PLAYER
    );
  }
}

/**
 * Thrown when the caller's AbortSignal fires before an operation completes.
 */
export class OperationAbortedException extends AppException {
  constructor(operation: string) {
    super(`Operation aborted: ${operation}`, 499, ErrorCode.OPERATION_ABORTED);
  }
}

/**
 * Throw OperationAbortedException when the signal has already fired.
 */
export function throwIfAborted(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    throw new OperationAbortedException(operation);
  }
}
