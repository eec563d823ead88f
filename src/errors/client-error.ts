/**
 * Client Error Module
 *
 * Typed error taxonomy for the transaction client. Transport failures are
 * classified once, at the stub, into an {@link RpcError} carrying a
 * {@link RpcErrorKind}; everything above the stub works with these kinds and
 * never re-parses error text.
 *
 * Kinds surfaced to callers:
 * - {@link TransactionError}: caller misuse, never retried
 * - {@link AbortedError}: optimistic-concurrency conflict, retry with a new transaction
 * - {@link RetriableError}: transient server condition, retried like a conflict
 * - {@link ConnectionError}: the endpoint could not be reached
 * - {@link SessionError}: login/refresh could not produce a usable session
 * - {@link ConfigurationError}: invalid options, connection strings or retry policy
 */

/**
 * Machine-readable error codes
 */
export const ErrorCode = {
  TRANSACTION_ERROR: 'TRANSACTION_ERROR',
  START_TS_MISMATCH: 'START_TS_MISMATCH',
  ABORTED: 'ABORTED',
  RETRIABLE: 'RETRIABLE',
  CONNECTION_ERROR: 'CONNECTION_ERROR',
  SESSION_ERROR: 'SESSION_ERROR',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  RPC_ERROR: 'RPC_ERROR',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Serialized form of a client error (for logs and diagnostics)
 */
export interface ClientErrorJson {
  name: string;
  code: ErrorCodeType;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Base class of every error raised by the client.
 */
export class GraphClientError extends Error {
  readonly code: ErrorCodeType;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCodeType,
    message: string,
    options?: { cause?: unknown; details?: Record<string, unknown> }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'GraphClientError';
    this.code = code;
    // Only keep details if provided and non-empty
    if (options?.details && Object.keys(options.details).length > 0) {
      this.details = options.details;
    }
  }

  toJSON(): ClientErrorJson {
    const json: ClientErrorJson = {
      name: this.name,
      code: this.code,
      message: this.message,
    };
    if (this.details) {
      json.details = this.details;
    }
    return json;
  }
}

/**
 * Invalid use of a transaction: reusing a finished transaction, mutating a
 * read-only one, malformed variables, best-effort on a read-write transaction.
 */
export class TransactionError extends GraphClientError {
  constructor(
    message: string,
    options?: { details?: Record<string, unknown>; code?: ErrorCodeType }
  ) {
    super(options?.code ?? ErrorCode.TRANSACTION_ERROR, message, options);
    this.name = 'TransactionError';
  }
}

/**
 * The server returned a context whose start timestamp differs from the one the
 * transaction already holds. Fatal: the transaction can no longer be trusted.
 */
export class StartTsMismatchError extends TransactionError {
  readonly expected: number;
  readonly received: number;

  constructor(expected: number, received: number) {
    super(`StartTs mismatch: transaction has ${expected}, server returned ${received}`, {
      details: { expected, received },
      code: ErrorCode.START_TS_MISMATCH,
    });
    this.name = 'StartTsMismatchError';
    this.expected = expected;
    this.received = received;
  }
}

/**
 * The server aborted the transaction because of a conflicting commit.
 * Only a brand-new transaction can succeed.
 */
export class AbortedError extends GraphClientError {
  constructor(options?: { cause?: unknown }) {
    super(ErrorCode.ABORTED, 'Transaction has been aborted. Please retry', options);
    this.name = 'AbortedError';
  }
}

/**
 * The server reported a transient condition (for example an index rebuild in
 * progress). Retried exactly like {@link AbortedError}.
 */
export class RetriableError extends GraphClientError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.RETRIABLE, message, options);
    this.name = 'RetriableError';
  }
}

/**
 * The channel could not reach the server. Not retried automatically.
 */
export class ConnectionError extends GraphClientError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.CONNECTION_ERROR, message, options);
    this.name = 'ConnectionError';
  }
}

/**
 * Login or session refresh could not produce a usable token pair.
 */
export class SessionError extends GraphClientError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.SESSION_ERROR, message, options);
    this.name = 'SessionError';
  }
}

/**
 * Invalid client options, connection string or retry policy.
 */
export class ConfigurationError extends GraphClientError {
  constructor(message: string, options?: { details?: Record<string, unknown> }) {
    super(ErrorCode.CONFIGURATION_ERROR, message, options);
    this.name = 'ConfigurationError';
  }
}

// ============================================================================
// Transport-edge errors
// ============================================================================

/**
 * Classification of a failed remote call, decided once by the stub.
 */
export type RpcErrorKind =
  | 'session-expired'
  | 'aborted'
  | 'retriable'
  | 'connection'
  | 'timeout'
  | 'unknown';

/**
 * A failed remote call, tagged with its {@link RpcErrorKind}.
 */
export class RpcError extends GraphClientError {
  readonly kind: RpcErrorKind;
  readonly method: string;

  constructor(kind: RpcErrorKind, method: string, message: string, options?: { cause?: unknown }) {
    super(ErrorCode.RPC_ERROR, message, { ...options, details: { kind, method } });
    this.name = 'RpcError';
    this.kind = kind;
    this.method = method;
  }
}

/**
 * Phase of the transaction a failure happened in. A commit only distinguishes
 * conflicts; a query or mutation also surfaces transient and connection failures.
 */
export type FailurePhase = 'request' | 'commit' | 'admin';

/**
 * Map a failure from the transport edge into the client taxonomy.
 *
 * Non-{@link RpcError} values are returned unchanged: they were raised locally
 * and already carry their meaning.
 */
export function toClientError(error: unknown, phase: FailurePhase): unknown {
  if (!(error instanceof RpcError)) {
    return error;
  }

  switch (error.kind) {
    case 'aborted':
      return phase === 'admin' ? error : new AbortedError({ cause: error });
    case 'retriable':
      return phase === 'commit' ? error : new RetriableError(error.message, { cause: error });
    case 'connection':
    case 'timeout':
      return phase === 'commit' ? error : new ConnectionError(error.message, { cause: error });
    default:
      return error;
  }
}

/**
 * Whether an error belongs to the conflict class that the retry engine retries.
 */
export function isConflictError(error: unknown): error is AbortedError | RetriableError {
  return error instanceof AbortedError || error instanceof RetriableError;
}

/**
 * Whether an error is a session-expiry signal from the transport edge.
 */
export function isSessionExpired(error: unknown): error is RpcError {
  return error instanceof RpcError && error.kind === 'session-expired';
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function asError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
