/**
 * Transport-edge error classification
 *
 * A failed remote call is classified exactly once, here, into an
 * {@link RpcError} with a {@link RpcErrorKind}. Callers above the stub branch
 * on the kind and never inspect error text.
 *
 * @module rpc/classify
 */

import { RpcError, type RpcErrorKind } from '../errors/index.js';

/**
 * Message patterns per kind, checked in order. `aborted` comes before
 * `retriable` because a conflict message also asks the caller to retry.
 */
const ERROR_PATTERNS: ReadonlyArray<readonly [RpcErrorKind, readonly RegExp[]]> = [
  ['session-expired', [/token is expired/i, /access token has expired/i]],
  ['aborted', [/transaction has been aborted/i, /\bcode = Aborted\b/]],
  [
    'retriable',
    [/please retry/i, /in progress/i, /not ready to accept requests/i, /try again/i],
  ],
  [
    'connection',
    [
      // Network errors
      /network/i,
      /connection refused/i,
      /connection reset/i,
      /connection closed/i,
      /socket hang up/i,
      /ECONNRESET/,
      /ECONNREFUSED/,
      /ENOTFOUND/,
      /ENETUNREACH/,
      /EAI_AGAIN/,
      /fetch failed/i,
      /failed to fetch/i,

      // Server unavailable
      /unavailable/i,
      /\b(?:HTTP(?:\/\d(?:\.\d)?)?|status(?: code)?)[ :]*(?:502|503|504)\b/i,

      // Channel errors
      /not connected/i,
      /port closed/i,
    ],
  ],
  ['timeout', [/timed out/i, /deadline exceeded/i, /ETIMEDOUT/]],
];

const CONNECTION_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ENOTFOUND',
  'ENETUNREACH',
  'EAI_AGAIN',
  'EPIPE',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/** `AbortSignal.timeout()` rejects with a DOMException named `TimeoutError`. */
function isTimeoutError(error: unknown): boolean {
  return (
    typeof error === 'object' && error !== null && 'name' in error && error.name === 'TimeoutError'
  );
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Determine the kind of a failed call from its message, then from the
 * system error code of the error or its cause (Node's fetch wraps socket
 * errors as `TypeError('fetch failed', { cause })`).
 */
export function classifyErrorKind(error: unknown): RpcErrorKind {
  if (error instanceof RpcError) {
    return error.kind;
  }

  if (isTimeoutError(error)) {
    return 'timeout';
  }

  const message = messageOf(error);
  for (const [kind, patterns] of ERROR_PATTERNS) {
    if (patterns.some((pattern) => pattern.test(message))) {
      return kind;
    }
  }

  const cause = error instanceof Error ? error.cause : undefined;
  for (const candidate of [error, cause]) {
    const code = errorCode(candidate);
    if (code === 'ETIMEDOUT') {
      return 'timeout';
    }
    if (code !== undefined && CONNECTION_ERROR_CODES.has(code)) {
      return 'connection';
    }
  }

  return 'unknown';
}

/**
 * Wrap a failed call into an {@link RpcError}. An `RpcError` is returned as is.
 *
 * @param error - The rejection reason of the remote call
 * @param method - The remote method that failed
 */
export function classifyRpcError(error: unknown, method: string): RpcError {
  if (error instanceof RpcError) {
    return error;
  }
  return new RpcError(classifyErrorKind(error), method, messageOf(error), { cause: error });
}
