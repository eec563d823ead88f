/**
 * Error Module Exports
 */

export {
  ErrorCode,
  GraphClientError,
  TransactionError,
  StartTsMismatchError,
  AbortedError,
  RetriableError,
  ConnectionError,
  SessionError,
  ConfigurationError,
  RpcError,
  toClientError,
  isConflictError,
  isSessionExpired,
  asError,
  type ErrorCodeType,
  type ClientErrorJson,
  type RpcErrorKind,
  type FailurePhase,
} from './client-error.js';
