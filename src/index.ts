/**
 * graphtxn - Transactional client for a distributed graph database
 *
 * Architecture:
 * - Client facade: load-balanced stubs, session handling, admin calls
 * - Transactions: optimistic concurrency, one lock per transaction
 * - Retry engine: exponential backoff with jitter for conflicts
 * - RPC: capnweb stubs (HTTP batch, MessagePort), errors classified at the edge
 */

// ============================================================================
// Client exports
// ============================================================================

/**
 * Create a client over stubs or endpoint options.
 * @see {@link ClientOptions} for configuration options
 */
export { createGraphClient } from './client/index.js';

/**
 * Create a client from a `graph://` connection string, logging in when it
 * carries credentials.
 */
export { openGraphClient, parseConnectionString } from './client/index.js';

/**
 * Build client options (and the log level) from environment variables.
 */
export {
  loadClientOptionsFromEnv,
  loadLogLevelFromEnv,
  configureFromEnv,
} from './client/index.js';
export type {
  ClientOptions,
  GraphClient,
  ConnectionSettings,
  OpenOptions,
  SslMode,
  GraphEnv,
} from './client/index.js';

// ============================================================================
// Transaction exports
// ============================================================================

/**
 * A single optimistic-concurrency transaction.
 */
export { Transaction, runTransaction } from './txn/index.js';
export type {
  TransactionState,
  TransactionOptions,
  QueryOptions,
  MutateOptions,
  RunTransactionOptions,
  TransactionFactory,
} from './txn/index.js';

// ============================================================================
// Retry exports
// ============================================================================

export {
  withRetry,
  retryable,
  retryAttempts,
  RetryAttempt,
  calculateRetryDelay,
  validateRetryConfig,
  DEFAULT_RETRY_CONFIG,
} from './rpc/index.js';
export type { RetryConfig, RetryOptions } from './rpc/index.js';

// ============================================================================
// RPC exports
// ============================================================================

export {
  createHttpBatchStub,
  createMessagePortStub,
  createLocalStub,
  classifyRpcError,
} from './rpc/index.js';
export type {
  GraphRpcApi,
  GraphRpcConnection,
  ClientStub,
  CallOptions,
  RpcMethodName,
  StubOptions,
} from './rpc/index.js';

// ============================================================================
// Session and protocol exports
// ============================================================================

export { SessionManager } from './session/index.js';
export type { LoginFn, LoginOptions } from './session/index.js';

export {
  createMutation,
  createRequest,
  emptyContext,
  mergeContext,
  abortContext,
} from './protocol/index.js';
export type { MutationInput, RequestInput, VariableMap } from './protocol/index.js';

// ============================================================================
// Core exports
// ============================================================================

export { extractGraph, Mutex } from './core/index.js';
export type {
  TxnContext,
  Mutation,
  Request,
  Response,
  ResponseFormat,
  Latency,
  LoginRequest,
  LoginResponse,
  Session,
  Operation,
  DropOp,
  Payload,
  Version,
  CallMetadata,
  ExtractedGraph,
  GraphEdge,
  NodeProperties,
} from './core/index.js';

// ============================================================================
// Error exports
// ============================================================================

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
} from './errors/index.js';
export type { ErrorCodeType, RpcErrorKind, FailurePhase } from './errors/index.js';

// ============================================================================
// Logging exports
// ============================================================================

export { createLogger, configureLogging, resetLogging, getLogConfig } from './observability/index.js';
export type { Logger, LogLevel, LogConfig, LogSink } from './observability/index.js';
