/**
 * RPC module - capnweb transport and retry utilities
 *
 * Exports:
 * - GraphRpcApi remote interface and ClientStub contract
 * - capnweb-backed stub factories (HTTP batch, MessagePort, local)
 * - Transport-edge error classification
 * - Retry utilities with exponential backoff for conflict-class failures
 */

// Re-export all types
export type { GraphRpcApi, RpcMethodName, CallOptions, ClientStub } from './types.js';
export { RPC_METHODS } from './types.js';

// Stubs
export {
  createHttpBatchStub,
  createMessagePortStub,
  createLocalStub,
  type GraphRpcConnection,
  type StubOptions,
} from './stub.js';

// Classification
export { classifyRpcError, classifyErrorKind } from './classify.js';

// Re-export retry types and utilities
export type { RetryConfig, RetryOptions } from './retry.js';

export {
  DEFAULT_RETRY_CONFIG,
  RetryAttempt,
  validateRetryConfig,
  mergeRetryOptions,
  calculateRetryDelay,
  sleep,
  withRetry,
  retryable,
  retryAttempts,
} from './retry.js';
