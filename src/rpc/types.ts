/**
 * RPC Types for the transaction client
 *
 * Defines the remote API exposed by a graph server over capnweb and the
 * {@link ClientStub} wrapper the rest of the client talks to.
 *
 * This module provides:
 * - The remote interface (`GraphRpcApi`) and its method names
 * - Per-call options (timeout, metadata, cancellation)
 * - The endpoint stub contract
 */

import type {
  CallMetadata,
  LoginRequest,
  LoginResponse,
  Operation,
  Payload,
  Request,
  Response,
  TxnContext,
  Version,
} from '../core/types.js';

// ============================================================================
// Remote API
// ============================================================================

/**
 * GraphRpcApi is the capnweb interface a graph server exposes.
 *
 * Every method takes the call metadata (credentials, tracing) as its last
 * argument. Errors raised by the server reach the client as rejected calls
 * whose message carries the server's reason.
 *
 * @example
 * ```typescript
 * import { newHttpBatchRpcSession } from 'capnweb';
 *
 * const api = newHttpBatchRpcSession<GraphRpcApi>('https://graph.example.com/rpc');
 * const response = await api.query(request, [['accessjwt', token]]);
 * ```
 */
export interface GraphRpcApi {
  /** Exchange credentials or a refresh token for a token pair */
  login(request: LoginRequest, metadata: CallMetadata): Promise<LoginResponse>;
  /** Run a query and/or mutations inside a transaction */
  query(request: Request, metadata: CallMetadata): Promise<Response>;
  /** Commit the context, or roll it back when `aborted` is set */
  commitOrAbort(context: TxnContext, metadata: CallMetadata): Promise<TxnContext>;
  /** Apply a schema or drop operation */
  alter(operation: Operation, metadata: CallMetadata): Promise<Payload>;
  /** Report the server version */
  checkVersion(metadata: CallMetadata): Promise<Version>;
}

/**
 * Valid RPC method names
 */
export type RpcMethodName = keyof GraphRpcApi;

export const RPC_METHODS: readonly RpcMethodName[] = [
  'login',
  'query',
  'commitOrAbort',
  'alter',
  'checkVersion',
];

// ============================================================================
// Call options
// ============================================================================

/**
 * Options accepted by every remote operation
 */
export interface CallOptions {
  /** Fail the call with a `timeout` error after this many milliseconds */
  timeoutMs?: number;
  /** Extra metadata entries sent with the call */
  metadata?: CallMetadata;
  /** Cancels the call; the operation rejects with the signal's reason */
  signal?: AbortSignal;
}

// ============================================================================
// Endpoint stub
// ============================================================================

/**
 * One server endpoint. Failures are rejected as `RpcError`s carrying a
 * classified kind, except cancellation, which rejects with the signal's reason.
 *
 * Stubs hold no per-transaction state and are shared by every transaction of
 * a client.
 */
export interface ClientStub {
  /** Human-readable endpoint address, for logs */
  readonly endpoint: string;

  login(request: LoginRequest, options?: CallOptions): Promise<LoginResponse>;
  query(request: Request, options?: CallOptions): Promise<Response>;
  commitOrAbort(context: TxnContext, options?: CallOptions): Promise<TxnContext>;
  alter(operation: Operation, options?: CallOptions): Promise<Payload>;
  checkVersion(options?: CallOptions): Promise<Version>;

  /** Release the underlying channel; further calls fail with a connection error */
  close(): void;
}
