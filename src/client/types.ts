/**
 * Client Types
 *
 * This module defines the public types of the transaction client facade.
 */

import type { CallMetadata, Operation, Payload, Session } from '../core/types.js';
import type { RetryOptions } from '../rpc/retry.js';
import type { CallOptions, ClientStub } from '../rpc/types.js';
import type { LoginOptions } from '../session/index.js';
import type { RunTransactionOptions, Transaction, TransactionOptions } from '../txn/index.js';

// ============================================================================
// Client Options
// ============================================================================

/**
 * Options for configuring the client.
 *
 * @example
 * ```typescript
 * const options: ClientOptions = {
 *   endpoints: ['graph-1.internal:8080', 'graph-2.internal:8080'],
 *   bearerToken: 'test-token',
 *   tls: true,
 *   timeoutMs: 10_000,
 *   retry: { maxRetries: 3 },
 * };
 * ```
 */
export interface ClientOptions {
  /**
   * Endpoint addresses: full URLs, or `host:port` pairs that get the scheme
   * selected by `tls` and the default RPC path
   */
  endpoints?: string[];

  /** Prebuilt stubs; used alongside any `endpoints` */
  stubs?: ClientStub[];

  /** API key sent as the `authorization` metadata entry of every call */
  apiKey?: string;

  /** Bearer token sent as `authorization: Bearer <token>`; exclusive with `apiKey` */
  bearerToken?: string;

  /** Use https for `host:port` endpoints (default: false) */
  tls?: boolean;

  /** Default per-call timeout in ms for stubs built from `endpoints` (default: none) */
  timeoutMs?: number;

  /** Default retry policy of {@link GraphClient.runTransaction} */
  retry?: RetryOptions;
}

// ============================================================================
// Client
// ============================================================================

/**
 * Client facade: load-balanced endpoint selection, transaction creation,
 * session handling and administrative calls.
 */
export interface GraphClient {
  /** Stubs the client balances over */
  readonly stubs: readonly ClientStub[];

  /**
   * Open a transaction on a randomly chosen stub.
   *
   * @throws TransactionError if `bestEffort` is set without `readOnly`
   */
  txn(options?: TransactionOptions): Transaction;

  /**
   * Run `fn` with a new transaction and discard it on every exit path.
   * The transaction is left alone if `fn` committed it.
   */
  withTransaction<T>(
    fn: (txn: Transaction) => Promise<T>,
    options?: TransactionOptions
  ): Promise<T>;

  /**
   * Run `fn` against a fresh transaction per attempt, retrying conflicts with
   * the client's retry policy merged with `options`.
   */
  runTransaction<T>(
    fn: (txn: Transaction, attempt: number) => Promise<T>,
    options?: RunTransactionOptions
  ): Promise<T>;

  /** Log in with credentials */
  login(userId: string, password: string, options?: LoginOptions): Promise<Session>;

  /** Log in to a specific namespace */
  loginIntoNamespace(
    userId: string,
    password: string,
    namespace: number,
    options?: CallOptions
  ): Promise<Session>;

  /** Exchange the refresh token for a new token pair (single flight) */
  refreshSession(options?: CallOptions): Promise<Session>;

  /** Apply a schema or drop operation */
  alter(operation: Operation, options?: CallOptions): Promise<Payload>;

  /** The server's version tag */
  checkVersion(options?: CallOptions): Promise<string>;

  /** A uniformly random stub */
  anyStub(): ClientStub;

  /** Metadata with the current access token attached */
  addLoginMetadata(metadata?: CallMetadata): CallMetadata;

  /** A copy of the held token pair, if logged in */
  getSession(): Session | undefined;

  /** Close every stub */
  close(): void;
}
