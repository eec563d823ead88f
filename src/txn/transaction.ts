/**
 * Transaction state machine
 *
 * One instance per logical transaction: `active` until it is committed or
 * discarded, after which every further operation fails. Request dispatch,
 * commit and discard run under a per-transaction, non-reentrant lock; the
 * error path inside dispatch cleans up through {@link Transaction.lockedDiscard},
 * never through the public, lock-acquiring {@link Transaction.discard}.
 *
 * @example
 * ```typescript
 * const txn = client.txn();
 * try {
 *   const response = await txn.query('query q($name: string) { people(func: eq(name, $name)) { uid } }', {
 *     variables: { $name: 'Alice' },
 *   });
 *   await txn.mutate({ setObj: { uid: '_:alice', name: 'Alice' } });
 *   await txn.commit();
 * } finally {
 *   await txn.discard();
 * }
 * ```
 */

import { Mutex } from '../core/mutex.js';
import type { Request, Response, TxnContext } from '../core/types.js';
import { TransactionError, asError, toClientError } from '../errors/index.js';
import { createLogger } from '../observability/index.js';
import {
  abortContext,
  cloneContext,
  createMutation,
  createRequest,
  emptyContext,
  mergeContext,
  type MutationInput,
  type VariableMap,
} from '../protocol/index.js';
import type { CallOptions, ClientStub } from '../rpc/types.js';
import type { SessionManager } from '../session/index.js';

const logger = createLogger('txn');

// ============================================================================
// Types
// ============================================================================

export type TransactionState = 'active' | 'committed' | 'discarded';

/**
 * Construction options
 */
export interface TransactionOptions {
  /** Reject mutations and commits (default: false) */
  readOnly?: boolean;
  /** Allow a possibly stale snapshot; read-only transactions only (default: false) */
  bestEffort?: boolean;
}

/**
 * Options for {@link Transaction.query}
 */
export interface QueryOptions extends CallOptions {
  variables?: VariableMap;
  /** `JSON` (default) or `RDF` */
  respFormat?: string;
}

/**
 * Input for {@link Transaction.mutate}: a mutation payload plus call options
 */
export interface MutateOptions extends MutationInput, CallOptions {}

const FINISHED_MESSAGE = 'Transaction has already been committed or discarded';

function wasCancelled(signal: AbortSignal | undefined): boolean {
  return signal?.aborted === true;
}

// ============================================================================
// Transaction
// ============================================================================

export class Transaction {
  readonly readOnly: boolean;
  readonly bestEffort: boolean;

  private state: TransactionState = 'active';
  private mutated = false;
  private context: TxnContext = emptyContext();
  private readonly lock = new Mutex();

  /**
   * @throws TransactionError if `bestEffort` is set on a read-write transaction
   */
  constructor(
    private readonly stub: ClientStub,
    private readonly sessions: SessionManager,
    options: TransactionOptions = {}
  ) {
    this.readOnly = options.readOnly ?? false;
    this.bestEffort = options.bestEffort ?? false;
    if (this.bestEffort && !this.readOnly) {
      throw new TransactionError(
        'Best effort transactions are only compatible with read-only transactions'
      );
    }
  }

  // --------------------------------------------------------------------------
  // Accessors
  // --------------------------------------------------------------------------

  getState(): TransactionState {
    return this.state;
  }

  isFinished(): boolean {
    return this.state !== 'active';
  }

  /**
   * Whether a mutation has been dispatched
   */
  hasPendingWrites(): boolean {
    return this.mutated;
  }

  /**
   * A copy of the accumulated context
   */
  getContext(): TxnContext {
    return cloneContext(this.context);
  }

  /**
   * Whether an operation currently holds the transaction lock
   */
  isBusy(): boolean {
    return this.lock.isLocked();
  }

  // --------------------------------------------------------------------------
  // Operations
  // --------------------------------------------------------------------------

  /**
   * Run a query. Never marks the transaction as having pending writes.
   *
   * @throws TransactionError for a malformed variable map or response format
   */
  async query(text: string, options: QueryOptions = {}): Promise<Response> {
    const { variables, respFormat, ...callOptions } = options;
    const request = createRequest({
      query: text,
      variables,
      respFormat,
      readOnly: this.readOnly,
      bestEffort: this.bestEffort,
    });
    return this.doRequest(request, callOptions);
  }

  async queryWithVars(
    text: string,
    variables: VariableMap,
    options: CallOptions = {}
  ): Promise<Response> {
    return this.query(text, { ...options, variables });
  }

  /**
   * Send a single mutation. With `commitNow` (here or on the supplied
   * mutation) the transaction commits in the same round trip.
   */
  async mutate(input: MutateOptions): Promise<Response> {
    const { timeoutMs, metadata, signal, ...payload } = input;
    const mutation = createMutation(payload);
    const request = createRequest({
      mutations: [mutation],
      commitNow: Boolean(payload.commitNow || mutation.commitNow),
      readOnly: this.readOnly,
      bestEffort: this.bestEffort,
    });
    return this.doRequest(request, { timeoutMs, metadata, signal });
  }

  /**
   * Dispatch a request built by the caller (several mutations, upsert blocks).
   *
   * The request is stamped with this transaction's start timestamp, hash and
   * read-only/best-effort flags. On failure the transaction is discarded and
   * the failure is raised as an `AbortedError`, `RetriableError` or
   * `ConnectionError` where it classifies as one.
   */
  async doRequest(request: Request, options: CallOptions = {}): Promise<Response> {
    const release = await this.lock.acquire(options.signal);
    try {
      if (this.isFinished()) {
        throw new TransactionError(FINISHED_MESSAGE);
      }

      if (request.mutations.length > 0) {
        if (this.readOnly) {
          throw new TransactionError('Readonly transaction cannot run mutations');
        }
        this.mutated = true;
      }

      const stamped: Request = {
        ...request,
        startTs: this.context.startTs,
        hash: this.context.hash,
        readOnly: this.readOnly,
        bestEffort: this.bestEffort,
      };

      let response: Response;
      try {
        response = await this.sessions.call(
          (callOptions) => this.stub.query(stamped, callOptions),
          options
        );
      } catch (error) {
        if (wasCancelled(options.signal)) {
          throw error;
        }
        await this.lockedDiscard(options);
        throw toClientError(error, 'request');
      }

      if (stamped.commitNow) {
        this.state = 'committed';
      }
      this.context = mergeContext(this.context, response.txn);
      return response;
    } finally {
      release();
    }
  }

  /**
   * Commit the transaction. Without pending writes no RPC is made and the
   * result is `null`. The transaction is finished whatever the outcome.
   *
   * @throws TransactionError if the transaction is read-only or already finished
   * @throws AbortedError if the server rejected the commit because of a conflict
   */
  async commit(options: CallOptions = {}): Promise<TxnContext | null> {
    const release = await this.lock.acquire(options.signal);
    try {
      if (this.readOnly) {
        throw new TransactionError('Readonly transaction cannot run mutations or be committed');
      }
      if (this.isFinished()) {
        throw new TransactionError(FINISHED_MESSAGE);
      }

      this.state = 'committed';
      if (!this.mutated) {
        return null;
      }

      const context = cloneContext(this.context);
      try {
        const committed = await this.sessions.call(
          (callOptions) => this.stub.commitOrAbort(context, callOptions),
          options
        );
        this.context = { ...this.context, commitTs: committed.commitTs };
        logger.debug('Transaction committed', {
          startTs: committed.startTs,
          commitTs: committed.commitTs,
        });
        return committed;
      } catch (error) {
        this.state = 'discarded';
        if (wasCancelled(options.signal)) {
          throw error;
        }
        throw toClientError(error, 'commit');
      }
    } finally {
      release();
    }
  }

  /**
   * Roll the transaction back. Safe to call any number of times, and after a
   * commit. Without pending writes no RPC is made; a failing rollback RPC is
   * logged and ignored.
   */
  async discard(options: CallOptions = {}): Promise<void> {
    const release = await this.lock.acquire(options.signal);
    try {
      await this.lockedDiscard(options);
    } finally {
      release();
    }
  }

  /**
   * Discard while the caller already holds the lock.
   */
  private async lockedDiscard(options: CallOptions): Promise<void> {
    if (this.isFinished()) {
      return;
    }
    this.state = 'discarded';
    if (!this.mutated) {
      return;
    }

    this.context = abortContext(this.context);
    const context = cloneContext(this.context);
    try {
      await this.sessions.call(
        (callOptions) => this.stub.commitOrAbort(context, callOptions),
        options
      );
      logger.debug('Transaction discarded', { startTs: context.startTs });
    } catch (error) {
      if (wasCancelled(options.signal)) {
        throw error;
      }
      logger.debug('Discard failed', { startTs: context.startTs, error: asError(error) });
    }
  }
}
