/**
 * Client facade
 *
 * Builds a {@link GraphClient} over one or more endpoint stubs. Every
 * transaction picks a stub uniformly at random; the session (token pair) is
 * shared by all of them.
 *
 * @example
 * ```typescript
 * import { createGraphClient } from 'graphtxn/client';
 *
 * const client = createGraphClient({ endpoints: ['localhost:8080'] });
 * await client.login('groot', 'password');
 *
 * await client.runTransaction(async (txn) => {
 *   await txn.mutate({ setObj: { uid: '_:alice', name: 'Alice' } });
 *   await txn.commit();
 * });
 *
 * client.close();
 * ```
 */

import type { CallMetadata, Operation, Payload } from '../core/types.js';
import { ConfigurationError, toClientError } from '../errors/index.js';
import { createLogger } from '../observability/index.js';
import { mergeRetryOptions } from '../rpc/retry.js';
import { createHttpBatchStub } from '../rpc/stub.js';
import type { CallOptions, ClientStub } from '../rpc/types.js';
import { SessionManager } from '../session/index.js';
import {
  Transaction,
  runTransaction,
  type RunTransactionOptions,
  type TransactionOptions,
} from '../txn/index.js';
import type { ClientOptions, GraphClient } from './types.js';

const logger = createLogger('client');

// ============================================================================
// Constants
// ============================================================================

/** Path of the RPC endpoint on `host:port` addresses */
export const DEFAULT_RPC_PATH = '/rpc';

const URL_SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;

// ============================================================================
// Private Helpers
// ============================================================================

/**
 * Resolve an endpoint address into the URL a stub connects to.
 * @internal
 */
export function endpointUrl(endpoint: string, tls = false): string {
  if (URL_SCHEME.test(endpoint)) {
    return endpoint;
  }
  return `${tls ? 'https' : 'http'}://${endpoint}${DEFAULT_RPC_PATH}`;
}

/**
 * The static `authorization` entry for an API key or bearer token.
 * @internal
 */
export function authorizationMetadata(apiKey?: string, bearerToken?: string): CallMetadata {
  if (apiKey && bearerToken) {
    throw new ConfigurationError('apiKey and bearerToken cannot both be provided');
  }
  if (apiKey) {
    return [['authorization', apiKey]];
  }
  if (bearerToken) {
    return [['authorization', `Bearer ${bearerToken}`]];
  }
  return [];
}

function buildStubs(options: ClientOptions): ClientStub[] {
  const metadata = authorizationMetadata(options.apiKey, options.bearerToken);
  const fromEndpoints = (options.endpoints ?? []).map((endpoint) =>
    createHttpBatchStub(endpointUrl(endpoint, options.tls), {
      metadata,
      timeoutMs: options.timeoutMs,
    })
  );
  return [...(options.stubs ?? []), ...fromEndpoints];
}

// ============================================================================
// createGraphClient
// ============================================================================

/**
 * Create a client over prebuilt stubs, or over stubs built from options.
 *
 * @throws ConfigurationError if no stub results, or both `apiKey` and `bearerToken` are set
 */
export function createGraphClient(stubsOrOptions: ClientStub[] | ClientOptions): GraphClient {
  const options: ClientOptions = Array.isArray(stubsOrOptions)
    ? { stubs: stubsOrOptions }
    : stubsOrOptions;

  const [first, ...rest] = buildStubs(options);
  if (!first) {
    throw new ConfigurationError('At least one stub or endpoint is required');
  }
  const stubs: [ClientStub, ...ClientStub[]] = [first, ...rest];
  const retryDefaults = options.retry ?? {};

  function anyStub(): ClientStub {
    return stubs[Math.floor(Math.random() * stubs.length)] ?? stubs[0];
  }

  const sessions = new SessionManager((request, callOptions) =>
    anyStub().login(request, callOptions)
  );

  /**
   * Admin calls share the transactions' session handling and failure mapping.
   */
  async function adminCall<T>(
    invoke: (stub: ClientStub, callOptions: CallOptions) => Promise<T>,
    callOptions: CallOptions
  ): Promise<T> {
    const stub = anyStub();
    try {
      return await sessions.call((withSession) => invoke(stub, withSession), callOptions);
    } catch (error) {
      if (callOptions.signal?.aborted) {
        throw error;
      }
      throw toClientError(error, 'admin');
    }
  }

  function txn(txnOptions: TransactionOptions = {}): Transaction {
    return new Transaction(anyStub(), sessions, txnOptions);
  }

  logger.debug('Client created', { endpoints: stubs.map((stub) => stub.endpoint) });

  const client: GraphClient = {
    stubs,

    txn,

    async withTransaction<T>(
      fn: (transaction: Transaction) => Promise<T>,
      txnOptions?: TransactionOptions
    ): Promise<T> {
      const transaction = txn(txnOptions);
      try {
        return await fn(transaction);
      } finally {
        await transaction.discard();
      }
    },

    runTransaction<T>(
      fn: (transaction: Transaction, attempt: number) => Promise<T>,
      runOptions: RunTransactionOptions = {}
    ): Promise<T> {
      return runTransaction(client, fn, {
        ...runOptions,
        ...mergeRetryOptions(retryDefaults, runOptions),
      });
    },

    login: (userId, password, loginOptions) => sessions.login(userId, password, loginOptions),

    loginIntoNamespace: (userId, password, namespace, callOptions) =>
      sessions.loginIntoNamespace(userId, password, namespace, callOptions),

    refreshSession: (callOptions) => sessions.refresh(callOptions),

    alter(operation: Operation, callOptions: CallOptions = {}): Promise<Payload> {
      return adminCall((stub, withSession) => stub.alter(operation, withSession), callOptions);
    },

    async checkVersion(callOptions: CallOptions = {}): Promise<string> {
      const version = await adminCall(
        (stub, withSession) => stub.checkVersion(withSession),
        callOptions
      );
      return version.tag;
    },

    anyStub,

    addLoginMetadata: (metadata) => sessions.attachMetadata(metadata),

    getSession: () => sessions.getSession(),

    close() {
      for (const stub of stubs) {
        stub.close();
      }
      logger.debug('Client closed', { stubs: stubs.length });
    },
  };

  return client;
}
