/**
 * Endpoint stubs
 *
 * A {@link ClientStub} wraps one server endpoint reached over capnweb. The
 * stub owns the concerns of a single call: per-call timeout, cancellation,
 * static metadata (API key or bearer token) and the one-time classification of
 * failures into {@link RpcError}s.
 *
 * @example
 * ```typescript
 * // Over HTTP, one capnweb batch per call
 * const stub = createHttpBatchStub('http://localhost:8080/rpc', {
 *   metadata: [['authorization', 'Bearer test-token']],
 *   timeoutMs: 10_000,
 * });
 *
 * // In process, e.g. to a worker thread
 * const { port1 } = new MessageChannel();
 * const local = createMessagePortStub(port1);
 * ```
 *
 * @module rpc/stub
 */

import { newHttpBatchRpcSession, newMessagePortRpcSession } from 'capnweb';
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
import { RpcError } from '../errors/index.js';
import { createLogger } from '../observability/index.js';
import { classifyRpcError } from './classify.js';
import type { CallOptions, ClientStub, GraphRpcApi, RpcMethodName } from './types.js';

const logger = createLogger('rpc');

/**
 * The remote API as seen through a capnweb session (or a local object):
 * every method returns something awaitable.
 */
export type GraphRpcConnection = {
  [K in RpcMethodName]: (
    ...args: Parameters<GraphRpcApi[K]>
  ) => PromiseLike<Awaited<ReturnType<GraphRpcApi[K]>>>;
};

/**
 * Options shared by all stub factories
 */
export interface StubOptions {
  /** Metadata appended to every call, e.g. an `authorization` entry */
  metadata?: CallMetadata;
  /** Default per-call timeout in milliseconds (default: none) */
  timeoutMs?: number;
}

// ============================================================================
// Call settlement
// ============================================================================

/**
 * Start a call and settle it with the first of: its result, the timeout, or
 * the abort signal.
 */
function settle<T>(
  start: () => PromiseLike<T>,
  method: RpcMethodName,
  timeoutMs: number | undefined,
  signal: AbortSignal | undefined
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    let timer: ReturnType<typeof setTimeout> | undefined;

    const cleanup = (): void => {
      if (timer !== undefined) {
        clearTimeout(timer);
      }
      signal?.removeEventListener('abort', onAbort);
    };

    function onAbort(): void {
      cleanup();
      reject(signal?.reason);
    }

    if (timeoutMs !== undefined) {
      timer = setTimeout(() => {
        cleanup();
        reject(new RpcError('timeout', method, `${method} timed out after ${timeoutMs}ms`));
      }, timeoutMs);
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    let pending: PromiseLike<T>;
    try {
      pending = start();
    } catch (error) {
      cleanup();
      reject(error);
      return;
    }

    pending.then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (error: unknown) => {
        cleanup();
        reject(error);
      }
    );
  });
}

// ============================================================================
// Stub implementation
// ============================================================================

class CapnwebClientStub implements ClientStub {
  private closed = false;

  constructor(
    readonly endpoint: string,
    private readonly connect: () => GraphRpcConnection,
    private readonly options: StubOptions,
    private readonly release?: () => void
  ) {}

  login(request: LoginRequest, options: CallOptions = {}): Promise<LoginResponse> {
    return this.call('login', options, (api, metadata) => api.login(request, metadata));
  }

  query(request: Request, options: CallOptions = {}): Promise<Response> {
    return this.call('query', options, (api, metadata) => api.query(request, metadata));
  }

  commitOrAbort(context: TxnContext, options: CallOptions = {}): Promise<TxnContext> {
    return this.call('commitOrAbort', options, (api, metadata) =>
      api.commitOrAbort(context, metadata)
    );
  }

  alter(operation: Operation, options: CallOptions = {}): Promise<Payload> {
    return this.call('alter', options, (api, metadata) => api.alter(operation, metadata));
  }

  checkVersion(options: CallOptions = {}): Promise<Version> {
    return this.call('checkVersion', options, (api, metadata) => api.checkVersion(metadata));
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.release?.();
    logger.debug('Stub closed', { endpoint: this.endpoint });
  }

  private async call<T>(
    method: RpcMethodName,
    options: CallOptions,
    invoke: (api: GraphRpcConnection, metadata: CallMetadata) => PromiseLike<T>
  ): Promise<T> {
    const { signal } = options;
    if (signal?.aborted) {
      throw signal.reason;
    }
    if (this.closed) {
      throw new RpcError('connection', method, `Stub for ${this.endpoint} is closed`);
    }

    const metadata: CallMetadata = [...(options.metadata ?? []), ...(this.options.metadata ?? [])];
    const timeoutMs = options.timeoutMs ?? this.options.timeoutMs;

    logger.debug('Calling remote method', { method, endpoint: this.endpoint, timeoutMs });

    try {
      return await settle(() => invoke(this.connect(), metadata), method, timeoutMs, signal);
    } catch (error) {
      if (signal?.aborted) {
        throw signal.reason;
      }
      const rpcError = classifyRpcError(error, method);
      logger.debug('Remote call failed', {
        method,
        endpoint: this.endpoint,
        kind: rpcError.kind,
        error: rpcError.message,
      });
      throw rpcError;
    }
  }
}

// ============================================================================
// Factories
// ============================================================================

/**
 * Stub over capnweb HTTP batching. Each call runs in its own batch session, so
 * the stub holds no connection between calls.
 */
export function createHttpBatchStub(url: string, options: StubOptions = {}): ClientStub {
  return new CapnwebClientStub(url, () => newHttpBatchRpcSession<GraphRpcApi>(url), options);
}

/**
 * Stub over a MessagePort (worker thread or in-process channel). Closing the
 * stub closes the port.
 */
export function createMessagePortStub(
  port: MessagePort,
  options: StubOptions & { endpoint?: string } = {}
): ClientStub {
  const session = newMessagePortRpcSession<GraphRpcApi>(port);
  return new CapnwebClientStub(
    options.endpoint ?? 'message-port',
    () => session,
    options,
    () => port.close()
  );
}

/**
 * Stub calling a local implementation of the remote API directly, with the
 * same timeout, cancellation and classification as a remote stub.
 */
export function createLocalStub(
  api: GraphRpcConnection,
  options: StubOptions & { endpoint?: string } = {}
): ClientStub {
  return new CapnwebClientStub(options.endpoint ?? 'local', () => api, options);
}
