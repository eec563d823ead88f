/**
 * Session/credential manager
 *
 * Owns the access/refresh token pair of a client. A pair is only ever replaced
 * wholesale; refreshes are single-flight, so concurrent transactions that all
 * hit an expired token share one refresh round trip.
 *
 * @example
 * ```typescript
 * const sessions = new SessionManager((request, options) => stub.login(request, options));
 * await sessions.login('groot', 'password');
 * const metadata = sessions.attachMetadata([['trace-id', 'abc']]);
 * // [['accessjwt', '<token>'], ['trace-id', 'abc']]
 * ```
 */

import type { CallMetadata, LoginRequest, LoginResponse, Session } from '../core/types.js';
import { SessionError, isSessionExpired } from '../errors/index.js';
import { createLogger } from '../observability/index.js';
import type { CallOptions } from '../rpc/types.js';

const logger = createLogger('session');

/**
 * Metadata key carrying the access token
 */
export const ACCESS_TOKEN_METADATA_KEY = 'accessjwt';

/**
 * Performs the login round trip, e.g. against any stub of the client
 */
export type LoginFn = (request: LoginRequest, options?: CallOptions) => Promise<LoginResponse>;

/**
 * Options for a credential login
 */
export interface LoginOptions extends CallOptions {
  /** Namespace to log into (default: the server's default namespace) */
  namespace?: number;
}

export class SessionManager {
  private session: Session | undefined;
  private inflightRefresh: Promise<Session> | null = null;

  constructor(private readonly loginFn: LoginFn) {}

  /**
   * Log in with credentials, replacing any held token pair.
   */
  async login(userId: string, password: string, options: LoginOptions = {}): Promise<Session> {
    const { namespace, ...callOptions } = options;
    const request: LoginRequest = { userId, password };
    if (namespace !== undefined) {
      request.namespace = namespace;
    }

    const response = await this.loginFn(request, callOptions);
    const session = this.install(response);
    logger.info('Logged in', { userId, namespace });
    return session;
  }

  /**
   * Log in to a specific namespace.
   */
  loginIntoNamespace(
    userId: string,
    password: string,
    namespace: number,
    options: CallOptions = {}
  ): Promise<Session> {
    return this.login(userId, password, { ...options, namespace });
  }

  /**
   * Exchange the held refresh token for a new pair.
   *
   * Concurrent callers share the in-flight refresh.
   *
   * @throws SessionError if no refresh token is held or the response carries no access token
   */
  refresh(options: CallOptions = {}): Promise<Session> {
    if (this.inflightRefresh) {
      logger.debug('Joining in-flight session refresh');
      return this.inflightRefresh;
    }

    const refreshToken = this.session?.refreshToken;
    if (!refreshToken) {
      return Promise.reject(new SessionError('Cannot refresh session: no refresh token is held'));
    }

    logger.debug('Refreshing session');
    const pending = this.loginFn({ refreshToken }, options)
      .then((response) => this.install(response))
      .finally(() => {
        this.inflightRefresh = null;
      });
    this.inflightRefresh = pending;
    return pending;
  }

  /**
   * Metadata for an outgoing call: the access token entry first (when a
   * session is held), then the caller's entries minus any caller-supplied
   * access token.
   */
  attachMetadata(metadata: CallMetadata = []): CallMetadata {
    const callerEntries = metadata.filter(
      ([key]) => key.toLowerCase() !== ACCESS_TOKEN_METADATA_KEY
    );
    if (!this.session) {
      return callerEntries;
    }
    return [[ACCESS_TOKEN_METADATA_KEY, this.session.accessToken], ...callerEntries];
  }

  /**
   * Run a remote call with session metadata attached. If the server reports
   * an expired access token, refresh once and resend once; a failure of the
   * resend is final.
   *
   * @example
   * ```typescript
   * const version = await sessions.call((options) => stub.checkVersion(options), { timeoutMs: 500 });
   * ```
   */
  async call<T>(invoke: (options: CallOptions) => Promise<T>, options: CallOptions = {}): Promise<T> {
    try {
      return await invoke(this.withMetadata(options));
    } catch (error) {
      if (!isSessionExpired(error)) {
        throw error;
      }
      logger.debug('Access token expired, refreshing session', { method: error.method });
      await this.refresh({ timeoutMs: options.timeoutMs });
      return invoke(this.withMetadata(options));
    }
  }

  getSession(): Session | undefined {
    return this.session ? { ...this.session } : undefined;
  }

  hasSession(): boolean {
    return this.session !== undefined;
  }

  /**
   * Forget the held token pair.
   */
  clear(): void {
    this.session = undefined;
  }

  private withMetadata(options: CallOptions): CallOptions {
    return { ...options, metadata: this.attachMetadata(options.metadata) };
  }

  private install(response: LoginResponse): Session {
    if (!response.accessJwt) {
      throw new SessionError('Login response did not contain an access token');
    }
    const session: Session = {
      accessToken: response.accessJwt,
      refreshToken: response.refreshJwt,
    };
    this.session = session;
    return { ...session };
  }
}
