/**
 * Core message types
 *
 * Plain-data shapes exchanged with the server. They are structurally cloneable
 * so they cross the capnweb boundary unchanged; there is no wire encoding here.
 */

// ============================================================================
// Transaction context
// ============================================================================

/**
 * The server's view of a transaction: the snapshot it reads at and the data it
 * has touched. Timestamps are 0 until assigned.
 */
export interface TxnContext {
  /** Snapshot version; assigned by the first response, then fixed */
  startTs: number;
  /** Commit version, only set on the context returned by a commit */
  commitTs: number;
  /** Opaque server hash echoed back on every request */
  hash: string;
  /** Conflict keys written by the transaction */
  keys: string[];
  /** Predicates touched by the transaction */
  preds: string[];
  /** Set when the context is sent to roll the transaction back */
  aborted: boolean;
}

// ============================================================================
// Mutations and requests
// ============================================================================

/**
 * A single mutation. Exactly one representation is used per mutation:
 * JSON (`setJson`/`deleteJson`) or N-Quads (`setNquads`/`delNquads`).
 */
export interface Mutation {
  /** JSON-encoded objects to upsert */
  setJson?: string;
  /** JSON-encoded objects to delete */
  deleteJson?: string;
  /** N-Quad statements to add */
  setNquads?: string;
  /** N-Quad statements to delete */
  delNquads?: string;
  /** Guard condition, e.g. `@if(eq(len(u), 0))` */
  cond?: string;
  /** Commit in the same round trip */
  commitNow?: boolean;
}

/**
 * Response format selector
 */
export type ResponseFormat = 'JSON' | 'RDF';

export const RESPONSE_FORMATS: readonly ResponseFormat[] = ['JSON', 'RDF'];

/**
 * A query and/or mutation request, stamped with the owning transaction's
 * `startTs` and `hash` before it is sent.
 */
export interface Request {
  query: string;
  vars: Record<string, string>;
  mutations: Mutation[];
  commitNow: boolean;
  startTs: number;
  hash: string;
  readOnly: boolean;
  bestEffort: boolean;
  respFormat: ResponseFormat;
}

// ============================================================================
// Responses
// ============================================================================

/**
 * Server-side timing of a request, in nanoseconds
 */
export interface Latency {
  parsingNs: number;
  processingNs: number;
  encodingNs: number;
  assignTimestampNs: number;
  totalNs: number;
}

/**
 * Result of a query or mutation
 */
export interface Response {
  /** Result payload when `respFormat` is JSON */
  json: string;
  /** Result payload when `respFormat` is RDF */
  rdf: string;
  /** Updated transaction context; absent if the server returned none */
  txn?: TxnContext;
  latency: Latency;
  /** Blank-node names mapped to assigned uids */
  uids: Record<string, string>;
  /** Server-side counters, e.g. `num_uids` */
  metrics?: Record<string, Record<string, number>>;
}

// ============================================================================
// Authentication
// ============================================================================

/**
 * Login by credentials, or by refresh token when `refreshToken` is set
 */
export interface LoginRequest {
  userId?: string;
  password?: string;
  namespace?: number;
  refreshToken?: string;
}

/**
 * Token pair returned by a login
 */
export interface LoginResponse {
  accessJwt: string;
  refreshJwt: string;
}

/**
 * The access/refresh token pair held by a client
 */
export interface Session {
  readonly accessToken: string;
  readonly refreshToken: string;
}

// ============================================================================
// Administration
// ============================================================================

/**
 * Drop scopes for {@link Operation.dropOp}
 */
export type DropOp = 'NONE' | 'ALL' | 'DATA' | 'ATTR' | 'TYPE';

/**
 * Schema or drop operation
 */
export interface Operation {
  schema?: string;
  dropAttr?: string;
  dropAll?: boolean;
  dropOp?: DropOp;
  dropValue?: string;
  runInBackground?: boolean;
}

/**
 * Result of an {@link Operation}
 */
export interface Payload {
  data: string;
}

/**
 * Server version
 */
export interface Version {
  tag: string;
}

// ============================================================================
// Call metadata
// ============================================================================

/**
 * Ordered key/value pairs attached to a call (credentials, tracing)
 */
export type CallMetadata = Array<[key: string, value: string]>;
