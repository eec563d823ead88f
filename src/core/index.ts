/**
 * Core module exports
 *
 * Re-exports message shapes, the transaction mutex and JSON-to-graph
 * extraction from:
 * - types.ts: contexts, mutations, requests, responses, sessions
 * - mutex.ts: non-reentrant async mutex
 * - json-conversion.ts: node/edge extraction from query results
 *
 * @packageDocumentation
 */

export {
  RESPONSE_FORMATS,
  type TxnContext,
  type Mutation,
  type ResponseFormat,
  type Request,
  type Latency,
  type Response,
  type LoginRequest,
  type LoginResponse,
  type Session,
  type DropOp,
  type Operation,
  type Payload,
  type Version,
  type CallMetadata,
} from './types.js';

export { Mutex, type ReleaseFn } from './mutex.js';

export {
  extractGraph,
  type ExtractedGraph,
  type GraphEdge,
  type NodeProperties,
} from './json-conversion.js';
