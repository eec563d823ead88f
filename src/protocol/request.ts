/**
 * Request and mutation builders
 *
 * Pure functions turning caller input (objects, N-Quads, query text and
 * variables) into the {@link Mutation} and {@link Request} messages sent to the
 * server. Validation failures are caller errors and raise
 * {@link TransactionError}; nothing here touches the network.
 */

import {
  RESPONSE_FORMATS,
  type Mutation,
  type Request,
  type ResponseFormat,
} from '../core/types.js';
import { TransactionError } from '../errors/index.js';

// ============================================================================
// Mutations
// ============================================================================

/**
 * Caller-facing mutation input. Object payloads are JSON-encoded; they cannot
 * be combined with N-Quad payloads in the same mutation.
 */
export interface MutationInput {
  /** A prebuilt mutation to start from; the other fields override it */
  mutation?: Mutation;
  /** Object graph to upsert */
  setObj?: unknown;
  /** Object graph to delete */
  deleteObj?: unknown;
  /** N-Quad statements to add */
  setNquads?: string;
  /** N-Quad statements to delete */
  delNquads?: string;
  /** Guard condition for the mutation */
  cond?: string;
  /** Commit in the same round trip; cannot clear the flag of a supplied mutation */
  commitNow?: boolean;
}

function encodeObject(field: string, value: unknown): string {
  const encoded: string | undefined = JSON.stringify(value);
  if (encoded === undefined) {
    throw new TransactionError(`${field} is not JSON-serializable`, { details: { field } });
  }
  return encoded;
}

/**
 * Build a mutation from caller input.
 *
 * @throws TransactionError if the mutation has no payload, or mixes JSON and N-Quads
 *
 * @example
 * ```typescript
 * createMutation({ setObj: { uid: '_:alice', name: 'Alice' } });
 * // { setJson: '{"uid":"_:alice","name":"Alice"}' }
 * ```
 */
export function createMutation(input: MutationInput): Mutation {
  const mutation: Mutation = { ...input.mutation };

  if (input.setObj !== undefined && input.setObj !== null) {
    mutation.setJson = encodeObject('setObj', input.setObj);
  }
  if (input.deleteObj !== undefined && input.deleteObj !== null) {
    mutation.deleteJson = encodeObject('deleteObj', input.deleteObj);
  }
  if (input.setNquads) {
    mutation.setNquads = input.setNquads;
  }
  if (input.delNquads) {
    mutation.delNquads = input.delNquads;
  }
  if (input.cond) {
    mutation.cond = input.cond;
  }
  if (input.commitNow) {
    mutation.commitNow = true;
  }

  const hasJson = Boolean(mutation.setJson || mutation.deleteJson);
  const hasNquads = Boolean(mutation.setNquads || mutation.delNquads);

  if (hasJson && hasNquads) {
    throw new TransactionError('A mutation cannot combine JSON objects and N-Quads');
  }
  if (!hasJson && !hasNquads) {
    throw new TransactionError('Mutation has no payload');
  }

  return mutation;
}

// ============================================================================
// Requests
// ============================================================================

/**
 * Query variables. Keys and values must be strings; other values are rejected
 * at run time.
 */
export type VariableMap = Readonly<Record<string, unknown>> | ReadonlyMap<unknown, unknown>;

/**
 * Caller-facing request input
 */
export interface RequestInput {
  query?: string;
  variables?: VariableMap;
  mutations?: Mutation[];
  commitNow?: boolean;
  /** `JSON` (default) or `RDF` */
  respFormat?: string;
  readOnly?: boolean;
  bestEffort?: boolean;
  startTs?: number;
  hash?: string;
}

/**
 * Parse a response format selector.
 *
 * @throws TransactionError for anything but `JSON` or `RDF`
 */
export function parseResponseFormat(value: string | undefined): ResponseFormat {
  if (value === undefined) {
    return 'JSON';
  }
  const format = RESPONSE_FORMATS.find((candidate) => candidate === value);
  if (!format) {
    throw new TransactionError('Response format should be either RDF or JSON', {
      details: { respFormat: value },
    });
  }
  return format;
}

/**
 * Validate a variable map and copy it into a plain string record.
 *
 * @throws TransactionError if any key or value is not a string
 */
export function normalizeVariables(variables: VariableMap | undefined): Record<string, string> {
  const vars: Record<string, string> = {};
  if (variables === undefined) {
    return vars;
  }

  const entries: Iterable<[unknown, unknown]> =
    variables instanceof Map ? variables.entries() : Object.entries(variables);

  for (const [key, value] of entries) {
    if (typeof key !== 'string' || typeof value !== 'string') {
      throw new TransactionError('Values and keys in variable map must be strings');
    }
    vars[key] = value;
  }
  return vars;
}

/**
 * Build a request. `startTs` and `hash` default to an unassigned context; the
 * transaction stamps its own values before sending.
 *
 * @throws TransactionError for an unknown response format or a malformed variable map
 */
export function createRequest(input: RequestInput = {}): Request {
  return {
    query: input.query ?? '',
    vars: normalizeVariables(input.variables),
    mutations: input.mutations ? input.mutations.map((mutation) => ({ ...mutation })) : [],
    commitNow: input.commitNow ?? false,
    startTs: input.startTs ?? 0,
    hash: input.hash ?? '',
    readOnly: input.readOnly ?? false,
    bestEffort: input.bestEffort ?? false,
    respFormat: parseResponseFormat(input.respFormat),
  };
}
