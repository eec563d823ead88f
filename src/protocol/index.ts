/**
 * Protocol module - pure message builders
 *
 * Exports:
 * - createMutation / createRequest and their input types
 * - Transaction context helpers (emptyContext, mergeContext, abortContext)
 */

export {
  createMutation,
  createRequest,
  normalizeVariables,
  parseResponseFormat,
  type MutationInput,
  type RequestInput,
  type VariableMap,
} from './request.js';

export { emptyContext, cloneContext, mergeContext, abortContext } from './context.js';
