/**
 * Session module exports
 */

export {
  SessionManager,
  ACCESS_TOKEN_METADATA_KEY,
  type LoginFn,
  type LoginOptions,
} from './session-manager.js';
