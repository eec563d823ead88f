/**
 * Transaction context merging
 *
 * The server returns an updated {@link TxnContext} with every response. These
 * helpers fold it into the transaction's accumulated context without mutating
 * either input.
 */

import type { TxnContext } from '../core/types.js';
import { StartTsMismatchError } from '../errors/index.js';

/**
 * A context with no start timestamp assigned yet
 */
export function emptyContext(): TxnContext {
  return {
    startTs: 0,
    commitTs: 0,
    hash: '',
    keys: [],
    preds: [],
    aborted: false,
  };
}

export function cloneContext(context: TxnContext): TxnContext {
  return { ...context, keys: [...context.keys], preds: [...context.preds] };
}

function appendUnique(current: readonly string[], additions: readonly string[]): string[] {
  const seen = new Set(current);
  const merged = [...current];
  for (const value of additions) {
    if (!seen.has(value)) {
      seen.add(value);
      merged.push(value);
    }
  }
  return merged;
}

/**
 * Merge a server-returned context into the current one.
 *
 * The first context with a start timestamp assigns it; after that it must
 * never change. `hash` takes the latest value, `keys` and `preds` accumulate.
 * A missing update returns a copy of `current`.
 *
 * @throws StartTsMismatchError if `update` carries a different start timestamp
 */
export function mergeContext(current: TxnContext, update: TxnContext | undefined): TxnContext {
  if (!update) {
    return cloneContext(current);
  }

  if (current.startTs !== 0 && current.startTs !== update.startTs) {
    throw new StartTsMismatchError(current.startTs, update.startTs);
  }

  return {
    startTs: current.startTs === 0 ? update.startTs : current.startTs,
    commitTs: current.commitTs,
    hash: update.hash,
    keys: appendUnique(current.keys, update.keys),
    preds: appendUnique(current.preds, update.preds),
    aborted: current.aborted,
  };
}

/**
 * The context to send when rolling a transaction back
 */
export function abortContext(context: TxnContext): TxnContext {
  return { ...cloneContext(context), aborted: true };
}
