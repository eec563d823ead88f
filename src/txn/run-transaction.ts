/**
 * Run a unit of work against a fresh transaction per attempt, retrying
 * conflict-class failures with exponential backoff.
 */

import { withRetry, type RetryOptions } from '../rpc/retry.js';
import type { Transaction, TransactionOptions } from './transaction.js';

/**
 * Anything that can open transactions, typically the client
 */
export interface TransactionFactory {
  txn(options?: TransactionOptions): Transaction;
}

export interface RunTransactionOptions extends TransactionOptions, RetryOptions {}

/**
 * Open a transaction, run `operation` on it, and discard it afterwards;
 * repeat with a new transaction while the attempt fails with a conflict.
 * The operation must commit itself.
 *
 * @throws ConfigurationError for an invalid retry policy, before any attempt
 * @throws The last conflict error once every attempt has failed
 *
 * @example
 * ```typescript
 * const uid = await runTransaction(client, async (txn) => {
 *   const response = await txn.mutate({ setObj: { uid: '_:a', name: 'Alice' } });
 *   await txn.commit();
 *   return response.uids['a'];
 * }, { maxRetries: 3 });
 * ```
 */
export function runTransaction<T>(
  factory: TransactionFactory,
  operation: (txn: Transaction, attempt: number) => Promise<T>,
  options: RunTransactionOptions = {}
): Promise<T> {
  const { readOnly, bestEffort, ...retry } = options;

  return withRetry(
    async (attempt) => {
      const txn = factory.txn({ readOnly, bestEffort });
      try {
        return await operation(txn, attempt);
      } finally {
        await txn.discard();
      }
    },
    retry,
    'runTransaction'
  );
}
