/**
 * Transaction module exports
 */

export {
  Transaction,
  type TransactionState,
  type TransactionOptions,
  type QueryOptions,
  type MutateOptions,
} from './transaction.js';

export {
  runTransaction,
  type TransactionFactory,
  type RunTransactionOptions,
} from './run-transaction.js';
