export { KeyedMutex } from './keyed-mutex.js';
export { Ledger } from './ledger.js';
export { TransactionProcessor, type ProcessOutcome } from './transaction-processor.js';
