export * from './errors/index.js';
export * from './schemas/transaction.js';
export * from './types/account.js';
export * from './types/transaction-record.js';
export * from './utils/type-guard-utils.js';
export * from './value-objects/amount.js';
