import type { ClientId, TransactionKind, TxId } from '../schemas/transaction.js';
import type { Amount } from '../value-objects/amount.js';

/**
 * One decoded input row.
 *
 * Deposits and withdrawals are kept in the ledger's transaction history under
 * their txId. Disputes, resolves and chargebacks are instructions that point at a
 * stored record; their amount is never used.
 */
export interface TransactionRecord {
  readonly kind: TransactionKind;
  readonly clientId: ClientId;
  readonly txId: TxId;
  readonly amount: Amount;
  /** Set and cleared by the processor only */
  disputed: boolean;
}

export type StorableKind = Extract<TransactionKind, 'deposit' | 'withdrawal'>;

export function isStorableKind(kind: TransactionKind): kind is StorableKind {
  return kind === 'deposit' || kind === 'withdrawal';
}

export function createTransactionRecord(fields: Omit<TransactionRecord, 'disputed'>): TransactionRecord {
  return { ...fields, disputed: false };
}
