import {
  createAccount,
  snapshotAccount,
  type Account,
  type AccountSnapshot,
  type ClientId,
  type TransactionRecord,
  type TxId,
} from '@payledger/core';
import { getLogger } from '@payledger/logger';

import { KeyedMutex } from './keyed-mutex.js';

const logger = getLogger('Ledger');

/**
 * Shared store of accounts and stored deposits/withdrawals.
 *
 * Every access goes through a callback that runs under an exclusive per-key lock;
 * accounts are locked per clientId and stored transactions per txId, so workers
 * touching different clients proceed independently. When both are needed the
 * account lock is always taken first.
 *
 * One instance is created per run and handed to every ingestion worker.
 */
export class Ledger {
  private readonly accounts = new Map<ClientId, Account>();
  private readonly transactions = new Map<TxId, TransactionRecord>();
  private readonly accountLocks = new KeyedMutex<ClientId>();
  private readonly transactionLocks = new KeyedMutex<TxId>();

  get accountCount(): number {
    return this.accounts.size;
  }

  get transactionCount(): number {
    return this.transactions.size;
  }

  /**
   * Run `fn` with exclusive access to the client's account, creating it on first use.
   */
  withAccount<T>(clientId: ClientId, fn: (account: Account) => T | Promise<T>): Promise<T> {
    return this.accountLocks.runExclusive(clientId, () => fn(this.getOrCreateAccount(clientId)));
  }

  /**
   * Copy of the stored record, if any
   */
  getStoredTransaction(txId: TxId): Promise<TransactionRecord | undefined> {
    return this.transactionLocks.runExclusive(txId, () => {
      const record = this.transactions.get(txId);
      return record ? { ...record } : undefined;
    });
  }

  /**
   * Run `fn` with exclusive access to the stored slot for `txId`. The record passed
   * in is the stored instance, so changes to `disputed` persist.
   */
  withStoredTransaction<T>(txId: TxId, fn: (record: TransactionRecord | undefined) => T | Promise<T>): Promise<T> {
    return this.transactionLocks.runExclusive(txId, () => fn(this.transactions.get(txId)));
  }

  /**
   * Hold the account and the stored slot together for a whole dispute, resolve or
   * chargeback step.
   */
  withAccountAndStoredTransaction<T>(
    clientId: ClientId,
    txId: TxId,
    fn: (account: Account, record: TransactionRecord | undefined) => T | Promise<T>
  ): Promise<T> {
    return this.withAccount(clientId, (account) => this.withStoredTransaction(txId, (record) => fn(account, record)));
  }

  /**
   * Store a copy of the record under its txId, replacing any earlier entry.
   */
  storeTransaction(record: TransactionRecord): Promise<void> {
    return this.transactionLocks.runExclusive(record.txId, () => {
      if (this.transactions.has(record.txId)) {
        logger.debug({ txId: record.txId }, 'Overwriting stored transaction');
      }
      this.transactions.set(record.txId, { ...record });
    });
  }

  /**
   * Export view of every account ordered by clientId, with totals computed while
   * all account locks are held.
   */
  snapshotAccounts(): Promise<AccountSnapshot[]> {
    const clientIds = [...this.accounts.keys()];

    return this.accountLocks.runExclusiveMany(clientIds, () =>
      [...this.accounts.values()].sort((a, b) => a.clientId - b.clientId).map(snapshotAccount)
    );
  }

  private getOrCreateAccount(clientId: ClientId): Account {
    const existing = this.accounts.get(clientId);
    if (existing) return existing;

    const account = createAccount(clientId);
    this.accounts.set(clientId, account);
    logger.trace({ clientId }, 'Account created');
    return account;
  }
}
