import type { Account, TransactionRecord } from '@payledger/core';
import { getLogger } from '@payledger/logger';

import type { Ledger } from './ledger.js';

/**
 * What happened to one record. Only `applied` changed the ledger; every other
 * outcome is a silent no-op reported for logging and run statistics.
 */
export type ProcessOutcome =
  | 'applied'
  | 'account-locked'
  | 'insufficient-funds'
  | 'unknown-transaction'
  | 'not-disputed';

/**
 * Applies transaction records to the shared ledger.
 *
 * - deposit: credit available funds
 * - withdrawal: debit available funds when they cover the amount
 * - dispute: move the referenced amount from available to held
 * - resolve: move a disputed amount back from held to available
 * - chargeback: remove a disputed amount from held and lock the account
 *
 * Deposits and withdrawals are then stored under their txId for later disputes.
 * Records for a locked account change nothing and are not stored.
 */
export class TransactionProcessor {
  private readonly logger = getLogger('TransactionProcessor');

  constructor(private readonly ledger: Ledger) {}

  async process(record: TransactionRecord): Promise<ProcessOutcome> {
    const outcome = await this.dispatch(record);

    if (outcome !== 'applied') {
      this.logger.debug(
        { clientId: record.clientId, kind: record.kind, outcome, txId: record.txId },
        'Transaction had no effect'
      );
    }

    return outcome;
  }

  private dispatch(record: TransactionRecord): Promise<ProcessOutcome> {
    switch (record.kind) {
      case 'deposit':
      case 'withdrawal':
        return this.applyFundsMovement(record);
      case 'dispute':
        return this.ledger.withAccountAndStoredTransaction(record.clientId, record.txId, (account, stored) =>
          this.applyDispute(account, stored)
        );
      case 'resolve':
        return this.ledger.withAccountAndStoredTransaction(record.clientId, record.txId, (account, stored) =>
          this.applyResolve(account, stored)
        );
      case 'chargeback':
        return this.ledger.withAccountAndStoredTransaction(record.clientId, record.txId, (account, stored) =>
          this.applyChargeback(account, stored)
        );
    }
  }

  private applyFundsMovement(record: TransactionRecord): Promise<ProcessOutcome> {
    return this.ledger.withAccount(record.clientId, async (account) => {
      if (account.locked) return 'account-locked';

      let outcome: ProcessOutcome = 'applied';
      if (record.kind === 'deposit') {
        account.available = account.available.add(record.amount);
      } else if (account.available.gte(record.amount)) {
        account.available = account.available.subtract(record.amount);
      } else {
        outcome = 'insufficient-funds';
      }

      // Refused withdrawals are stored too, so a later dispute can still reference them
      await this.ledger.storeTransaction({ ...record, disputed: false });
      return outcome;
    });
  }

  /**
   * The disputed record may belong to another client; the amount still moves
   * within the disputing client's account.
   */
  private applyDispute(account: Account, stored: TransactionRecord | undefined): ProcessOutcome {
    if (account.locked) return 'account-locked';
    if (!stored) return 'unknown-transaction';

    account.available = account.available.subtract(stored.amount);
    account.held = account.held.add(stored.amount);
    stored.disputed = true;
    return 'applied';
  }

  private applyResolve(account: Account, stored: TransactionRecord | undefined): ProcessOutcome {
    if (account.locked) return 'account-locked';
    if (!stored) return 'unknown-transaction';
    if (!stored.disputed) return 'not-disputed';

    account.available = account.available.add(stored.amount);
    account.held = account.held.subtract(stored.amount);
    stored.disputed = false;
    return 'applied';
  }

  /**
   * Leaves `disputed` set on the stored record.
   */
  private applyChargeback(account: Account, stored: TransactionRecord | undefined): ProcessOutcome {
    if (account.locked) return 'account-locked';
    if (!stored) return 'unknown-transaction';
    if (!stored.disputed) return 'not-disputed';

    account.held = account.held.subtract(stored.amount);
    account.locked = true;
    return 'applied';
  }
}
