import type { ClientId } from '../schemas/transaction.js';
import { Amount } from '../value-objects/amount.js';

/**
 * Balance state of one client. Either balance may go negative: a dispute moves the
 * disputed amount out of `available` whether or not it is still there.
 */
export interface Account {
  readonly clientId: ClientId;
  available: Amount;
  held: Amount;
  /** Terminal once set by a chargeback */
  locked: boolean;
}

/**
 * Export-only view of an account with the derived total
 */
export interface AccountSnapshot {
  readonly clientId: ClientId;
  readonly available: Amount;
  readonly held: Amount;
  readonly total: Amount;
  readonly locked: boolean;
}

export function createAccount(clientId: ClientId): Account {
  return {
    clientId,
    available: Amount.zero(),
    held: Amount.zero(),
    locked: false,
  };
}

export function snapshotAccount(account: Account): AccountSnapshot {
  return {
    clientId: account.clientId,
    available: account.available,
    held: account.held,
    total: account.available.add(account.held),
    locked: account.locked,
  };
}
