import { describe, expect, it } from 'vitest';

import { Amount } from '../value-objects/amount.js';

import { createAccount, snapshotAccount } from './account.js';
import { createTransactionRecord, isStorableKind } from './transaction-record.js';

describe('createAccount', () => {
  it('should start unlocked with zero balances', () => {
    const account = createAccount(7);

    expect(account.clientId).toBe(7);
    expect(account.available.isZero()).toBe(true);
    expect(account.held.isZero()).toBe(true);
    expect(account.locked).toBe(false);
  });
});

describe('snapshotAccount', () => {
  it('should use available alone when nothing is held', () => {
    const account = createAccount(1);
    account.available = Amount.fromScaled(20n);

    expect(snapshotAccount(account).total.scaled).toBe(20n);
  });

  it('should use held alone when nothing is available', () => {
    const account = createAccount(1);
    account.held = Amount.fromScaled(20n);

    expect(snapshotAccount(account).total.scaled).toBe(20n);
  });

  it('should sum available and held, including negative balances', () => {
    const account = createAccount(1);
    account.available = Amount.fromScaled(-30000n);
    account.held = Amount.fromScaled(50000n);
    account.locked = true;

    const snapshot = snapshotAccount(account);

    expect(snapshot.total.toDecimalString()).toBe('2.0000');
    expect(snapshot.locked).toBe(true);
  });

  it('should not follow later changes to the account', () => {
    const account = createAccount(1);
    account.available = Amount.fromScaled(10n);
    const snapshot = snapshotAccount(account);

    account.available = Amount.fromScaled(99n);

    expect(snapshot.available.scaled).toBe(10n);
    expect(snapshot.total.scaled).toBe(10n);
  });
});

describe('transaction records', () => {
  it('should create records that are not disputed', () => {
    const record = createTransactionRecord({ kind: 'deposit', clientId: 2, txId: 9, amount: Amount.fromScaled(5n) });

    expect(record).toEqual({ kind: 'deposit', clientId: 2, txId: 9, amount: Amount.fromScaled(5n), disputed: false });
  });

  it('should only store deposits and withdrawals', () => {
    expect(isStorableKind('deposit')).toBe(true);
    expect(isStorableKind('withdrawal')).toBe(true);
    expect(isStorableKind('dispute')).toBe(false);
    expect(isStorableKind('resolve')).toBe(false);
    expect(isStorableKind('chargeback')).toBe(false);
  });
});
