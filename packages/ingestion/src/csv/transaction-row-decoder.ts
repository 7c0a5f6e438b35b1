import {
  Amount,
  createTransactionRecord,
  isStorableKind,
  ValidationError,
  type TransactionRecord,
} from '@payledger/core';
import { err, ok, type Result } from 'neverthrow';
import type { z } from 'zod';

import { TransactionRowSchema } from './schemas.js';

export interface RowLocation {
  source: string;
  line: number;
}

function describeLocation(location: RowLocation | undefined): string {
  return location ? ` at ${location.source}:${location.line}` : '';
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
}

function malformedRow(
  detail: string,
  row: unknown,
  location: RowLocation | undefined,
  cause?: unknown
): ValidationError {
  return new ValidationError(`Malformed row${describeLocation(location)}: ${detail}`, {
    additionalContext: { line: location?.line, row },
    cause,
    source: location?.source,
  });
}

/**
 * Decode one CSV row into a TransactionRecord.
 *
 * Deposits and withdrawals need a valid amount. Disputes, resolves and
 * chargebacks never use theirs, so whatever is in the column is read leniently.
 */
export function decodeTransactionRow(row: unknown, location?: RowLocation): Result<TransactionRecord, ValidationError> {
  const parsed = TransactionRowSchema.safeParse(row);
  if (!parsed.success) {
    return err(malformedRow(formatIssues(parsed.error), row, location));
  }

  const { type, client, tx, amount } = parsed.data;

  if (!isStorableKind(type)) {
    return ok(createTransactionRecord({ kind: type, clientId: client, txId: tx, amount: Amount.fromDecimalString(amount) }));
  }

  if (amount === undefined || amount === '') {
    return err(malformedRow('amount: is missing', row, location));
  }

  const amountResult = Amount.parse(amount);
  if (amountResult.isErr()) {
    return err(malformedRow(`amount: ${amountResult.error.message}`, row, location, amountResult.error));
  }

  return ok(createTransactionRecord({ kind: type, clientId: client, txId: tx, amount: amountResult.value }));
}
