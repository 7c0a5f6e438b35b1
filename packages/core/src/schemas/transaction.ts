import { z } from 'zod';

/**
 * Transaction kinds as they appear in the `type` column. Matching is exact and
 * case-sensitive; any other label is a malformed row.
 */
export const TransactionKindSchema = z.enum(['deposit', 'withdrawal', 'dispute', 'resolve', 'chargeback'], {
  errorMap: (_issue, ctx) => ({ message: `Unrecognized transaction type "${String(ctx.data)}"` }),
});

/** Client identifiers are unsigned 16-bit integers */
export const ClientIdSchema = z
  .number()
  .int('Client id must be an integer')
  .min(0, 'Client id must not be negative')
  .max(65_535, 'Client id must fit in 16 bits');

/** Transaction identifiers are unsigned 32-bit integers */
export const TxIdSchema = z
  .number()
  .int('Transaction id must be an integer')
  .min(0, 'Transaction id must not be negative')
  .max(4_294_967_295, 'Transaction id must fit in 32 bits');

export type TransactionKind = z.infer<typeof TransactionKindSchema>;
export type ClientId = z.infer<typeof ClientIdSchema>;
export type TxId = z.infer<typeof TxIdSchema>;
