import { ClientIdSchema, TransactionKindSchema, TxIdSchema } from '@payledger/core';
import { z } from 'zod';

const unsignedIntegerColumn = (schema: z.ZodNumber) =>
  z
    .string({ required_error: 'is missing' })
    .regex(/^\d+$/, 'must be an unsigned integer')
    .transform((value) => Number(value))
    .pipe(schema);

/**
 * One row of a transaction CSV after csv-parse has trimmed its fields.
 * `amount` may be absent on short rows; whether it is required depends on the type.
 */
export const TransactionRowSchema = z.object({
  type: z.string({ required_error: 'is missing' }).pipe(TransactionKindSchema),
  client: unsignedIntegerColumn(ClientIdSchema),
  tx: unsignedIntegerColumn(TxIdSchema),
  amount: z.string().optional(),
});

export type TransactionRow = z.infer<typeof TransactionRowSchema>;

/**
 * Shape of a record emitted by csv-parse with `columns` and `info` enabled
 */
export const ParsedCsvRecordSchema = z.object({
  info: z.object({
    lines: z.number(),
  }),
  record: z.record(z.string()),
});
