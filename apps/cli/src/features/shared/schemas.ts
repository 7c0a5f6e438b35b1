import { LogLevelSchema } from '@payledger/logger';
import { z } from 'zod';

export const MalformedRowPolicySchema = z.enum(['abort', 'skip'], {
  errorMap: (_issue, ctx) => ({
    message: `Invalid malformed row policy "${String(ctx.data)}" (expected abort or skip)`,
  }),
});

export const LogLevelFlagSchema = z.object({
  logLevel: LogLevelSchema.optional(),
});

/**
 * Replay command options
 */
export const ReplayCommandOptionsSchema = z
  .object({
    onMalformed: MalformedRowPolicySchema.optional(),
    summary: z.boolean().optional(),
  })
  .extend(LogLevelFlagSchema.shape);
