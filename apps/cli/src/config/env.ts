import { ValidationError } from '@payledger/core';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import { MalformedRowPolicySchema } from '../features/shared/schemas.js';

const cliEnvSchema = z.object({
  PAYLEDGER_ON_MALFORMED: MalformedRowPolicySchema.optional(),
});

export type CliEnv = z.infer<typeof cliEnvSchema>;

/**
 * Validates the CLI's environment variables. An empty value counts as unset.
 */
export function parseCliEnv(env: NodeJS.ProcessEnv): Result<CliEnv, ValidationError> {
  const result = cliEnvSchema.safeParse({
    PAYLEDGER_ON_MALFORMED: env['PAYLEDGER_ON_MALFORMED'] || undefined,
  });

  if (!result.success) {
    const errors = result.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
    return err(new ValidationError(`Environment validation failed: ${errors}`));
  }

  return ok(result.data);
}
