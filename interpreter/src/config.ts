/**
 * Interpreter configuration read from environment variables.
 *
 *   KUZUR_MAX_CALL_DEPTH  positive integer, default 500
 *   KUZUR_STACK_TRACE     "1" / "true" to print host stacks for internal errors
 */

import { z } from 'zod';

// Each Kuzur call nests several host frames; this fits Node's default stack.
export const DEFAULT_MAX_CALL_DEPTH = 500;

const flag = z
  .enum(['0', '1', 'true', 'false'])
  .optional()
  .transform((v) => v === '1' || v === 'true');

const envSchema = z.object({
  KUZUR_MAX_CALL_DEPTH: z
    .string()
    .regex(/^\d+$/, 'must be a positive integer')
    .transform((v) => parseInt(v, 10))
    .pipe(z.number().int().min(1, 'must be a positive integer'))
    .optional(),
  KUZUR_STACK_TRACE: flag,
});

export interface KuzurConfig {
  maxCallDepth: number;
  stackTrace: boolean;
}

export class ConfigError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  ${i}`).join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Validate the relevant environment variables and fill in defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): KuzurConfig {
  const parsed = envSchema.safeParse({
    KUZUR_MAX_CALL_DEPTH: env.KUZUR_MAX_CALL_DEPTH,
    KUZUR_STACK_TRACE: env.KUZUR_STACK_TRACE,
  });
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  return {
    maxCallDepth: parsed.data.KUZUR_MAX_CALL_DEPTH ?? DEFAULT_MAX_CALL_DEPTH,
    stackTrace: parsed.data.KUZUR_STACK_TRACE,
  };
}
