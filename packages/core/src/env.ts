import { z } from 'zod';

import { ConfigurationError } from './errors.js';

/**
 * Environment Variable Validation
 * Parsed once at startup; every value has a default so a bare
 * environment is valid.
 */

const RuntimeEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),
});

const EngineOptionsEnvSchema = z.object({
  /** Normative population used when a profile does not name one */
  KPCDST_POPULATION: z.enum(['global', 'regional']).default('regional'),
  /** Women eligible for treatment nationally (population scaling) */
  KPCDST_ELIGIBLE_POPULATION: z
    .string()
    .optional()
    .transform((v) => (v ? Number(v) : 360_000))
    .pipe(z.number().int().nonnegative()),
  /** Assumed uptake among the eligible population, in percent */
  KPCDST_UPTAKE_PERCENT: z
    .string()
    .optional()
    .transform((v) => (v ? Number(v) : 2))
    .pipe(z.number().positive().max(100)),
});

export const EngineEnvSchema = RuntimeEnvSchema.merge(EngineOptionsEnvSchema);

export type EngineEnv = z.infer<typeof EngineEnvSchema>;

/**
 * Validate environment variables
 * @param env - Variables to validate (defaults to process.env)
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): EngineEnv {
  const result = EngineEnvSchema.safeParse(env);

  if (!result.success) {
    const errors = result.error.flatten().fieldErrors;
    const issues = Object.entries(errors).map(
      ([field, messages]) => `${field}: ${(messages ?? []).join(', ')}`
    );

    throw new ConfigurationError(
      `Environment validation failed:\n${issues.map((i) => `  ${i}`).join('\n')}`,
      issues
    );
  }

  return result.data;
}

let cachedEnv: EngineEnv | null = null;

/**
 * Get validated env with type safety (parsed on first call)
 */
export function getEnv(): EngineEnv {
  cachedEnv ??= validateEnv();
  return cachedEnv;
}

/**
 * Drop the cached env so the next getEnv() re-reads process.env
 */
export function resetEnvCache(): void {
  cachedEnv = null;
}

/**
 * Uptake as a fraction in [0, 1]
 */
export function uptakeFraction(env: EngineEnv): number {
  return env.KPCDST_UPTAKE_PERCENT / 100;
}
