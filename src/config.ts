import { z } from 'zod';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export const envSchema = z.object({
  STACKVM_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export type Env = z.infer<typeof envSchema>;

export interface VmConfig {
  logLevel: Env['STACKVM_LOG_LEVEL'];
}

/**
 * Read configuration from the environment.
 * Throws a `ZodError` naming the offending variable when a value is invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): VmConfig {
  const parsed = envSchema.parse(env);
  return {
    logLevel: parsed.STACKVM_LOG_LEVEL,
  };
}
