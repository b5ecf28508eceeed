import { ConfigurationError } from '@cloudcall/core';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

const optionalText = z
  .string()
  .trim()
  .transform((value) => (value === '' ? undefined : value))
  .optional();

export const envSchema = z.object({
  CLOUDCALL_API_KEY: optionalText,
  CLOUDCALL_API_VERSION: optionalText,
  CLOUDCALL_ENDPOINT: z.string().trim().url({ message: 'must be an absolute URL' }).optional(),
  CLOUDCALL_LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error']).default('info'),
  CLOUDCALL_MAX_RETRIES: z
    .string()
    .regex(/^\d+$/, { message: 'must be a non-negative integer' })
    .transform((value) => parseInt(value, 10))
    .optional(),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type CloudcallEnv = z.infer<typeof envSchema>;

let validatedEnv: CloudcallEnv | undefined;

/**
 * Validate an environment. Every issue is listed in the error; values are
 * never echoed since some of them are secrets.
 */
export function parseEnv(source: Record<string, string | undefined>): Result<CloudcallEnv, ConfigurationError> {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
    return err(new ConfigurationError(`Environment validation failed:\n${issues}`));
  }
  return ok(result.data);
}

/**
 * Validates process.env on first access and caches the result.
 */
export function getEnv(): Result<CloudcallEnv, ConfigurationError> {
  if (validatedEnv) {
    return ok(validatedEnv);
  }
  return parseEnv(process.env).map((env) => {
    validatedEnv = env;
    return env;
  });
}

/**
 * Forget the cached environment so the next getEnv() re-reads process.env.
 */
export function resetEnv(): void {
  validatedEnv = undefined;
}
