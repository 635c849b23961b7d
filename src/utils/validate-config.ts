import { z } from 'zod';

/**
 * Parses environment variables against a schema and fails start-up with every
 * issue listed when they don't match.
 */
export function validateConfig<T extends z.ZodTypeAny>(
  env: Record<string, string | undefined>,
  schema: T,
): z.infer<T> {
  const result = schema.safeParse(env);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  return result.data;
}

export const booleanFromEnv = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');
