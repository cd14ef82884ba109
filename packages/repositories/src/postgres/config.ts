import { z } from 'zod';

export type DatabaseConfig = {
  connectionString: string;
  maxConnections?: number;
};

const DatabaseEnvSchema = z.object({
  DATABASE_URL: z
    .string({ required_error: 'DATABASE_URL is required' })
    .url('DATABASE_URL must be a connection URL'),
  DATABASE_MAX_CONNECTIONS: z.coerce.number().int().positive().optional(),
});

/**
 * Read database settings from environment variables.
 *
 * @throws ZodError when DATABASE_URL is missing or malformed
 */
export function loadDatabaseConfig(
  env: Record<string, string | undefined>
): DatabaseConfig {
  const parsed = DatabaseEnvSchema.parse(env);
  return {
    connectionString: parsed.DATABASE_URL,
    maxConnections: parsed.DATABASE_MAX_CONNECTIONS,
  };
}
