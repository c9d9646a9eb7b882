import 'dotenv/config';
import { z } from 'zod';

const DEFAULT_CORS_ORIGINS = ['https://pro.openbb.co', 'https://pro.openbb.dev', 'http://localhost:1420'];

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().positive().default(7779),
  CONNECTOR_API_KEY: z
    .string({ required_error: 'CONNECTOR_API_KEY is required' })
    .trim()
    .min(1, 'CONNECTOR_API_KEY is required'),
  PROVIDER_BASE_URL: z.string().url().default('https://api.blueskyapi.com/v1'),
  PROVIDER_API_KEY: z
    .string()
    .trim()
    .optional()
    .transform(value => (value ? value : undefined)),
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  UPSTREAM_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(2),
  UPSTREAM_BACKOFF_MS: z.coerce.number().int().nonnegative().default(250),
  CORS_ORIGINS: z
    .string()
    .optional()
    .transform(value =>
      value
        ? value.split(',').map(origin => origin.trim()).filter(origin => origin.length > 0)
        : DEFAULT_CORS_ORIGINS
    ),
  APPS_MANIFEST_PATH: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  MODULE_LOG_LEVELS: z.string().default('upstream:info')
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Raised when the process environment cannot produce a usable configuration.
 *
 * Carries the flattened field errors so the bootstrap can log which variables
 * are wrong without echoing their values.
 */
export class EnvironmentError extends Error {
  constructor(public readonly fieldErrors: Record<string, string[] | undefined>) {
    super('Failed to parse environment variables');
    this.name = 'EnvironmentError';
  }
}

/**
 * Parse and validate environment variables.
 *
 * Called exactly once by the bootstrap; tests pass their own source object.
 *
 * @param source - Variables to read, `process.env` in production
 * @throws EnvironmentError when a variable is missing or malformed (e.g. no CONNECTOR_API_KEY)
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    throw new EnvironmentError(parsed.error.flatten().fieldErrors);
  }

  return parsed.data;
}
