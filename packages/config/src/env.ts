/**
 * @cleanq/config: Environment schema
 *
 * Parses raw environment variables into a typed, defaulted config object.
 * No side effects: takes any env map.
 */

import { z } from 'zod';

// ─── Helpers ──────────────────────────────────────────────────────────

const positiveInt = (fallback: number) => z.coerce.number().int().min(1).default(fallback);

const commaList = z
  .string()
  .optional()
  .transform((value) =>
    (value ?? '')
      .split(',')
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0)
  );

// ─── Schema ───────────────────────────────────────────────────────────

export const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    QUEUE_SERVICE_PORT: z.coerce.number().int().min(1).max(65535).default(3005),
    APP_URL: z.string().url().default('http://localhost:5173'),
    DATABASE_URL: z.string().url().optional(),
    QUEUE_STORE: z.enum(['postgres', 'memory']).default('postgres'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
    QUEUE_DEFAULT_PER_PAGE: positiveInt(25),
    QUEUE_MAX_PER_PAGE: positiveInt(100),
    QUEUE_PREVIEW_SIZE: positiveInt(5),
    QUEUE_SHIP_TO_FILTER_MODE: z.enum(['deny', 'allow']).default('deny'),
    QUEUE_SHIP_TO_FILTER: commaList,
  })
  .superRefine((env, ctx) => {
    if (env.QUEUE_STORE === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when QUEUE_STORE is "postgres"',
      });
    }
    if (env.QUEUE_DEFAULT_PER_PAGE > env.QUEUE_MAX_PER_PAGE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['QUEUE_DEFAULT_PER_PAGE'],
        message: 'QUEUE_DEFAULT_PER_PAGE cannot exceed QUEUE_MAX_PER_PAGE',
      });
    }
  });

export type AppConfig = z.infer<typeof envSchema>;

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid environment configuration:\n  - ${issues.join('\n  - ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Parse an environment map. Empty strings count as unset so that blank
 * lines in a .env file fall back to defaults.
 */
export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (typeof value === 'string' && value.length > 0) cleaned[key] = value;
  }

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return parsed.data;
}
