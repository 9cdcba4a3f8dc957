import { z } from 'zod';

export const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

export const DEFAULT_LOG_LEVEL = 'warn';

export const configSchema = z.object({
  YOUTUBE_API_KEY: z.string().min(1).optional(),
  LOG_LEVEL: logLevelSchema.default(DEFAULT_LOG_LEVEL),
  YTGRAB_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  YTGRAB_PAGE_DELAY_MS: z.coerce.number().int().min(0).default(1_000),
});

export type Config = z.infer<typeof configSchema>;
export type LogLevel = z.infer<typeof logLevelSchema>;

/**
 * Level for the shared logger: only LOG_LEVEL is read, and an unknown value
 * falls back to the default.
 */
export function resolveLogLevel(value: string | undefined): LogLevel {
  const parsed = logLevelSchema.safeParse(value?.trim());
  return parsed.success ? parsed.data : DEFAULT_LOG_LEVEL;
}

/**
 * Validate environment variables. Blank values count as unset.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const cleaned: Record<string, string> = {};
  for (const key of Object.keys(configSchema.shape)) {
    const value = env[key]?.trim();
    if (value) cleaned[key] = value;
  }

  const result = configSchema.safeParse(cleaned);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment variables: ${issues}`);
  }

  return result.data;
}
