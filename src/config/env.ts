import { z } from 'zod';

const timeOfDay = z
  .string()
  .regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Expected HH:MM (24h)');

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const hour = z.coerce.number().int().min(0).max(23);

const envSchema = z.object({
  // PostgreSQL
  DATABASE_URL: z.string().min(1, 'Database URL is required'),
  DATABASE_POOL_SIZE: z.coerce.number().int().positive().default(10),

  // Telegram (optional; without both values notifications only go to the log)
  TELEGRAM_BOT_TOKEN: z.string().min(1).optional(),
  TELEGRAM_CHAT_ID: z.string().min(1).optional(),
  TELEGRAM_API_BASE_URL: z.string().url().default('https://api.telegram.org'),

  // Listing source
  FILTERS_FILE: z.string().default('config/filters.json'),
  SOURCE_BASE_URL: z.string().url().default('https://www.bazaraki.com'),
  SOURCE_TIMEOUT_MS: z.coerce.number().int().positive().default(45_000),
  SOURCE_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  SOURCE_REQUESTS_PER_MINUTE: z.coerce.number().int().positive().default(20),
  SOURCE_PARSE_MODE: z.enum(['worker', 'inline']).default('worker'),

  // Worker
  WORKER_HEALTH_PORT: z.coerce.number().int().positive().default(3001),
  WORKER_LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),

  // Ingestion cadence (seconds). Night window is [start, end) in local hours.
  INGEST_INTERVAL_SECONDS: z.coerce.number().int().positive().default(450),
  INGEST_JITTER_SECONDS: z.coerce.number().int().nonnegative().default(150),
  NIGHT_PAUSE_START_HOUR: hour.default(2),
  NIGHT_PAUSE_END_HOUR: hour.default(6),

  // Change detection
  RECHECK_TIME: timeOfDay.default('14:30'),
  RECHECK_STALENESS_HOURS: z.coerce.number().positive().default(20),
  RECHECK_BATCH_SIZE: z.coerce.number().int().positive().default(20),
  RECHECK_BATCH_PAUSE_MS: z.coerce.number().int().nonnegative().default(2_000),
  RECHECK_LIMIT: z.coerce.number().int().positive().default(500),
  RECHECK_UNAVAILABLE_RETENTION_HOURS: z.coerce.number().nonnegative().default(168),
  RECHECK_REQUIRE_NOTIFIED: booleanFlag.default('true'),

  // Weekly price-drop alert
  PRICE_DROP_THRESHOLD_EUR: z.coerce.number().int().positive().default(1_000),
  PRICE_DROP_LOOKBACK_DAYS: z.coerce.number().int().positive().default(7),
  PRICE_DROP_WEEKDAY: z.coerce.number().int().min(0).max(6).default(0),
  PRICE_DROP_TIME: timeOfDay.default('10:00'),

  // Node
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

/**
 * Validate a raw variable map. Throws one error naming every invalid key.
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const formatted = result.error.flatten().fieldErrors;
    const messages = Object.entries(formatted)
      .map(([key, errors]) => `  ${key}: ${errors?.join(', ')}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${messages}`);
  }

  return result.data;
}

export function loadEnv(): Env {
  if (_env) return _env;
  _env = parseEnv(process.env);
  return _env;
}
