import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

const timeOfDay = z.string().regex(/^([0-1]?[0-9]|2[0-3]):[0-5][0-9]$/);

const configSchema = z.object({
  // LINE Messaging API
  lineChannelSecret: z.string().min(1),
  lineChannelAccessToken: z.string().min(1),

  // CWA open data
  cwaApiKey: z.string().min(1),
  cwaBaseUrl: z.string().url().default('https://opendata.cwa.gov.tw/api/v1/rest/datastore'),
  cwaTimeoutMs: z.coerce.number().int().positive().default(10000),

  // Scheduled pushes
  timezone: z.string().default('Asia/Taipei'),
  dailyPushTime: timeOfDay.default('08:00'),
  weekendPushTime: timeOfDay.default('19:00'), // fired on Fridays
  solarTermPushTime: timeOfDay.default('07:00'),
  typhoonCheckIntervalMinutes: z.coerce.number().int().min(1).max(59).default(30),
  enableScheduledPush: z
    .enum(['true', 'false'])
    .default('true')
    .transform((value) => value === 'true'),

  // App
  databasePath: z.string().default('data/weather-bot.db'),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  host: z.string().default('0.0.0.0'),
  port: z.coerce.number().int().positive().default(5000),
});

export type Config = z.infer<typeof configSchema>;

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  // Helper to convert empty strings to undefined
  const env = (key: string): string | undefined => {
    const value = source[key];
    return value === '' ? undefined : value;
  };

  const raw = {
    lineChannelSecret: env('LINE_CHANNEL_SECRET'),
    lineChannelAccessToken: env('LINE_CHANNEL_ACCESS_TOKEN'),
    cwaApiKey: env('CWA_API_KEY'),
    cwaBaseUrl: env('CWA_BASE_URL'),
    cwaTimeoutMs: env('CWA_TIMEOUT_MS'),
    timezone: env('TIMEZONE'),
    dailyPushTime: env('DAILY_PUSH_TIME'),
    weekendPushTime: env('WEEKEND_PUSH_TIME'),
    solarTermPushTime: env('SOLAR_TERM_PUSH_TIME'),
    typhoonCheckIntervalMinutes: env('TYPHOON_CHECK_INTERVAL_MINUTES'),
    enableScheduledPush: env('ENABLE_SCHEDULED_PUSH'),
    databasePath: env('DATABASE_PATH'),
    logLevel: env('LOG_LEVEL'),
    host: env('HOST'),
    port: env('PORT'),
  };

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`, {
      cause: result.error,
    });
  }
  return result.data;
}
