import { z } from 'zod';
import { DEFAULT_TIME_ZONE } from '@tokenboard/shared';

function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

const EnvSchema = z.object({
  NODE_ENV: z.string().optional(),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  DATABASE_PATH: z.string().min(1).default('./data/tokenboard.db'),
  DB_BUSY_TIMEOUT_MS: z.coerce.number().int().min(0).default(5000),
  LEDGER_TIME_ZONE: z
    .string()
    .default(DEFAULT_TIME_ZONE)
    .refine(isTimeZone, (tz) => ({ message: `Unknown IANA time zone: ${tz}` })),
  REDIS_URL: z.string().url().optional().or(z.literal('').transform(() => undefined)),
  CORS_ORIGIN: z.string().optional(),
  // Trusted header set by the upstream gateway that authenticated the caller
  USER_ID_HEADER: z.string().default('x-user-id').transform((s) => s.toLowerCase()),
});

export type Env = z.infer<typeof EnvSchema>;

export interface AppConfig {
  isProduction: boolean;
  port: number;
  host: string;
  logLevel: Env['LOG_LEVEL'];
  databasePath: string;
  busyTimeoutMs: number;
  timeZone: string;
  redisUrl: string | undefined;
  corsOrigin: string | undefined;
  userIdHeader: string;
}

export class ConfigError extends Error {
  readonly issues: Record<string, string[] | undefined>;

  constructor(issues: Record<string, string[] | undefined>) {
    super(`Invalid configuration: ${Object.keys(issues).join(', ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.flatten().fieldErrors);
  }
  const data = parsed.data;

  return {
    isProduction: (data.NODE_ENV || '').toLowerCase() === 'production',
    port: data.PORT,
    host: data.HOST,
    logLevel: data.LOG_LEVEL,
    databasePath: data.DATABASE_PATH,
    busyTimeoutMs: data.DB_BUSY_TIMEOUT_MS,
    timeZone: data.LEDGER_TIME_ZONE,
    redisUrl: data.REDIS_URL,
    corsOrigin: data.CORS_ORIGIN,
    userIdHeader: data.USER_ID_HEADER,
  };
}
