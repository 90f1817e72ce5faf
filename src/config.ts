import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './utils/errors';
import { intervalToCronExpression } from './utils/cron';
import { offsetSchema } from './utils/validation';

dotenv.config();

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const envSchema = z
  .object({
    BOT_TOKEN: z.string().min(1, 'BOT_TOKEN is missing'),
    WEBHOOK_URL: z.string().url().optional(),
    PORT: intFromEnv(8080),
    NODE_ENV: z
      .enum(['development', 'production', 'test'])
      .default('development'),
    LOG_LEVEL: z.string().default('info'),

    DB_HOST: z.string().default('localhost'),
    DB_PORT: intFromEnv(5432),
    DB_NAME: z.string().default('post_scheduler'),
    DB_USER: z.string().default('postgres'),
    DB_PASSWORD: z.string().default(''),
    DB_SSL: z
      .enum(['true', 'false'])
      .default('false')
      .transform((value) => value === 'true'),
    DB_POOL_MAX: intFromEnv(10),

    DEFAULT_TZ_OFFSET: offsetSchema.default('+00:00'),
    DISPATCH_INTERVAL_SECONDS: intFromEnv(30),
    DISPATCH_TIMEOUT_MS: intFromEnv(15000),
    REGISTRATION_QUEUE_CAP: intFromEnv(10),
    HISTORY_LIMIT: intFromEnv(10),

    VK_TOKEN: z.string().optional(),
    VK_GROUP_ID: z.string().regex(/^\d+$/).optional(),
    VK_API_VERSION: z.string().default('5.199'),
  })
  .superRefine((env, ctx) => {
    if (env.NODE_ENV === 'production' && !env.WEBHOOK_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['WEBHOOK_URL'],
        message: 'WEBHOOK_URL is required in production environment',
      });
    }
    if (intervalToCronExpression(env.DISPATCH_INTERVAL_SECONDS) === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DISPATCH_INTERVAL_SECONDS'],
        message:
          'Interval must divide a minute (e.g. 10, 15, 30) or be whole minutes dividing an hour (e.g. 60, 300)',
      });
    }
  });

export interface AppConfig {
  botToken: string;
  webhookUrl?: string;
  port: number;
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: string;
  database: {
    host: string;
    port: number;
    database: string;
    user: string;
    password: string;
    ssl: boolean;
    max: number;
  };
  scheduling: {
    defaultTzOffsetMinutes: number;
    dispatchIntervalSeconds: number;
    dispatchTimeoutMs: number;
    registrationQueueCap: number;
    historyLimit: number;
  };
  vk?: {
    token: string;
    groupId?: string;
    apiVersion: string;
  };
}

/**
 * Builds the config from environment variables. Throws ConfigError on invalid input
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  // Treat empty strings from .env files as unset
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );

  const result = envSchema.safeParse(cleaned);
  if (!result.success) {
    const messages = result.error.errors.map(
      (err) => `${err.path.join('.')}: ${err.message}`,
    );
    throw new ConfigError(`Invalid configuration: ${messages.join(', ')}`);
  }

  const parsed = result.data;
  return {
    botToken: parsed.BOT_TOKEN,
    webhookUrl: parsed.WEBHOOK_URL,
    port: parsed.PORT,
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    database: {
      host: parsed.DB_HOST,
      port: parsed.DB_PORT,
      database: parsed.DB_NAME,
      user: parsed.DB_USER,
      password: parsed.DB_PASSWORD,
      ssl: parsed.DB_SSL,
      max: parsed.DB_POOL_MAX,
    },
    scheduling: {
      defaultTzOffsetMinutes: parsed.DEFAULT_TZ_OFFSET,
      dispatchIntervalSeconds: parsed.DISPATCH_INTERVAL_SECONDS,
      dispatchTimeoutMs: parsed.DISPATCH_TIMEOUT_MS,
      registrationQueueCap: parsed.REGISTRATION_QUEUE_CAP,
      historyLimit: parsed.HISTORY_LIMIT,
    },
    vk: parsed.VK_TOKEN
      ? {
          token: parsed.VK_TOKEN,
          groupId: parsed.VK_GROUP_ID,
          apiVersion: parsed.VK_API_VERSION,
        }
      : undefined,
  };
}
