// src/config.ts
import { z } from 'zod';

const LogLevel = z.enum(['fatal','error','warn','info','debug','trace','silent']);
export type LogLevel = z.infer<typeof LogLevel>;

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development','test','production']).default('development'),

  FEED_URL: z.string().default('wss://ws.finnhub.io'),
  FEED_TOKEN_PARAM: z.string().min(1).default('token'),
  FEED_API_KEY: z.string().optional(),
  SYMBOLS: z.string().optional(),

  STORAGE_KEY: z.string().min(1).default('state'),
  // empty keeps the session in memory only
  STORAGE_DIR: z.string().default('.ticker-client'),

  LOG_LEVEL: LogLevel.default('info'),
  LOG_PRETTY: z.union([z.literal('1'), z.literal('0')]).default('1'),

  // 0 disables the ops/metrics server
  METRICS_PORT: z.coerce.number().int().nonnegative().default(0),
});

export class ConfigError extends Error {
  readonly issues: Record<string, string[] | undefined>;

  constructor(issues: Record<string, string[] | undefined>) {
    super(`Invalid environment: ${Object.keys(issues).join(', ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

function toArray(csv?: string): string[] {
  return (csv ?? '')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean);
}

export type ClientConfig = {
  env: 'development' | 'test' | 'production';
  feed: { url: string; tokenParam: string; apiKey: string | undefined };
  symbols: string[];
  storageKey: string;
  storageDir: string | undefined;
  logLevel: LogLevel;
  logPretty: boolean;
  metricsPort: number;
};

export function loadConfig(source: Record<string, string | undefined>): ClientConfig {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.flatten().fieldErrors);
  }
  const e = parsed.data;

  return {
    env: e.NODE_ENV,
    feed: {
      url: e.FEED_URL,
      tokenParam: e.FEED_TOKEN_PARAM,
      apiKey: e.FEED_API_KEY || undefined,
    },
    symbols: toArray(e.SYMBOLS),
    storageKey: e.STORAGE_KEY,
    storageDir: e.STORAGE_DIR || undefined,
    logLevel: e.LOG_LEVEL,
    logPretty: e.LOG_PRETTY === '1',
    metricsPort: e.METRICS_PORT,
  };
}
