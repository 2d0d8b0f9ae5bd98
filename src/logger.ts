import pino, { type Logger } from 'pino';

export type { Logger };

export function createLogger(opts: { level: string; pretty: boolean }): Logger {
  return pino(
    opts.pretty
      ? { level: opts.level,
          transport: { target: 'pino-pretty', options: { colorize: true } } }
      : { level: opts.level }
  );
}

const env: Record<string, string | undefined> = typeof process === 'undefined' ? {} : process.env;

export const logger = createLogger({
  level: env.LOG_LEVEL || 'info',
  pretty: env.LOG_PRETTY === '1',
});
