import pino from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export function createLogger(name: string, level: LogLevel = 'info') {
  return pino({
    name,
    level,
    transport:
      process.env.NODE_ENV !== 'production' && level !== 'silent'
        ? { target: 'pino-pretty', options: { colorize: true } }
        : undefined,
  });
}

export type Logger = pino.Logger;
