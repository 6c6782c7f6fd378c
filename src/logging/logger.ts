import { pino, type Level, type Logger } from 'pino';

type LogLevel = Level | 'silent';

const allowedLevels: LogLevel[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

export const normalizeLevel = (value?: string): LogLevel => {
  const candidate = value?.toLowerCase();
  return allowedLevels.find((level) => level === candidate) ?? 'info';
};

export const logger: Logger = pino({
  level: normalizeLevel(process.env.LOG_LEVEL),
  base: {
    service: 'island-worldgen',
    environment: process.env.NODE_ENV || 'development',
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  messageKey: 'message',
});

export const createLogger = (
  context: string,
  meta: Record<string, unknown> = {},
): Logger => logger.child({ context, ...meta });

export type { Logger };
