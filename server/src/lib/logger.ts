import pino from 'pino';

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test' || Boolean(process.env.VITEST);

function defaultLevel(): string {
  if (isTest) return 'silent';
  return isProduction ? 'info' : 'debug';
}

const logger = pino({
  level: process.env.LOG_LEVEL ?? defaultLevel(),
  ...(isProduction || isTest
    ? {}
    : {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true },
        },
      }),
});

export type Logger = pino.Logger;

/**
 * Creates a child logger scoped to one inbound message's session.
 */
export function createSessionLogger(
  sessionId: string,
  extra?: Record<string, unknown>,
): Logger {
  return logger.child({ sessionId, ...extra });
}

export default logger;
