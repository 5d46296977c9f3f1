import pino from 'pino';

function buildLoggerOptions(): pino.LoggerOptions {
  const level = process.env.LOG_LEVEL || 'info';
  if (process.env.NODE_ENV === 'development') {
    return {
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:HH:MM:ss',
          ignore: 'pid,hostname',
        },
      },
    };
  }
  return { level };
}

const baseLogger = pino(buildLoggerOptions());

export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

/**
 * Child logger bound to a component/adapter/service name. Pass `correlationId`
 * in the context to tie log lines of one webhook delivery or push run together.
 */
export function createLogger(context?: Record<string, unknown>): pino.Logger {
  return baseLogger.child({ ...context });
}

export type Logger = pino.Logger;
