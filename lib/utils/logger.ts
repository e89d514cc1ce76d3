import pino from 'pino';

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

const isTest = process.env.NODE_ENV === 'test' || Boolean(process.env.VITEST);
const isProduction = process.env.NODE_ENV === 'production';

// Pretty output for local runs, plain JSON lines in production
const logger = pino({
  level: process.env.LOG_LEVEL || (isTest ? 'silent' : 'info'),
  ...(isTest || isProduction
    ? {}
    : {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:dd-mm-yyyy HH:MM:ss',
            ignore: 'pid,hostname',
          },
        },
      }),
});

/**
 * Log an event with structured data
 * @param event - Event name/type
 * @param data - Additional data to log
 * @param level - Log level (default: info)
 */
export function logEvent(
  event: string,
  data: Record<string, unknown>,
  level: LogLevel = 'info'
): void {
  logger[level]({
    event,
    timestamp: new Date().toISOString(),
    ...data
  });
}

export default logger;
