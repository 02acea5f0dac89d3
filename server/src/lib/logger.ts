import pino from 'pino';

const env = process.env.NODE_ENV;
const usePrettyTransport = env !== 'production' && env !== 'test';

const logger = pino({
  level: process.env.LOG_LEVEL ?? (env === 'production' ? 'info' : 'debug'),
  ...(usePrettyTransport
    ? {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true },
        },
      }
    : {}),
});

/**
 * Creates a child logger scoped to one council evaluation run.
 */
export function createRunLogger(
  applicationId: string,
  extra?: Record<string, unknown>,
) {
  return logger.child({ applicationId, ...extra });
}

export type Logger = typeof logger;

export default logger;
