import pino, { type Logger } from 'pino';

const usePrettyTransport =
  process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

const rootLogger = pino({
  level: process.env.LOG_LEVEL || 'info',
  ...(usePrettyTransport && {
    transport: {
      target: 'pino-pretty',
    },
  }),
});

export type { Logger };

export function createLogger(module: string): Logger {
  return rootLogger.child({ module });
}

export default rootLogger;
