import pino from 'pino';

const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;
const isDev = !isTest && process.env.NODE_ENV !== 'production';

export const logger = pino({
  level: isTest ? 'silent' : isDev ? 'debug' : 'info',
  ...(isDev
    ? {
        transport: {
          target: 'pino-pretty',
          options: {
            translateTime: 'HH:MM:ss',
            ignore: 'pid,hostname',
          },
        },
      }
    : {}),
});

export type Logger = typeof logger;
