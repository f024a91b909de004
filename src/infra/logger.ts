import pino from 'pino';

export type Logger = pino.Logger;

type LoggerEnv = Partial<Pick<NodeJS.ProcessEnv, 'NODE_ENV' | 'LOG_LEVEL'>>;

function defaultLevel(nodeEnv: string): string {
  if (nodeEnv === 'production') return 'info';
  if (nodeEnv === 'test') return 'silent';
  return 'debug';
}

/**
 * Level and transport for an environment. Entry points load `.env` before
 * this module is first imported, so the root logger sees its values.
 */
export function loggerOptions(env: LoggerEnv): pino.LoggerOptions {
  const nodeEnv = env.NODE_ENV || 'development';
  return {
    level: env.LOG_LEVEL || defaultLevel(nodeEnv),
    transport:
      nodeEnv === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
  };
}

export const logger = pino(loggerOptions(process.env));
