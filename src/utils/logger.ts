import pino from 'pino';

// Read straight from the environment so the logger can load before (and without) the app config
const nodeEnv = process.env.NODE_ENV ?? 'development';
const isProduction = nodeEnv === 'production';
const defaultLevel = nodeEnv === 'test' ? 'silent' : 'info';

export const logger = pino({
  level: process.env.LOG_LEVEL ?? defaultLevel,
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  transport:
    isProduction || nodeEnv === 'test'
      ? undefined
      : {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:HH:MM:ss',
            ignore: 'pid,hostname',
          },
        },
});

/**
 * Child logger tagged with a module name
 */
export function createModuleLogger(module: string): pino.Logger {
  return logger.child({ module });
}
