import { pino, type Logger, type LoggerOptions } from 'pino';

const env = process.env['NODE_ENV'];
const isDev = env !== 'production' && env !== 'test';

const defaultLevel = env === 'test' ? 'silent' : isDev ? 'debug' : 'info';

const options: LoggerOptions = {
  level: process.env['BGTASK_LOG_LEVEL'] ?? defaultLevel,
  base: {
    pid: undefined,
    hostname: undefined,
  },
};

// Pretty output only when a developer is watching the terminal
if (isDev) {
  options.transport = {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    },
  };
}

export const logger = pino(options);

export function createLogger(module: string): Logger {
  return logger.child({ module });
}
