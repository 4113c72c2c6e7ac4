import pino, { type Logger, type LoggerOptions } from 'pino';
import { config, isDevelopment } from '../config/scraper';

// Diagnostics go to stderr; stdout is reserved for CLI output such as the JSON payload
const options: LoggerOptions = {
  level: config.logLevel,
  base: {
    service: 'pricecharting-scraper',
    env: config.env,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err,
    error: pino.stdSerializers.err,
  },
};

export const logger: Logger = isDevelopment
  ? pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    })
  : pino(options, pino.destination(2));

export function createLogger(module: string): Logger {
  return logger.child({ module });
}

export type { Logger };
