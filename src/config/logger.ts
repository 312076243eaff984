import winston from 'winston';
import { env } from './environment';

const FILE_MAX_BYTES = 5 * 1024 * 1024;

const baseFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

// Readable lines locally, raw JSON everywhere else
const consoleFormat =
  env.NODE_ENV === 'development'
    ? winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message, component, ...meta }) => {
          const scope = typeof component === 'string' ? ` (${component})` : '';
          const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
          return `${String(timestamp)} [${level}]${scope}: ${String(message)}${metaStr}`;
        })
      )
    : winston.format.json();

export const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  format: baseFormat,
  defaultMeta: { service: 'washbay-capacity-api' },
  silent: env.NODE_ENV === 'test',
  transports: [new winston.transports.Console({ format: consoleFormat })],
});

if (env.NODE_ENV === 'production') {
  logger.add(
    new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error',
      maxsize: FILE_MAX_BYTES,
      maxFiles: 5,
    })
  );

  logger.add(
    new winston.transports.File({
      filename: 'logs/combined.log',
      maxsize: FILE_MAX_BYTES,
      maxFiles: 5,
    })
  );
}

/**
 * Child logger that tags every entry with the emitting component,
 * e.g. `createComponentLogger('wash-bay-repository')`
 */
export function createComponentLogger(component: string): winston.Logger {
  return logger.child({ component });
}
