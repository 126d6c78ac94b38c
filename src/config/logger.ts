import winston from 'winston';
import { env } from './environment';

const FILE_ROTATION = { maxsize: 5 * 1024 * 1024, maxFiles: 5 };

const structured = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

// Local development: one readable line, metadata pretty-printed underneath
const readable = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, component, ...meta }) => {
    const scope = typeof component === 'string' ? ` (${component})` : '';
    const metaStr = Object.keys(meta).length ? `\n${JSON.stringify(meta, null, 2)}` : '';
    return `${String(timestamp)} [${level}]${scope}: ${String(message)}${metaStr}`;
  })
);

function buildTransports() {
  if (env.NODE_ENV !== 'production') {
    return [new winston.transports.Console({ format: readable })];
  }
  return [
    new winston.transports.Console({ format: structured }),
    new winston.transports.File({ filename: 'logs/error.log', level: 'error', format: structured, ...FILE_ROTATION }),
  ];
}

export const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  defaultMeta: { service: 'booking-allocation-engine' },
  transports: buildTransports(),
  silent: env.NODE_ENV === 'test',
});

/**
 * Child logger tagging every entry with the emitting component
 */
export function componentLogger(component: string): winston.Logger {
  return logger.child({ component });
}
