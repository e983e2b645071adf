import winston from 'winston';

const { combine, timestamp, printf, colorize, errors } = winston.format;

// timestamp [level] message | {meta}
const logFormat = printf(({ level, message, timestamp, stack, ...metadata }) => {
  let msg = `${timestamp} [${level}] ${message}`;

  if (stack) {
    msg += `\n${stack}`;
  }

  const metaKeys = Object.keys(metadata);
  if (metaKeys.length > 0) {
    msg += ` | ${JSON.stringify(metadata)}`;
  }

  return msg;
});

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  // Quiet under Vitest (NODE_ENV=test) unless LOG_LEVEL is set
  silent: process.env.NODE_ENV === 'test' && !process.env.LOG_LEVEL,
  format: combine(
    errors({ stack: true }),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    logFormat
  ),
  transports: [
    new winston.transports.Console({
      stderrLevels: ['error', 'warn'],
      format: combine(
        colorize({ all: true }),
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        logFormat
      )
    })
  ]
});

/**
 * Raise or lower verbosity at runtime (used by `--debug`).
 */
export function setLogLevel(level: string): void {
  logger.level = level;
}

/**
 * Normalize an unknown thrown value into a loggable message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export default logger;
