import winston from 'winston';

export const SUPPORTED_LOG_LEVELS = ['error', 'warn', 'info', 'debug', 'verbose', 'silly'] as const;

export type LogLevel = (typeof SUPPORTED_LOG_LEVELS)[number];

export const getStartupLogLevel = (): LogLevel => {
  const envLevel = process.env.LOG_LEVEL?.trim().toLowerCase();
  const match = SUPPORTED_LOG_LEVELS.find((level) => level === envLevel);
  return match ?? 'info';
};

const lineFormat = winston.format.printf(({ timestamp, level, message, ...metadata }) => {
  let msg = `${timestamp} [${level}]: ${message}`;

  // Add metadata if present
  if (Object.keys(metadata).length > 0) {
    msg += ' ' + JSON.stringify(metadata, null, 2);
  }

  return msg;
});

/**
 * Singleton Logger class using Winston.
 * Provides colorized, formatted logging with configurable levels.
 */
class Logger {
  private static instance: winston.Logger;

  private constructor() {
    // Private constructor to enforce singleton pattern
  }

  public static getInstance(): winston.Logger {
    if (!Logger.instance) {
      Logger.instance = winston.createLogger({
        level: getStartupLogLevel(),
        format: winston.format.combine(
          winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
          winston.format.errors({ stack: true }),
          winston.format.splat()
        ),
        transports: [
          new winston.transports.Console({
            format: winston.format.combine(winston.format.colorize({ all: true }), lineFormat),
          }),
        ],
      });
    }

    return Logger.instance;
  }
}

// Export the singleton instance
export const logger = Logger.getInstance();

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}
