/**
 * Defines the available log levels.
 */
export const LogLevel = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
  DEBUG: 3,
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

/**
 * Maps string log level names to their numeric values.
 */
const LOG_LEVEL_MAP: Record<string, LogLevel> = {
  ERROR: LogLevel.ERROR,
  WARN: LogLevel.WARN,
  INFO: LogLevel.INFO,
  DEBUG: LogLevel.DEBUG,
};

/**
 * Gets the log level from environment variable or returns default.
 */
function getLogLevelFromEnv(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toUpperCase();
  return envLevel && envLevel in LOG_LEVEL_MAP ? LOG_LEVEL_MAP[envLevel] : LogLevel.INFO;
}

let currentLogLevel: LogLevel = getLogLevelFromEnv();

/**
 * Sets the current logging level for the application.
 */
export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLogLevel;
}

export interface Logger {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

function shouldLog(level: LogLevel): boolean {
  return currentLogLevel >= level && !process.env.VITEST_WORKER_ID;
}

/**
 * Provides logging functionalities with level control.
 */
export const logger: Logger = {
  /**
   * Logs a debug message if the current log level is DEBUG or higher.
   * @param message - The message to log.
   */
  debug: (message: string) => {
    if (shouldLog(LogLevel.DEBUG)) {
      console.debug(message);
    }
  },
  /**
   * Logs an info message if the current log level is INFO or higher.
   * @param message - The message to log.
   */
  info: (message: string) => {
    if (shouldLog(LogLevel.INFO)) {
      console.log(message); // Using console.log for INFO
    }
  },
  /**
   * Logs a warning message if the current log level is WARN or higher.
   * @param message - The message to log.
   */
  warn: (message: string) => {
    if (shouldLog(LogLevel.WARN)) {
      console.warn(message);
    }
  },
  /**
   * Logs an error message if the current log level is ERROR or higher (always logs).
   * @param message - The message to log.
   */
  error: (message: string) => {
    if (shouldLog(LogLevel.ERROR)) {
      console.error(message);
    }
  },
};

/**
 * Creates a logger whose messages carry a `[NorthMCP.<scope>]` prefix.
 * Level filtering is shared with the root logger.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[NorthMCP.${scope}]`;
  return {
    debug: (message: string) => logger.debug(`${prefix} ${message}`),
    info: (message: string) => logger.info(`${prefix} ${message}`),
    warn: (message: string) => logger.warn(`${prefix} ${message}`),
    error: (message: string) => logger.error(`${prefix} ${message}`),
  };
}
