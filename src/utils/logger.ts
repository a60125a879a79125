import winston from "winston";

export enum LogLevel {
  ERROR = "error",
  WARN = "warn",
  INFO = "info",
  DEBUG = "debug",
}

export interface LogContext {
  module?: string;
  backend?: string;
  codec?: string;
  streams?: number;
  [key: string]: unknown;
}

export interface LoggerConfig {
  level: LogLevel;
  enableConsole?: boolean;
  enableFile?: boolean;
  logDir?: string;
}

// stdout is reserved for the report document
const ALL_LEVELS = Object.values(LogLevel);

class Logger {
  private winston: winston.Logger;

  constructor(config: LoggerConfig) {
    const transports: winston.transport[] = [];

    // Console transport
    if (config.enableConsole !== false) {
      transports.push(
        new winston.transports.Console({
          stderrLevels: ALL_LEVELS,
          format: winston.format.combine(
            winston.format.timestamp(),
            winston.format.colorize(),
            winston.format.printf(({ timestamp, level, message, service: _service, ...meta }) => {
              const metaStr =
                Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
              return `${timestamp} [${level}]: ${message}${metaStr}`;
            }),
          ),
        }),
      );
    }

    // File transport
    if (config.enableFile) {
      const logDir = config.logDir || "logs";
      transports.push(
        new winston.transports.File({
          filename: `${logDir}/error.log`,
          level: "error",
          format: winston.format.combine(
            winston.format.timestamp(),
            winston.format.json(),
          ),
        }),
        new winston.transports.File({
          filename: `${logDir}/combined.log`,
          format: winston.format.combine(
            winston.format.timestamp(),
            winston.format.json(),
          ),
        }),
      );
    }

    this.winston = winston.createLogger({
      level: config.level,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json(),
      ),
      transports,
      silent: transports.length === 0,
      defaultMeta: {
        service: "hwa-bench",
      },
    });
  }

  private log(level: LogLevel, message: string, context?: LogContext) {
    this.winston.log(level, message, context);
  }

  error(message: string, context?: LogContext) {
    this.log(LogLevel.ERROR, message, context);
  }

  warn(message: string, context?: LogContext) {
    this.log(LogLevel.WARN, message, context);
  }

  info(message: string, context?: LogContext) {
    this.log(LogLevel.INFO, message, context);
  }

  debug(message: string, context?: LogContext) {
    this.log(LogLevel.DEBUG, message, context);
  }

  // Helper method to log errors with full context
  logError(error: Error | string, context?: LogContext) {
    const errorMessage = error instanceof Error ? error.message : error;
    const errorContext = {
      ...context,
      stack: error instanceof Error ? error.stack : undefined,
    };
    this.error(errorMessage, errorContext);
  }

  // Helper method to log the outcome of one transcode trial
  logTrial(
    trial: { backend: string; condition: string; streams: number },
    outcome: { speed: number | null; passing: boolean; error: string | null },
    context?: LogContext,
  ) {
    const speed = outcome.speed === null ? "n/a" : `${outcome.speed}x`;
    const verdict = outcome.passing ? "passing" : outcome.error ?? "failing";
    this.info(
      `${trial.backend} ${trial.condition} with ${trial.streams} stream(s): ${speed} (${verdict})`,
      {
        ...context,
        backend: trial.backend,
        streams: trial.streams,
      },
    );
  }
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const normalized = value?.trim().toLowerCase();
  return ALL_LEVELS.find((level) => level === normalized);
}

// Global logger instance
let globalLogger: Logger | undefined;

export function initializeLogger(config: LoggerConfig): Logger {
  globalLogger = new Logger(config);
  return globalLogger;
}

export function getLogger(): Logger {
  if (!globalLogger) {
    // Fallback logger if not initialized
    globalLogger = new Logger({
      level: parseLogLevel(process.env.LOG_LEVEL) ?? LogLevel.INFO,
      enableConsole: true,
      enableFile: false,
    });
  }
  return globalLogger;
}

export { Logger };
