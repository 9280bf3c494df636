import winston from "winston";
import DailyRotateFile from "winston-daily-rotate-file";

type LogLevel = "debug" | "info" | "warn" | "error";

interface LogContext {
  component?: string;
  queue?: string;
  consumerTag?: string;
  deliveryTag?: number;
  durationMs?: number;
  errorStack?: string;
  errorCode?: string;
  [key: string]: unknown;
}

interface LogConfig {
  level: LogLevel;
  /** Directory for rotating log files; console-only when unset */
  dir?: string;
}

const DEFAULT_LEVEL: LogLevel = "warn";

function resolveLevel(value: string | undefined): LogLevel {
  switch (value) {
    case "debug":
    case "info":
    case "warn":
    case "error":
      return value;
    default:
      return DEFAULT_LEVEL;
  }
}

/**
 * Builds the shared winston instance.
 * Console output goes to stderr: stdout carries retrieved messages.
 */
function createWinstonLogger(level: LogLevel): winston.Logger {
  return winston.createLogger({
    level,
    silent: process.env.NODE_ENV === "test" && !process.env.LOG_LEVEL,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    ),
    transports: [
      new winston.transports.Console({
        stderrLevels: ["debug", "info", "warn", "error"],
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.printf(({ timestamp, level, message, service, ...meta }) => {
            const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
            return `${timestamp} [${level}] [${service || "queuetap"}] ${message}${metaStr}`;
          })
        ),
      }),
    ],
  });
}

/**
 * Thin wrapper over winston:
 * - one winston instance shared by every child
 * - child loggers only add a service prefix
 */
class Logger {
  private prefix: string;
  private winston: winston.Logger;

  constructor(prefix: string = "queuetap", instance?: winston.Logger) {
    this.prefix = prefix;
    this.winston = instance ?? createWinstonLogger(resolveLevel(process.env.LOG_LEVEL));
  }

  /**
   * Apply level and file settings after configuration is loaded.
   * Affects every logger created from the same root.
   */
  configure(config: LogConfig): void {
    this.winston.level = config.level;

    if (config.dir) {
      this.winston.add(
        new DailyRotateFile({
          dirname: config.dir,
          filename: "queuetap-%DATE%.log",
          datePattern: "YYYY-MM-DD",
          maxSize: "20m",
          maxFiles: "14d",
          format: winston.format.json(),
        })
      );
      this.winston.add(
        new DailyRotateFile({
          dirname: config.dir,
          filename: "queuetap-error-%DATE%.log",
          datePattern: "YYYY-MM-DD",
          level: "error",
          maxSize: "20m",
          maxFiles: "30d",
          format: winston.format.json(),
        })
      );
    }
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    this.winston.log(level, message, { service: this.prefix, ...context });
  }

  info(message: string, context?: LogContext): void {
    this.write("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write("warn", message, context);
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    const errorContext: LogContext = { ...context };
    if (error instanceof Error) {
      errorContext.errorStack = error.stack || error.message;
      if ("code" in error && (typeof error.code === "string" || typeof error.code === "number")) {
        errorContext.errorCode = String(error.code);
      }
    } else if (error !== undefined) {
      errorContext.errorStack = String(error);
    }

    this.write("error", message, errorContext);
  }

  debug(message: string, context?: LogContext): void {
    this.write("debug", message, context);
  }

  /**
   * Create child logger with nested prefix
   */
  child(name: string): Logger {
    return new Logger(`${this.prefix}:${name}`, this.winston);
  }

  /**
   * Log with performance timing
   */
  timed(message: string, startTime: number, context?: LogContext): void {
    const durationMs = Date.now() - startTime;
    this.debug(message, { ...context, durationMs });
  }
}

export const logger = new Logger();
export { Logger, resolveLevel };
export type { LogContext, LogLevel, LogConfig };
