// Structured logging service with multiple levels and redaction of sensitive fields
// Emits one JSON object per line to the console and optionally appends to a file

import { appendFile } from "node:fs/promises";

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  FATAL = 4,
}

export interface LogContext {
  requestId?: string;
  clientIp?: string;
}

export interface LogEntry extends LogContext {
  timestamp: string;
  level: string;
  service: string;
  message: string;
  data?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export interface LoggerConfig {
  level: LogLevel;
  service: string;
  enableConsole: boolean;
  enableFile?: boolean;
  filePath?: string;
  redactSensitive: boolean;
}

/** Minimal surface the services log through; satisfied by both logger classes below. */
export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: unknown, data?: Record<string, unknown>): void;
  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void;
}

const SENSITIVE_FIELDS = ["password", "secret", "token", "apikey", "api_key", "authorization", "cookie"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function describeError(error: unknown): LogEntry["error"] {
  if (!(error instanceof Error)) return undefined;
  return {
    name: error.name,
    message: error.message,
    ...(error.stack ? { stack: error.stack } : {}),
  };
}

export class StructuredLogger implements Logger {
  private config: LoggerConfig;
  private readonly sensitiveFields: readonly string[] = SENSITIVE_FIELDS;

  constructor(config: LoggerConfig) {
    this.config = config;
  }

  debug(message: string, data?: Record<string, unknown>, context?: LogContext): void {
    this.log(LogLevel.DEBUG, message, data, context);
  }

  info(message: string, data?: Record<string, unknown>, context?: LogContext): void {
    this.log(LogLevel.INFO, message, data, context);
  }

  warn(message: string, data?: Record<string, unknown>, context?: LogContext): void {
    this.log(LogLevel.WARN, message, data, context);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>, context?: LogContext): void {
    this.log(LogLevel.ERROR, message, data, context, describeError(error));
  }

  // Fatal entries bypass the level filter
  fatal(message: string, error?: unknown, data?: Record<string, unknown>, context?: LogContext): void {
    this.write(LogLevel.FATAL, this.buildEntry(LogLevel.FATAL, message, data, context, describeError(error)));
  }

  /**
   * Build the entry without writing it anywhere; used by the writers and by tests
   */
  buildEntry(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    context?: LogContext,
    error?: LogEntry["error"],
  ): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level: LogLevel[level],
      service: this.config.service,
      message,
      ...(context?.requestId ? { requestId: context.requestId } : {}),
      ...(context?.clientIp ? { clientIp: context.clientIp } : {}),
      ...(data ? { data: this.config.redactSensitive ? this.redact(data) : data } : {}),
      ...(error ? { error } : {}),
    };
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.config.level <= level;
  }

  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    context?: LogContext,
    error?: LogEntry["error"],
  ): void {
    if (!this.isLevelEnabled(level)) return;
    this.write(level, this.buildEntry(level, message, data, context, error));
  }

  private write(level: LogLevel, entry: LogEntry): void {
    if (this.config.enableConsole) {
      this.logToConsole(level, entry);
    }

    if (this.config.enableFile && this.config.filePath) {
      void this.logToFile(this.config.filePath, entry);
    }
  }

  private logToConsole(level: LogLevel, entry: LogEntry): void {
    const formatted = JSON.stringify(entry);

    switch (level) {
      case LogLevel.DEBUG:
        console.debug(formatted);
        break;
      case LogLevel.INFO:
        console.info(formatted);
        break;
      case LogLevel.WARN:
        console.warn(formatted);
        break;
      case LogLevel.ERROR:
      case LogLevel.FATAL:
        console.error(formatted);
        break;
    }
  }

  private async logToFile(filePath: string, entry: LogEntry): Promise<void> {
    try {
      await appendFile(filePath, JSON.stringify(entry) + "\n", "utf8");
    } catch (error) {
      // Fall back to the console so the entry is not lost
      console.error("Failed to write to log file:", error);
      console.error("Original log entry:", JSON.stringify(entry));
    }
  }

  private redact(data: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(data)) {
      const lowerKey = key.toLowerCase();
      const isSensitive = this.sensitiveFields.some((field) => lowerKey.includes(field));

      if (isSensitive) {
        result[key] = "[REDACTED]";
      } else if (isRecord(value)) {
        result[key] = this.redact(value);
      } else {
        result[key] = value;
      }
    }

    return result;
  }

  /**
   * Create a child logger that stamps every entry with request context
   */
  child(context: LogContext): ContextLogger {
    return new ContextLogger(this, context);
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }
}

/**
 * Context-aware logger that maintains request context
 */
export class ContextLogger implements Logger {
  constructor(
    private parent: StructuredLogger,
    private context: LogContext,
  ) {}

  debug(message: string, data?: Record<string, unknown>): void {
    this.parent.debug(message, data, this.context);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.parent.info(message, data, this.context);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.parent.warn(message, data, this.context);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.parent.error(message, error, data, this.context);
  }

  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.parent.fatal(message, error, data, this.context);
  }
}

/**
 * Create a logger instance with environment-based configuration
 */
export function createLogger(service: string, env: NodeJS.ProcessEnv = process.env): StructuredLogger {
  const level = parseLogLevel(env.CONFMAPPER_LOG_LEVEL || "INFO");
  const verbose = env.CONFMAPPER_VERBOSE === "true";
  const filePath = env.CONFMAPPER_LOG_FILE || undefined;

  return new StructuredLogger({
    level: verbose ? LogLevel.DEBUG : level,
    service,
    enableConsole: true,
    enableFile: filePath !== undefined,
    filePath,
    redactSensitive: env.CONFMAPPER_LOG_REDACT_SENSITIVE !== "false",
  });
}

/**
 * Logger with every writer switched off; the default for services built without one
 */
export function createSilentLogger(service: string): StructuredLogger {
  return new StructuredLogger({
    level: LogLevel.FATAL,
    service,
    enableConsole: false,
    redactSensitive: false,
  });
}

export function parseLogLevel(levelStr: string): LogLevel {
  switch (levelStr.toUpperCase()) {
    case "DEBUG":
      return LogLevel.DEBUG;
    case "INFO":
      return LogLevel.INFO;
    case "WARN":
    case "WARNING":
      return LogLevel.WARN;
    case "ERROR":
      return LogLevel.ERROR;
    case "FATAL":
      return LogLevel.FATAL;
    default:
      return LogLevel.INFO;
  }
}

export default StructuredLogger;
