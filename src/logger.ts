/**
 * Structured Logger for the API documentation assistant
 * Pretty single-line output in development, JSON lines in production
 */

export interface LogContext {
  [key: string]:
    | string
    | number
    | boolean
    | null
    | undefined
    | string[]
    | Record<string, unknown>
    | LogContext;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  service: string;
  version: string;
  environment: string;
  pid: number;
  context: LogContext | undefined;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

interface LevelStyle {
  readonly rank: number;
  readonly color: string;
  readonly write: (line: string) => void;
}

const LEVELS: Record<LogLevel, LevelStyle> = {
  debug: { rank: 10, color: "\x1b[90m", write: (line) => console.debug(line) },
  info: { rank: 20, color: "\x1b[36m", write: (line) => console.log(line) },
  warn: { rank: 30, color: "\x1b[33m", write: (line) => console.warn(line) },
  error: { rank: 40, color: "\x1b[31m", write: (line) => console.error(line) },
};

const SILENT_RANK = 100;

class AppLogger {
  private serviceName = "api-docs-rag";
  private version = "1.0.0";
  private environment = process.env.NODE_ENV || "development";
  private isDevelopment = this.environment === "development";

  /**
   * LOG_LEVEL is read on every call; unknown values mean "info"
   */
  private threshold(): number {
    const configured = process.env.LOG_LEVEL;
    if (configured === "silent") return SILENT_RANK;
    switch (configured) {
      case "debug":
      case "info":
      case "warn":
      case "error":
        return LEVELS[configured].rank;
      default:
        return LEVELS.info.rank;
    }
  }

  private createLogEntry(
    level: LogLevel,
    message: string,
    context?: LogContext
  ): LogEntry {
    return {
      level,
      message,
      timestamp: new Date().toISOString(),
      service: this.serviceName,
      version: this.version,
      environment: this.environment,
      pid: process.pid,
      context,
    };
  }

  private output(entry: LogEntry): void {
    const style = LEVELS[entry.level];
    if (style.rank < this.threshold()) return;

    if (this.isDevelopment) {
      const time = new Date(entry.timestamp).toLocaleTimeString();
      const contextStr = entry.context ? ` ${JSON.stringify(entry.context)}` : "";
      style.write(
        `${style.color}[${time}] ${entry.level.toUpperCase()}\x1b[0m ${entry.message}${contextStr}`
      );
      return;
    }

    style.write(
      JSON.stringify({
        "@timestamp": entry.timestamp,
        "@level": entry.level,
        "@message": entry.message,
        "@service": entry.service,
        "@version": entry.version,
        "@environment": entry.environment,
        "@pid": entry.pid,
        ...entry.context,
      })
    );
  }

  info(message: string, context?: LogContext): void {
    this.output(this.createLogEntry("info", message, context));
  }

  warn(message: string, context?: LogContext): void {
    this.output(this.createLogEntry("warn", message, context));
  }

  error(message: string, context?: LogContext): void {
    this.output(this.createLogEntry("error", message, context));
  }

  debug(message: string, context?: LogContext): void {
    this.output(this.createLogEntry("debug", message, context));
  }

  /**
   * Log corpus and index lifecycle events
   */
  corpus(event: string, context?: LogContext): void {
    this.info(`Corpus: ${event}`, {
      type: "corpus",
      event,
      ...context,
    });
  }

  /**
   * Log a completed retrieval
   */
  query(event: string, context?: LogContext): void {
    this.info(`Query: ${event}`, {
      type: "query",
      event,
      ...context,
    });
  }

  request(method: string, path: string, context?: LogContext): void {
    this.info(`${method} ${path}`, {
      type: "request",
      method,
      path,
      ...context,
    });
  }

  /**
   * Log fatal errors that require immediate attention
   */
  fatal(message: string, context?: LogContext): void {
    this.error(`FATAL: ${message}`, {
      type: "fatal",
      severity: "critical",
      ...context,
    });
  }
}

export const logger = new AppLogger();
