/**
 * Structured JSON Logging Utility
 *
 * Every entry is a flat JSON object carrying the request context, so
 * entries can be searched and correlated by traceId in Grafana Loki.
 */

export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

export interface LogContext {
  traceId: string;
  path: string;
  service: string;
  method?: string;
}

export interface BaseLogEntry {
  timestamp: string;
  service: string;
  level: LogLevel;
  traceId: string;
  path: string;
  method?: string;
  message: string;
}

export interface DataOperationLogEntry extends BaseLogEntry {
  type: "data_operation";
  operation: "memory" | "file";
  key?: string;
  latencyMs: number;
  error?: string;
}

export interface GeneralLogEntry extends BaseLogEntry {
  type?: "general";
  [key: string]: unknown;
}

export type LogEntry = BaseLogEntry | DataOperationLogEntry | GeneralLogEntry;

/**
 * Logger class that maintains a log buffer and context
 */
export class Logger {
  private logBuffer: LogEntry[] = [];
  private readonly context: LogContext;

  constructor(context: LogContext) {
    this.context = context;
  }

  /**
   * Get the current log buffer (for shipping)
   */
  getLogs(): LogEntry[] {
    return [...this.logBuffer];
  }

  private createBaseLog(level: LogLevel, message: string): BaseLogEntry {
    const entry: BaseLogEntry = {
      timestamp: new Date().toISOString(),
      service: this.context.service,
      level,
      traceId: this.context.traceId,
      path: this.context.path,
      message,
    };
    if (this.context.method) {
      entry.method = this.context.method;
    }
    return entry;
  }

  info(message: string, extra?: Record<string, unknown>): void {
    const entry: GeneralLogEntry = {
      ...this.createBaseLog("INFO", message),
      type: "general",
      ...extra,
    };
    this.logBuffer.push(entry);
    console.log(JSON.stringify(entry));
  }

  warn(message: string, extra?: Record<string, unknown>): void {
    const entry: GeneralLogEntry = {
      ...this.createBaseLog("WARN", message),
      type: "general",
      ...extra,
    };
    this.logBuffer.push(entry);
    console.warn(JSON.stringify(entry));
  }

  /**
   * Log an error message. Error instances are expanded into name, message
   * and stack; anything else is stringified.
   */
  error(message: string, error?: unknown, extra?: Record<string, unknown>): void {
    const entry: GeneralLogEntry = {
      ...this.createBaseLog("ERROR", message),
      type: "general",
      ...extra,
    };

    if (error instanceof Error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    } else if (error) {
      entry.error = String(error);
    }

    this.logBuffer.push(entry);
    console.error(JSON.stringify(entry));
  }

  /**
   * Log a store operation (in-memory map or file write) with its latency
   */
  logDataOperation(
    message: string,
    options: {
      operation: "memory" | "file";
      key?: string;
      latencyMs: number;
      error?: string;
    }
  ): void {
    const entry: DataOperationLogEntry = {
      ...this.createBaseLog(options.error ? "ERROR" : "DEBUG", message),
      type: "data_operation",
      ...options,
    };
    this.logBuffer.push(entry);
    if (options.error) {
      console.error(JSON.stringify(entry));
    } else {
      console.log(JSON.stringify(entry));
    }
  }
}
