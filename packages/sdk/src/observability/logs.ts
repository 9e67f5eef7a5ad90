/**
 * Structured logging for document operations
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  label?: string;
  message?: string;
  details?: Record<string, unknown>;
}

/**
 * Render an entry as a single console line
 */
export function formatLogEntry(entry: LogEntry): string {
  const parts = [`[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.event}]`];

  if (entry.label) {
    parts.push(entry.label);
  }

  if (entry.message) {
    parts.push(entry.message);
  }

  if (entry.details) {
    parts.push(JSON.stringify(entry.details));
  }

  return parts.join(" ");
}

class Logger {
  #enabled = true;

  /**
   * Log an event
   */
  log(level: LogLevel, event: string, data?: Partial<LogEntry>): void {
    if (!this.#enabled) return;

    const entry: LogEntry = {
      ...data,
      timestamp: new Date().toISOString(),
      level,
      event,
    };
    const line = formatLogEntry(entry);

    // Route to appropriate console method
    switch (level) {
      case "debug":
        if (process.env.DOCPATH_DEBUG) {
          console.debug(line);
        }
        break;
      case "info":
        console.log(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "error":
        console.error(line);
        break;
    }
  }

  debug(event: string, data?: Partial<LogEntry>): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Partial<LogEntry>): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Partial<LogEntry>): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Partial<LogEntry>): void {
    this.log("error", event, data);
  }

  /**
   * Enable/disable logging
   */
  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
