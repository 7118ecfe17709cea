/**
 * Structured logging for container, search, index and task operations
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  container?: string;
  field?: string;
  message?: string;
  details?: Record<string, unknown>;
}

/**
 * Receives every formatted line that passes the level filter
 */
export type LogSink = (line: string, entry: LogEntry) => void;

type LogData = Partial<Omit<LogEntry, "timestamp" | "level" | "event">>;

/**
 * Route a line to the console method matching its level
 */
const consoleSink: LogSink = (line, entry) => {
  switch (entry.level) {
    case "debug":
      console.debug(line);
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
};

function initialLevel(): LogLevel {
  if (process.env.ANNOSTORE_DEBUG) return "debug";
  const fromEnv = process.env.ANNOSTORE_LOG_LEVEL;
  return LEVELS.find((l) => l === fromEnv) ?? "info";
}

class Logger {
  #enabled = true;
  #minLevel: LogLevel = initialLevel();
  #sink: LogSink = consoleSink;

  log(level: LogLevel, event: string, data?: LogData): void {
    if (!this.#enabled) return;
    if (LEVELS.indexOf(level) < LEVELS.indexOf(this.#minLevel)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    const parts = [`[${entry.timestamp}] [${level.toUpperCase()}] [${event}]`];

    if (entry.container || entry.field) {
      parts.push(`${entry.container ?? ""}/${entry.field ?? ""}`);
    }
    if (entry.message) {
      parts.push(entry.message);
    }
    if (entry.details) {
      parts.push(JSON.stringify(entry.details));
    }

    this.#sink(parts.join(" "), entry);
  }

  debug(event: string, data?: LogData): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: LogData): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: LogData): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: LogData): void {
    this.log("error", event, data);
  }

  /**
   * Enable/disable logging
   */
  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }

  setLevel(level: LogLevel): void {
    this.#minLevel = level;
  }

  /**
   * Replace the output sink; `undefined` restores console output
   */
  setSink(sink?: LogSink): void {
    this.#sink = sink ?? consoleSink;
  }
}

export type { Logger };

/**
 * Global logger instance
 */
export const logger = new Logger();
