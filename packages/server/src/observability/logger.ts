/**
 * Structured logging to stderr for MCP server observability
 * All logs go to stderr since stdout is reserved for MCP protocol
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogEvent {
  ts: string;
  level: LogLevel;
  event: string;
  tool?: string;
  duration_ms?: number;
  err_code?: string;
  err_message?: string;
  [key: string]: unknown;
}

export type LogWriter = (line: string) => void;

const stderrWriter: LogWriter = (line) => {
  console.error(line);
};

function errorCodeOf(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err) {
    return String(err.code);
  }
  return undefined;
}

export class Logger {
  #minLevel: LogLevel;
  #write: LogWriter;
  #enabled = true;

  constructor(minLevel: LogLevel = "info", write: LogWriter = stderrWriter) {
    this.#minLevel = minLevel;
    this.#write = write;
  }

  private shouldLog(level: LogLevel): boolean {
    return this.#enabled && LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.#minLevel);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const logEvent: LogEvent = {
      ts: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    this.#write(JSON.stringify(logEvent));
  }

  debug(event: string, data?: Record<string, unknown>): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log("error", event, data);
  }

  setLevel(level: LogLevel): void {
    this.#minLevel = level;
  }

  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }

  // Helper for tool execution logging
  toolCall(tool: string, duration_ms: number, success: boolean, err?: Error): void {
    if (success) {
      this.info("tool.success", { tool, duration_ms });
    } else {
      this.error("tool.error", {
        tool,
        duration_ms,
        err_code: errorCodeOf(err) ?? "UNKNOWN",
        err_message: err?.message ?? "unknown error",
      });
    }
  }
}

function levelFromEnv(): LogLevel {
  return LOG_LEVELS.find((l) => l === process.env.LOG_LEVEL) ?? "info";
}

// Singleton logger instance
export const logger = new Logger(levelFromEnv());
