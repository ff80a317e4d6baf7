/**
 * Structured logging to stderr for MCP server observability
 * All logs go to stderr since stdout is reserved for MCP protocol
 */

import { errorCode } from "../errors.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

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

export class Logger {
  #minLevel: LogLevel;

  constructor(minLevel: LogLevel = "info") {
    this.#minLevel = minLevel;
  }

  setLevel(level: LogLevel): void {
    this.#minLevel = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.#minLevel);
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

    // Always use stderr to avoid polluting stdout (MCP protocol channel)
    console.error(JSON.stringify(logEvent));
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

  // Helper for tool execution logging
  toolCall(tool: string, duration_ms: number, success: boolean, err?: unknown): void {
    if (success) {
      this.info("tool.success", { tool, duration_ms });
    } else {
      this.error("tool.error", {
        tool,
        duration_ms,
        err_code: errorCode(err),
        err_message: err instanceof Error ? err.message : String(err),
      });
    }
  }
}

// Singleton logger instance
const envLevel = process.env.LOG_LEVEL;
export const logger = new Logger(envLevel !== undefined && isLogLevel(envLevel) ? envLevel : "info");
