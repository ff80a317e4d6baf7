/**
 * Structured logging for index build, query and proximity events
 *
 * Each event name carries a fixed details shape, so a call site cannot log
 * an event with fields that belong to another.
 */

import type { IndexKind, QueryMethod } from "../types.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEvents {
  "dataset.load": { path: string; properties: number; durationMs: number };
  "index.build.start": { index: IndexKind; properties: number };
  "index.build.end": { index: IndexKind; properties: number; keys: number; durationMs: number };
  "index.build.empty_dataset": { properties: 0 };
  "index.verify.failed": { problems: number };
  "query.compare": {
    method: QueryMethod;
    predicates: number;
    total: number;
    hashSetMs: number | null;
    postingListMs: number | null;
  };
  "query.mismatch": { predicates: number; onlyInHashSet: number; onlyInPostingList: number };
  "proximity.graph.build": { nodes: number; unlocated: number; k: number; durationMs: number };
}

export type LogEvent = keyof LogEvents;

export interface LogEntry<E extends LogEvent = LogEvent> {
  timestamp: string;
  level: LogLevel;
  event: E;
  details: LogEvents[E];
}

const MESSAGES: Partial<Record<LogEvent, string>> = {
  "index.build.empty_dataset": "every query will match nothing",
  "query.mismatch": "hash-set and posting-list results differ",
};

function formatValue(value: unknown): string {
  return typeof value === "number" && !Number.isInteger(value) ? value.toFixed(3) : String(value);
}

/**
 * One line per entry: `[ts] [LEVEL] [event] key=value ... (message)`
 */
export function formatEntry(entry: LogEntry): string {
  const parts = [`[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.event}]`];
  for (const [key, value] of Object.entries(entry.details)) {
    parts.push(`${key}=${formatValue(value)}`);
  }
  const message = MESSAGES[entry.event];
  if (message) {
    parts.push(`(${message})`);
  }
  return parts.join(" ");
}

class Logger {
  #enabled = true;

  log<E extends LogEvent>(level: LogLevel, event: E, details: LogEvents[E]): void {
    if (!this.#enabled) return;
    if (level === "debug" && !process.env.HOMEINDEX_DEBUG) return;

    const line = formatEntry({ timestamp: new Date().toISOString(), level, event, details });

    switch (level) {
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
  }

  debug<E extends LogEvent>(event: E, details: LogEvents[E]): void {
    this.log("debug", event, details);
  }

  info<E extends LogEvent>(event: E, details: LogEvents[E]): void {
    this.log("info", event, details);
  }

  warn<E extends LogEvent>(event: E, details: LogEvents[E]): void {
    this.log("warn", event, details);
  }

  error<E extends LogEvent>(event: E, details: LogEvents[E]): void {
    this.log("error", event, details);
  }

  /**
   * The CLI turns logging off unless --verbose is given
   */
  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }
}

export const logger = new Logger();
