/**
 * Structured logging for the catalog
 * Consistent `[component] action` format across collection, query and providers
 */

import { z } from "zod";
import type { LogEntry, LogLevel } from "../types/catalog.types";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const MAX_ENTRIES = 1000;

const logLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

/**
 * Level from FONT_CATALOG_LOG_LEVEL, else debug in development and warn otherwise
 */
export function defaultLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const configured = logLevelSchema.safeParse(env.FONT_CATALOG_LOG_LEVEL?.toLowerCase());
  if (configured.success) return configured.data;
  return env.NODE_ENV === "development" ? "debug" : "warn";
}

/**
 * Logger instance for the catalog.
 * Every entry is kept in memory; only entries at or above the level reach the console.
 */
export class CatalogLogger {
  private entries: LogEntry[] = [];

  constructor(private level: LogLevel) {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  info(component: string, action: string, metadata?: Record<string, unknown>): void {
    this.log("info", component, action, metadata);
  }

  warn(component: string, action: string, metadata?: Record<string, unknown>): void {
    this.log("warn", component, action, metadata);
  }

  error(component: string, action: string, metadata?: Record<string, unknown>): void {
    this.log("error", component, action, metadata);
  }

  debug(component: string, action: string, metadata?: Record<string, unknown>): void {
    this.log("debug", component, action, metadata);
  }

  /**
   * Log with duration since startTime
   */
  timed(
    level: LogEntry["level"],
    component: string,
    action: string,
    startTime: number,
    metadata?: Record<string, unknown>
  ): void {
    this.log(level, component, action, metadata, Date.now() - startTime);
  }

  private log(
    level: LogEntry["level"],
    component: string,
    action: string,
    metadata?: Record<string, unknown>,
    duration?: number
  ): void {
    const entry: LogEntry = { timestamp: Date.now(), level, component, action };
    if (duration !== undefined) entry.duration = duration;
    if (metadata) entry.metadata = { ...metadata };

    this.entries.push(entry);
    if (this.entries.length > MAX_ENTRIES) {
      this.entries.splice(0, this.entries.length - MAX_ENTRIES);
    }

    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

    const message = `[${component}] ${action}`;
    const logData = duration !== undefined ? { ...metadata, duration } : { ...metadata };

    switch (level) {
      case "info":
        console.log(message, logData);
        break;
      case "warn":
        console.warn(message, logData);
        break;
      case "error":
        console.error(message, logData);
        break;
      case "debug":
        console.debug(message, logData);
        break;
    }
  }

  /**
   * Get all log entries
   */
  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  /**
   * Clear log entries
   */
  clear(): void {
    this.entries = [];
  }
}

export const catalogLogger = new CatalogLogger(defaultLogLevel());
