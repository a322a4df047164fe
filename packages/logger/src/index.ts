/**
 * @hostkit/logger
 *
 * Leveled logger with a pluggable sink. The default sink prints to the
 * terminal; tests swap in `createMemorySink()`.
 */

import { createConsoleSink } from "./console-sink.js"

export type LogLevel = "debug" | "info" | "success" | "warn" | "error" | "header" | "footer"

export interface LogContext {
  component?: string
  group?: string
  action?: string
  [key: string]: unknown
}

export interface LogEntry {
  level: LogLevel
  message: string
  error?: unknown
  context?: LogContext
  timestamp: string
}

export type LogSink = (entry: LogEntry) => void

export interface LoggerOptions {
  sink?: LogSink
  /** Drop header/footer banners. Progress and errors still print. */
  quiet?: boolean
  /** Emit debug entries */
  verbose?: boolean
  /** Merged into every entry's context */
  context?: LogContext
  now?: () => Date
}

export interface Logger {
  debug(message: string, context?: LogContext): void
  info(message: string, context?: LogContext): void
  success(message: string, context?: LogContext): void
  warn(message: string, error?: unknown, context?: LogContext): void
  error(message: string, error?: unknown, context?: LogContext): void
  header(title: string): void
  footer(message: string): void
  child(context: LogContext): Logger
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const sink = options.sink ?? createConsoleSink()
  const now = options.now ?? (() => new Date())
  const base = options.context

  const log = (level: LogLevel, message: string, error?: unknown, context?: LogContext): void => {
    if (options.quiet && (level === "header" || level === "footer")) return
    if (level === "debug" && !options.verbose) return
    const merged = base || context ? { ...base, ...context } : undefined
    sink({ level, message, error, context: merged, timestamp: now().toISOString() })
  }

  return {
    debug: (message, context) => log("debug", message, undefined, context),
    info: (message, context) => log("info", message, undefined, context),
    success: (message, context) => log("success", message, undefined, context),
    warn: (message, error, context) => log("warn", message, error, context),
    error: (message, error, context) => log("error", message, error, context),
    header: title => log("header", title),
    footer: message => log("footer", message),
    child: context => createLogger({ ...options, sink, now, context: { ...base, ...context } }),
  }
}

/** Collects entries in memory; used by tests and by callers that render reports later. */
export function createMemorySink(): { sink: LogSink; entries: LogEntry[] } {
  const entries: LogEntry[] = []
  return { sink: entry => entries.push(entry), entries }
}

export { COLORS, type ConsoleSinkOptions, createConsoleSink } from "./console-sink.js"
