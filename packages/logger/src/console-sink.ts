import type { LogEntry, LogSink } from "./index.js"

export const COLORS = {
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  bold: "\x1b[1m",
} as const

export interface ConsoleSinkOptions {
  /** ANSI colours. Defaults to off when NO_COLOR is set */
  color?: boolean
  out?: (line: string) => void
  err?: (line: string) => void
}

function describeError(error: unknown): string | null {
  if (error === undefined || error === null) return null
  if (error instanceof Error) return error.message
  return String(error)
}

/**
 * Human-facing sink: one line per entry with ✓ ✗ ⚠ ▸ markers.
 * Errors go to stderr, everything else to stdout.
 */
export function createConsoleSink(options: ConsoleSinkOptions = {}): LogSink {
  const useColor = options.color ?? !process.env.NO_COLOR
  const out = options.out ?? ((line: string) => console.log(line))
  const err = options.err ?? ((line: string) => console.error(line))
  const c = (code: string, text: string) => (useColor ? `${code}${text}${COLORS.reset}` : text)

  return (entry: LogEntry) => {
    switch (entry.level) {
      case "debug":
        out(c(COLORS.dim, `  ${entry.message}`))
        return
      case "info":
        out(entry.message)
        return
      case "success":
        out(`${c(COLORS.green, "✓")} ${entry.message}`)
        return
      case "warn": {
        out(`${c(COLORS.yellow, "⚠")} ${entry.message}`)
        const detail = describeError(entry.error)
        if (detail) out(c(COLORS.dim, `  ${detail}`))
        return
      }
      case "error": {
        err(`${c(COLORS.red, "✗")} ${entry.message}`)
        const detail = describeError(entry.error)
        if (detail) err(c(COLORS.dim, `  ${detail}`))
        return
      }
      case "header":
        out(`\n${useColor ? COLORS.bold + COLORS.blue : ""}▸ ${entry.message}${useColor ? COLORS.reset : ""}\n`)
        return
      case "footer":
        out(`\n${c(COLORS.dim, "━".repeat(53))}\n${entry.message}`)
        return
    }
  }
}
