import {
  type GroupOutcome,
  type GroupStatus,
  isProvisionError,
  isSuccessfulStatus,
  type PlanReport,
  type PreviewEntry,
  type ProvisionErrorCode,
} from "@hostkit/engine"
import { COLORS } from "@hostkit/logger"
import { EXIT_CODES, type ExitCode } from "@hostkit/shared"

const BOX_WIDTH = 62

const FIX_HINTS: Record<ProvisionErrorCode, string> = {
  MISSING_PLACEHOLDER: "Add the missing value to the template substitutions or fix the template.",
  ACTION_FAILED: "Read the command output above, fix the cause and run again. Completed steps are skipped.",
  VALIDATION_FAILED: "Live files were left untouched. Fix the template or answers and run again.",
  UNCOMMITTABLE: "The host is partially configured. Inspect it by hand before running again.",
  ALREADY_RUNNING: "Wait for the other run to finish.",
  PRECONDITION_FAILED: "Fix the input and run again.",
  PREREQUISITE_MISSING: "Install what is missing and run again.",
  ROLLBACK_FAILED: "The host is partially configured. Inspect it by hand before running again.",
  UNKNOWN: "Run again with --verbose for command output.",
}

/** First failure decides the code; a clean run exits 0 */
export function exitCodeFor(report: PlanReport): ExitCode {
  if (report.status === "succeeded") return EXIT_CODES.OK
  const failed = firstFailure(report)
  return failed?.error?.exitCode ?? EXIT_CODES.ACTION_FAILED
}

export function firstFailure(report: PlanReport): GroupOutcome | undefined {
  return report.groups.find(group => group.status !== "skipped" && !isSuccessfulStatus(group.status))
}

function paint(useColor: boolean, code: string, text: string): string {
  return useColor ? `${code}${text}${COLORS.reset}` : text
}

export function box(title: string, color: string, useColor: boolean): string[] {
  const left = Math.max(0, Math.floor((BOX_WIDTH - title.length) / 2))
  const right = Math.max(0, BOX_WIDTH - title.length - left)
  return [
    `╔${"═".repeat(BOX_WIDTH)}╗`,
    `║${" ".repeat(left)}${title}${" ".repeat(right)}║`,
    `╚${"═".repeat(BOX_WIDTH)}╝`,
  ].map(line => paint(useColor, color, line))
}

/**
 * Failure block printed to stderr: box, the error, what was undone, and a
 * fix line.
 */
export function formatFailure(error: unknown, outcome: GroupOutcome | undefined, useColor: boolean): string[] {
  const message = error instanceof Error ? error.message : String(error)
  const lines = ["", ...box("Run Failed", COLORS.red, useColor), ""]

  lines.push(`${paint(useColor, COLORS.red, "Error:")} ${message}`)
  if (outcome) lines.push(`Group: ${outcome.group} (${outcome.status})`)

  const rollback = outcome?.rollback
  if (rollback && rollback.restored.length > 0) lines.push(`Rolled back: ${rollback.restored.join(", ")}`)
  if (rollback && rollback.notReversible.length > 0) lines.push(`Not reversible: ${rollback.notReversible.join(", ")}`)
  for (const failure of rollback?.failures ?? []) {
    lines.push(`Rollback of ${failure.action} failed: ${failure.message}`)
  }

  const fix = isProvisionError(error) ? (error.hint ?? FIX_HINTS[error.code]) : FIX_HINTS.UNKNOWN
  lines.push("", `${paint(useColor, COLORS.yellow, "Fix:")} ${fix}`, "")
  return lines
}

const STATUS_LABELS: Record<GroupStatus, string> = {
  applied: "applied",
  "already-satisfied": "already satisfied",
  failed: "failed",
  "validation-failed": "failed validation",
  "rolled-back": "rolled back",
  uncommittable: "uncommittable",
  skipped: "skipped",
}

/** e.g. "4 groups: 2 applied, 1 already satisfied, 1 failed" */
export function formatSummary(report: PlanReport): string {
  const counts = new Map<GroupStatus, number>()
  for (const group of report.groups) {
    counts.set(group.status, (counts.get(group.status) ?? 0) + 1)
  }
  const parts = [...counts].map(([status, count]) => `${count} ${STATUS_LABELS[status]}`)
  const noun = report.groups.length === 1 ? "group" : "groups"
  return parts.length === 0 ? "Nothing to do" : `${report.groups.length} ${noun}: ${parts.join(", ")}`
}

/** Dry-run listing, one line per action under its group */
export function formatPreview(entries: readonly PreviewEntry[]): string[] {
  const lines: string[] = []
  let current: string | undefined
  let pending = 0

  for (const entry of entries) {
    if (entry.group !== current) {
      current = entry.group
      lines.push(entry.group)
    }
    if (entry.state === "satisfied") {
      lines.push(`  = ${entry.action}`)
    } else if (entry.state === "unsatisfied") {
      pending++
      lines.push(`  + ${entry.action}`)
    } else {
      pending++
      lines.push(`  ? ${entry.action} (${entry.error ?? "check failed"})`)
    }
  }

  lines.push("", pending === 0 ? "Nothing would change." : `${pending} of ${entries.length} actions would run.`)
  return lines
}
