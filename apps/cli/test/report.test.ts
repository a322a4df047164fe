import { type GroupOutcome, type PlanReport, ProvisionError } from "@hostkit/engine"
import { describe, expect, it } from "vitest"
import { box, exitCodeFor, formatFailure, formatPreview, formatSummary } from "../src/report.js"

function outcome(group: string, status: GroupOutcome["status"], error?: ProvisionError): GroupOutcome {
  return { group, status, results: [], error }
}

describe("report", () => {
  describe("exitCodeFor", () => {
    it("is 0 for a successful plan", () => {
      expect(exitCodeFor({ status: "succeeded", groups: [outcome("Swap", "applied")] })).toBe(0)
    })

    it("takes the code of the first failed group, ignoring skipped ones", () => {
      const report: PlanReport = {
        status: "failed",
        groups: [
          outcome("Swap", "already-satisfied"),
          outcome("SSH daemon", "validation-failed", ProvisionError.validationFailed("SSH daemon", "bad")),
          outcome("Firewall", "skipped"),
        ],
      }
      expect(exitCodeFor(report)).toBe(3)
    })

    it("falls back to an action failure when the group carries no error", () => {
      expect(exitCodeFor({ status: "failed", groups: [outcome("Swap", "failed")] })).toBe(1)
    })
  })

  it("draws a centred box", () => {
    expect(box("Run Failed", "", false)).toEqual([
      `╔${"═".repeat(62)}╗`,
      `║${" ".repeat(26)}Run Failed${" ".repeat(26)}║`,
      `╚${"═".repeat(62)}╝`,
    ])
  })

  it("formats a failure with what was undone and the error's own fix", () => {
    const error = ProvisionError.validationFailed("User deploy", "visudo: syntax error")
    const failed: GroupOutcome = {
      ...outcome("User deploy", "validation-failed", error),
      rollback: { restored: ["create user deploy"], notReversible: [], failures: [] },
    }

    expect(formatFailure(error, failed, false).slice(4)).toEqual([
      "",
      "Error: Validation failed for User deploy: visudo: syntax error",
      "Group: User deploy (validation-failed)",
      "Rolled back: create user deploy",
      "",
      "Fix: Live files were left untouched. Fix the template or answers and run again.",
      "",
    ])
  })

  it("falls back to a per-code fix and handles plain errors", () => {
    const missing = ProvisionError.prerequisiteMissing("Build output dist not found")
    expect(formatFailure(missing, undefined, false)).toContain("Fix: Install what is missing and run again.")
    expect(formatFailure(new Error("boom"), undefined, false)).toContain(
      "Fix: Run again with --verbose for command output.",
    )
  })

  it("colours the labels when asked", () => {
    const lines = formatFailure(ProvisionError.generic("boom"), undefined, true)
    expect(lines).toContain("\x1b[31mError:\x1b[0m boom")
  })

  it("summarises group statuses", () => {
    const report: PlanReport = {
      status: "failed",
      groups: [
        outcome("a", "applied"),
        outcome("b", "applied"),
        outcome("c", "already-satisfied"),
        outcome("d", "rolled-back"),
        outcome("e", "skipped"),
      ],
    }
    expect(formatSummary(report)).toBe("5 groups: 2 applied, 1 already satisfied, 1 rolled back, 1 skipped")
    expect(formatSummary({ status: "succeeded", groups: [] })).toBe("Nothing to do")
  })

  it("lists a dry run by group", () => {
    expect(
      formatPreview([
        { group: "Swap", action: "allocate 2G swap file", state: "unsatisfied" },
        { group: "Swap", action: "activate /swapfile", state: "satisfied" },
        { group: "Firewall", action: "enable ufw", state: "error", error: "ufw: not found" },
      ]),
    ).toEqual([
      "Swap",
      "  + allocate 2G swap file",
      "  = activate /swapfile",
      "Firewall",
      "  ? enable ufw (ufw: not found)",
      "",
      "2 of 3 actions would run.",
    ])
  })
})
