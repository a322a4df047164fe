import { mkdtempSync, rmSync } from "node:fs"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { ProvisionError } from "../src/errors.js"
import type { CommandOptions, CommandResult, CommandRunner } from "../src/executors/common.js"
import type { Action, CheckState } from "../src/types.js"

export interface RecordedCall {
  command: string
  args: string[]
  options?: CommandOptions
}

type Responder = (command: string, args: readonly string[]) => Partial<CommandResult> | undefined

/**
 * In-process CommandRunner. Unmatched commands succeed with empty output.
 */
export function fakeRunner(respond: Responder = () => undefined): { runner: CommandRunner; calls: RecordedCall[] } {
  const calls: RecordedCall[] = []
  const runner: CommandRunner = async (command, args, options) => {
    calls.push({ command, args: [...args], options })
    const response = respond(command, args) ?? {}
    return { exitCode: response.exitCode ?? 0, stdout: response.stdout ?? "", stderr: response.stderr ?? "" }
  }
  return { runner, calls }
}

export function commandLine(call: RecordedCall): string {
  return [call.command, ...call.args].join(" ")
}

export function makeTempDir(prefix = "hostkit-engine-"): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), prefix))
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) }
}

/** Catch the error a call throws, for asserting on its fields */
export async function captureError(fn: () => unknown): Promise<unknown> {
  try {
    await fn()
  } catch (error) {
    return error
  }
  throw new Error("expected the call to throw")
}

export async function captureProvisionError(fn: () => unknown): Promise<ProvisionError> {
  const error = await captureError(fn)
  if (!(error instanceof ProvisionError)) {
    throw new Error(`expected a ProvisionError, got ${String(error)}`)
  }
  return error
}

export interface FakeAction extends Action {
  applied: number
  rolledBack: number
}

/**
 * Direct (non-file) mutation whose state lives in memory.
 */
export function fakeAction(
  name: string,
  options: {
    satisfied?: boolean
    applyError?: Error
    reversible?: boolean
    rollbackError?: Error
    policy?: Action["policy"]
    stickyUnsatisfied?: boolean
  } = {},
): FakeAction {
  let state: CheckState = options.satisfied ? "satisfied" : "unsatisfied"
  const action: FakeAction = {
    name,
    policy: options.policy,
    applied: 0,
    rolledBack: 0,
    async check() {
      return state
    },
    async apply() {
      if (options.applyError) throw options.applyError
      action.applied += 1
      if (!options.stickyUnsatisfied) state = "satisfied"
    },
  }
  if (options.reversible) {
    action.rollback = async () => {
      if (options.rollbackError) throw options.rollbackError
      action.rolledBack += 1
      state = "unsatisfied"
    }
  }
  return action
}
