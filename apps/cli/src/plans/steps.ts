import { access } from "node:fs/promises"
import {
  type Action,
  type ActionGroup,
  type ActionPolicy,
  type ApplyContext,
  type CommandRunner,
  commandAction,
  directoryAction,
  hasCommand,
  ProvisionError,
} from "@hostkit/engine"
import { TIMEOUTS } from "@hostkit/shared"
import type { HostContext } from "../context.js"

export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  } catch {
    return false
  }
}

export interface TaskOptions {
  name: string
  policy?: ActionPolicy
  /** Without it the task runs on every invocation and is not post-checked */
  isDone?: () => Promise<boolean>
  run: (ctx: ApplyContext) => Promise<void>
  rollback?: () => Promise<void>
}

/** Action backed by collaborator calls rather than one command */
export function task(options: TaskOptions): Action {
  const { isDone } = options
  const action: Action = {
    name: options.name,
    policy: options.policy,
    postCheck: isDone !== undefined,
    async check() {
      return isDone && (await isDone()) ? "satisfied" : "unsatisfied"
    },
    apply: ctx => options.run(ctx),
  }
  if (options.rollback) action.rollback = options.rollback
  return action
}

/**
 * Fails with PREREQUISITE_MISSING unless one of `paths` exists, e.g. a
 * build that exited 0 without producing output.
 */
export function requireOutput(name: string, paths: readonly string[], message: string): Action {
  return {
    name,
    async check() {
      for (const path of paths) {
        if (await pathExists(path)) return "satisfied"
      }
      return "unsatisfied"
    },
    async apply() {
      throw ProvisionError.prerequisiteMissing(message)
    },
  }
}

/**
 * @throws ProvisionError (PREREQUISITE_MISSING) naming every command not on PATH
 */
export async function requireCommands(runner: CommandRunner, commands: readonly string[]): Promise<void> {
  const missing: string[] = []
  for (const command of commands) {
    if (!(await hasCommand(runner, command))) missing.push(command)
  }
  if (missing.length > 0) {
    throw ProvisionError.prerequisiteMissing(
      `Required commands not found: ${missing.join(", ")}`,
      "Run `hostkit provision` and install the matching stack components first.",
    )
  }
}

/** Runs every time: builds, installs, cache warmups */
export function buildStep(
  ctx: HostContext,
  name: string,
  command: string,
  args: readonly string[],
  cwd: string,
  timeoutMs: number = TIMEOUTS.BUILD,
): Action {
  return commandAction({ name, run: { command, args, options: { cwd, timeoutMs } }, runner: ctx.runner })
}

export interface PublishOptions {
  /** Directory whose contents are published */
  source: string
  dest: string
  /** Paths under dest that `--delete` must leave alone, e.g. "storage/" */
  protect?: readonly string[]
  /** Runs after the sync and before ownership is fixed */
  after?: readonly Action[]
}

/**
 * rsync a build into the web root and hand it to the web user. Runs on
 * every deploy.
 */
export function publishGroup(ctx: HostContext, name: string, options: PublishOptions): ActionGroup {
  const { runner } = ctx
  const { user, group } = ctx.config.web
  const { source, dest } = options

  return {
    name,
    atomic: false,
    actions: [
      directoryAction({ path: dest, runner }),
      commandAction({
        name: `sync ${source} to ${dest}`,
        run: {
          command: "rsync",
          args: [
            "-a",
            "--delete",
            "--exclude",
            ".git",
            ...(options.protect ?? []).flatMap(path => ["--filter", `P ${path}`]),
            `${source}/`,
            `${dest}/`,
          ],
          options: { timeoutMs: TIMEOUTS.INSTALL },
        },
        runner,
      }),
      ...(options.after ?? []),
      commandAction({
        name: `chown ${dest} to ${user}:${group}`,
        run: { command: "chown", args: ["-R", `${user}:${group}`, dest] },
        runner,
      }),
    ],
  }
}
