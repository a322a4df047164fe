import { access, readdir, rm } from "node:fs/promises"
import { type CommandOptions, type CommandRunner, runCommand, runCommandSafe, spawnCommand } from "../executors/common.js"
import type { CloneOptions, SourceFetcher } from "../executors/git.js"
import type { PackageManager } from "../executors/packages.js"
import type { ServiceManager } from "../executors/services.js"
import type { Action, ActionPolicy, CheckState } from "../types.js"

interface CommonOptions {
  name?: string
  policy?: ActionPolicy
}

export interface PackageActionOptions extends CommonOptions {
  package: string
  packages: PackageManager
}

/** Ensure an OS package is installed. Not reversible. */
export function packageAction(options: PackageActionOptions): Action {
  const { packages } = options
  return {
    name: options.name ?? `install ${options.package}`,
    policy: options.policy,
    async check() {
      return (await packages.isInstalled(options.package)) ? "satisfied" : "unsatisfied"
    },
    async apply() {
      await packages.install(options.package)
    },
  }
}

export interface ControllableServiceManager extends ServiceManager {
  isEnabled(service: string): Promise<boolean>
  enable(service: string, options?: { now?: boolean }): Promise<void>
  stop(service: string): Promise<void>
  disable(service: string): Promise<void>
}

export interface ServiceActionOptions extends CommonOptions {
  service: string
  services: ControllableServiceManager
}

/** Ensure a unit is enabled and running. Rollback returns it to how it was found. */
export function serviceAction(options: ServiceActionOptions): Action {
  const { service, services } = options
  let wasActive = true
  let wasEnabled = true

  return {
    name: options.name ?? `enable ${service}`,
    policy: options.policy,
    async check() {
      const [active, enabled] = await Promise.all([services.isActive(service), services.isEnabled(service)])
      return active && enabled ? "satisfied" : "unsatisfied"
    },
    async apply() {
      wasActive = await services.isActive(service)
      wasEnabled = await services.isEnabled(service)
      await services.enable(service, { now: true })
    },
    async rollback() {
      if (!wasActive) await services.stop(service)
      if (!wasEnabled) await services.disable(service)
    },
  }
}

export interface CommandSpec {
  command: string
  args: readonly string[]
  options?: CommandOptions
}

export interface CommandActionOptions extends CommonOptions {
  name: string
  run: CommandSpec
  /** Satisfied when this path exists */
  creates?: string
  /** Satisfied when this command exits 0 */
  unless?: CommandSpec
  /** Custom predicate; wins over `creates` and `unless` */
  check?: () => Promise<CheckState>
  rollback?: () => Promise<void>
  runner?: CommandRunner
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  } catch {
    return false
  }
}

/**
 * Run a command guarded by a check. Without any guard it runs every time
 * (builds, cache warmups) and is not post-checked.
 */
export function commandAction(options: CommandActionOptions): Action {
  const runner = options.runner ?? spawnCommand
  const { run, creates, unless } = options
  const guarded = options.check !== undefined || creates !== undefined || unless !== undefined

  const action: Action = {
    name: options.name,
    policy: options.policy,
    postCheck: guarded,
    async check() {
      if (options.check) return options.check()
      if (creates !== undefined) return (await exists(creates)) ? "satisfied" : "unsatisfied"
      if (unless) {
        const result = await runCommandSafe(runner, unless.command, unless.args, unless.options)
        return result.exitCode === 0 ? "satisfied" : "unsatisfied"
      }
      return "unsatisfied"
    },
    async apply(ctx) {
      await runCommand(runner, run.command, run.args, {
        ...run.options,
        onOutput: run.options?.onOutput ?? (chunk => ctx.logger.debug(chunk.trimEnd())),
      })
    },
  }
  if (options.rollback) action.rollback = options.rollback
  return action
}

export interface CheckoutFetcher extends SourceFetcher {
  remoteUrl(dest: string): Promise<string | null>
}

export interface CloneActionOptions extends CommonOptions, CloneOptions {
  url: string
  dest: string
  fetcher: CheckoutFetcher
}

async function isEmptyOrMissing(path: string): Promise<boolean> {
  try {
    return (await readdir(path)).length === 0
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return true
    throw error
  }
}

/** Ensure `dest` is a checkout of `url`. Rollback removes a checkout it created. */
export function cloneAction(options: CloneActionOptions): Action {
  const { url, dest, fetcher } = options
  let createdFresh = false

  return {
    name: options.name ?? `clone ${url}`,
    policy: options.policy,
    async check() {
      return (await fetcher.remoteUrl(dest)) === url ? "satisfied" : "unsatisfied"
    },
    async apply() {
      createdFresh = await isEmptyOrMissing(dest)
      await fetcher.clone(url, dest, { overwrite: options.overwrite })
    },
    async rollback() {
      if (createdFresh) await rm(dest, { recursive: true, force: true })
    },
  }
}
