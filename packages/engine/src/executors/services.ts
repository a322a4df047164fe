import { TIMEOUTS } from "@hostkit/shared"
import { z } from "zod"
import { ProvisionError } from "../errors.js"
import { CommandError, type CommandRunner, describeFailure, runCommand, runCommandSafe, spawnCommand } from "./common.js"

export interface ServiceManager {
  reload(service: string): Promise<void>
  isActive(service: string): Promise<boolean>
}

/** Shell-safe service name: only allow alphanumeric, dash, underscore, @, dot */
export function validateServiceName(name: string): void {
  if (!/^[a-zA-Z0-9@._-]+$/.test(name)) {
    throw ProvisionError.preconditionFailed(`Invalid service name: ${name}`)
  }
}

const SERVICE_TIMEOUT = { timeoutMs: TIMEOUTS.SERVICE }

export class SystemdServiceManager implements ServiceManager {
  constructor(private readonly runner: CommandRunner = spawnCommand) {}

  private async systemctl(args: string[]): Promise<void> {
    await runCommand(this.runner, "systemctl", args, SERVICE_TIMEOUT)
  }

  async reload(service: string): Promise<void> {
    validateServiceName(service)
    await this.systemctl(["reload", service])
  }

  async isActive(service: string): Promise<boolean> {
    validateServiceName(service)
    const result = await runCommandSafe(this.runner, "systemctl", ["is-active", "--quiet", service], SERVICE_TIMEOUT)
    return result.exitCode === 0
  }

  async isEnabled(service: string): Promise<boolean> {
    validateServiceName(service)
    const result = await runCommandSafe(this.runner, "systemctl", ["is-enabled", "--quiet", service], SERVICE_TIMEOUT)
    return result.exitCode === 0
  }

  /**
   * Restart, recovering a unit stuck in "failed" (OOM, crash loop) with
   * `reset-failed` and one retry. The final error carries the journal tail.
   */
  async restart(service: string): Promise<void> {
    validateServiceName(service)
    const first = await runCommandSafe(this.runner, "systemctl", ["restart", service], SERVICE_TIMEOUT)
    if (first.exitCode === 0) return

    const state = await runCommandSafe(this.runner, "systemctl", ["is-failed", service], SERVICE_TIMEOUT)
    if (state.stdout === "failed") {
      await runCommandSafe(this.runner, "systemctl", ["reset-failed", service], SERVICE_TIMEOUT)
      const retry = await runCommandSafe(this.runner, "systemctl", ["restart", service], SERVICE_TIMEOUT)
      if (retry.exitCode === 0) return
    }

    const journal = await runCommandSafe(this.runner, "journalctl", ["-u", service, "-n", "20", "--no-pager"])
    const diagnostics = journal.exitCode === 0 ? journal.stdout : "(could not retrieve journal logs)"
    throw new CommandError(`systemctl restart ${service}`, first.exitCode, `${first.stderr}\n${diagnostics}`.trim(), "")
  }

  async start(service: string): Promise<void> {
    validateServiceName(service)
    await this.systemctl(["start", service])
  }

  async stop(service: string): Promise<void> {
    validateServiceName(service)
    await this.systemctl(["stop", service])
  }

  async enable(service: string, options: { now?: boolean } = {}): Promise<void> {
    validateServiceName(service)
    await this.systemctl(options.now ? ["enable", "--now", service] : ["enable", service])
  }

  async disable(service: string): Promise<void> {
    validateServiceName(service)
    await this.systemctl(["disable", service])
  }

  async daemonReload(): Promise<void> {
    await this.systemctl(["daemon-reload"])
  }
}

/** supervisord programs, e.g. Laravel queue workers */
export class SupervisorManager {
  constructor(private readonly runner: CommandRunner = spawnCommand) {}

  async reread(): Promise<void> {
    await runCommand(this.runner, "supervisorctl", ["reread"], SERVICE_TIMEOUT)
  }

  async update(): Promise<void> {
    await runCommand(this.runner, "supervisorctl", ["update"], SERVICE_TIMEOUT)
  }

  /** Restart every process of a program group (`name:*`) */
  async restartGroup(program: string): Promise<void> {
    validateServiceName(program)
    await runCommand(this.runner, "supervisorctl", ["restart", `${program}:*`], SERVICE_TIMEOUT)
  }

  async isRunning(program: string): Promise<boolean> {
    validateServiceName(program)
    const result = await runCommandSafe(this.runner, "supervisorctl", ["status", `${program}:*`], SERVICE_TIMEOUT)
    const lines = result.stdout.split("\n").filter(Boolean)
    return lines.length > 0 && lines.every(line => /\bRUNNING\b/.test(line))
  }
}

const pm2ProcessSchema = z.object({
  name: z.string(),
  pm2_env: z.object({ status: z.string() }).passthrough(),
})

const pm2ListSchema = z.array(pm2ProcessSchema.passthrough())

/** pm2-managed Node processes */
export class Pm2Manager {
  constructor(private readonly runner: CommandRunner = spawnCommand) {}

  async start(ecosystemFile: string, cwd: string): Promise<void> {
    await runCommand(this.runner, "pm2", ["start", ecosystemFile], { cwd, timeoutMs: TIMEOUTS.SERVICE })
  }

  async reload(name: string): Promise<void> {
    validateServiceName(name)
    await runCommand(this.runner, "pm2", ["reload", name], SERVICE_TIMEOUT)
  }

  async delete(name: string): Promise<void> {
    validateServiceName(name)
    await runCommand(this.runner, "pm2", ["delete", name], SERVICE_TIMEOUT)
  }

  /** Persist the process list so it survives a reboot */
  async save(): Promise<void> {
    await runCommand(this.runner, "pm2", ["save"], SERVICE_TIMEOUT)
  }

  async isOnline(name: string): Promise<boolean> {
    validateServiceName(name)
    const result = await runCommandSafe(this.runner, "pm2", ["jlist"], SERVICE_TIMEOUT)
    if (result.exitCode !== 0) return false
    let raw: unknown
    try {
      raw = JSON.parse(result.stdout)
    } catch (error) {
      throw ProvisionError.generic(`Unreadable pm2 jlist output: ${describeFailure(error)}`, error)
    }
    const parsed = pm2ListSchema.safeParse(raw)
    if (!parsed.success) {
      throw ProvisionError.generic(`Unexpected pm2 jlist output: ${parsed.error.message}`)
    }
    return parsed.data.some(proc => proc.name === name && proc.pm2_env.status === "online")
  }
}
