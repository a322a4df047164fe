import { TIMEOUTS } from "@hostkit/shared"
import { type CommandRunner, runCommand, runCommandSafe, spawnCommand } from "./common.js"

export interface PackageManager {
  isInstalled(name: string): Promise<boolean>
  install(name: string): Promise<void>
}

const APT_ENV = { DEBIAN_FRONTEND: "noninteractive" }

/**
 * dpkg/apt-get. The package index is refreshed once per instance, before
 * the first install.
 */
export class AptPackageManager implements PackageManager {
  private indexRefreshed = false

  constructor(private readonly runner: CommandRunner = spawnCommand) {}

  async isInstalled(name: string): Promise<boolean> {
    const result = await runCommandSafe(this.runner, "dpkg-query", ["-W", "-f=${Status}", name])
    return result.exitCode === 0 && result.stdout.includes("install ok installed")
  }

  async install(name: string): Promise<void> {
    if (!this.indexRefreshed) {
      await runCommand(this.runner, "apt-get", ["update"], { env: APT_ENV, timeoutMs: TIMEOUTS.INSTALL })
      this.indexRefreshed = true
    }
    await runCommand(this.runner, "apt-get", ["install", "-y", name], { env: APT_ENV, timeoutMs: TIMEOUTS.INSTALL })
  }
}
