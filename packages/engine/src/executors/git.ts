import { readdir, rm } from "node:fs/promises"
import { TIMEOUTS } from "@hostkit/shared"
import { ProvisionError } from "../errors.js"
import { type CommandRunner, runCommand, runCommandSafe, spawnCommand } from "./common.js"

export interface CloneOptions {
  /** Replace an existing non-empty destination */
  overwrite?: boolean
}

export interface SourceFetcher {
  clone(url: string, dest: string, options?: CloneOptions): Promise<void>
}

async function isNonEmptyDir(path: string): Promise<boolean> {
  try {
    return (await readdir(path)).length > 0
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return false
    throw error
  }
}

export class GitSourceFetcher implements SourceFetcher {
  constructor(private readonly runner: CommandRunner = spawnCommand) {}

  async clone(url: string, dest: string, options: CloneOptions = {}): Promise<void> {
    const reachable = await runCommandSafe(this.runner, "git", ["ls-remote", "--heads", url], {
      env: { GIT_TERMINAL_PROMPT: "0" },
      timeoutMs: TIMEOUTS.SERVICE,
    })
    if (reachable.exitCode !== 0) {
      throw ProvisionError.preconditionFailed(
        `Repository not reachable: ${url}`,
        "Check the URL and that this host's deploy key or credentials can read it.",
      )
    }

    if (await isNonEmptyDir(dest)) {
      if (!options.overwrite) {
        throw ProvisionError.preconditionFailed(
          `Destination ${dest} exists and is not empty`,
          "Answer yes to the overwrite prompt or remove the directory.",
        )
      }
      await rm(dest, { recursive: true, force: true })
    }

    await runCommand(this.runner, "git", ["clone", url, dest], {
      env: { GIT_TERMINAL_PROMPT: "0" },
      timeoutMs: TIMEOUTS.INSTALL,
    })
  }

  /** `origin` of a checkout, null when dest is not a git checkout */
  async remoteUrl(dest: string): Promise<string | null> {
    const result = await runCommandSafe(this.runner, "git", ["-C", dest, "remote", "get-url", "origin"])
    return result.exitCode === 0 && result.stdout ? result.stdout : null
  }

  async pull(dest: string): Promise<void> {
    await runCommand(this.runner, "git", ["-C", dest, "pull", "--ff-only"], {
      env: { GIT_TERMINAL_PROMPT: "0" },
      timeoutMs: TIMEOUTS.INSTALL,
    })
  }
}
