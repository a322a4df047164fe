import { rm, writeFile } from "node:fs/promises"
import { join } from "node:path"
import { TIMEOUTS } from "@hostkit/shared"
import type { GroupValidator, StagedFile } from "../types.js"
import { type CommandRunner, runCommand, spawnCommand } from "./common.js"

function stagedFiles(staged: readonly StagedFile[]): StagedFile[] {
  return staged.filter(file => file.kind === "file")
}

export interface NginxValidatorOptions {
  /** Directory holding nginx.conf and mime.types */
  nginxDir: string
  runner?: CommandRunner
  tag?: string
}

/**
 * Minimal nginx.conf that loads only the staged server blocks.
 */
export function nginxHarness(nginxDir: string, staged: readonly StagedFile[]): string {
  const includes = stagedFiles(staged).map(file => `    include ${file.stagedPath};`)
  return [
    "events {}",
    "http {",
    `    include ${join(nginxDir, "mime.types")};`,
    ...includes,
    "}",
    "",
  ].join("\n")
}

/**
 * `nginx -t` against a harness config including the staged files, so they
 * are checked before anything in sites-enabled points at them.
 */
export function nginxValidator(options: NginxValidatorOptions): GroupValidator {
  const runner = options.runner ?? spawnCommand
  const tag = options.tag ?? String(process.pid)

  return async staged => {
    if (stagedFiles(staged).length === 0) {
      await runCommand(runner, "nginx", ["-t", "-q"], { timeoutMs: TIMEOUTS.VALIDATE })
      return
    }
    const harness = join(options.nginxDir, `.hostkit-${tag}.harness.conf`)
    await writeFile(harness, nginxHarness(options.nginxDir, staged))
    try {
      await runCommand(runner, "nginx", ["-t", "-q", "-c", harness], { timeoutMs: TIMEOUTS.VALIDATE })
    } finally {
      await rm(harness, { force: true })
    }
  }
}

/** `sshd -t -f <staged>` for every staged file */
export function sshdValidator(runner: CommandRunner = spawnCommand): GroupValidator {
  return commandValidator("sshd", file => ["-t", "-f", file], runner)
}

/**
 * Run `command ...args(stagedPath)` for each staged regular file, e.g.
 * `visudo -cf <path>`.
 */
export function commandValidator(
  command: string,
  args: (stagedPath: string) => string[],
  runner: CommandRunner = spawnCommand,
): GroupValidator {
  return async staged => {
    for (const file of stagedFiles(staged)) {
      await runCommand(runner, command, args(file.stagedPath), { timeoutMs: TIMEOUTS.VALIDATE })
    }
  }
}
