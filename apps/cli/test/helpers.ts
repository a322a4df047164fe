import { mkdtempSync, rmSync } from "node:fs"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { fileURLToPath } from "node:url"
import {
  type CommandOptions,
  type CommandResult,
  type CommandRunner,
  type InputSource,
  ProvisionError,
  ScriptedInputSource,
} from "@hostkit/engine"
import { createLogger, createMemorySink, type LogEntry } from "@hostkit/logger"
import { type HostConfig, hostConfigSchema } from "@hostkit/shared"
import { createHostContext, type HostContext } from "../src/context.js"
import { Prompter } from "../src/prompt.js"

export const TEMPLATES_ROOT = fileURLToPath(new URL("../../../templates", import.meta.url))

export interface RecordedCall {
  command: string
  args: string[]
  options?: CommandOptions
}

type Responder = (command: string, args: readonly string[]) => Partial<CommandResult> | undefined

/** In-process CommandRunner. Unmatched commands succeed with empty output. */
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

export function makeTempDir(prefix = "hostkit-cli-"): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), prefix))
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) }
}

/** Every host path under `root`, templates from the repository */
export function testConfig(root: string, answers: Record<string, string> = {}): HostConfig {
  return hostConfigSchema.parse({
    paths: {
      templatesRoot: TEMPLATES_ROOT,
      webRoot: join(root, "var/www"),
      checkoutRoot: join(root, "srv/checkouts"),
      lockFile: join(root, "hostkit.lock"),
      nginxDir: join(root, "etc/nginx"),
      nginxSitesAvailable: join(root, "etc/nginx/sites-available"),
      nginxSitesEnabled: join(root, "etc/nginx/sites-enabled"),
      sshdConfig: join(root, "etc/ssh/sshd_config"),
      sshKeyDir: join(root, "root/.ssh"),
      systemdUnitDir: join(root, "etc/systemd/system"),
      supervisorConfDir: join(root, "etc/supervisor/conf.d"),
      fail2banJail: join(root, "etc/fail2ban/jail.local"),
      sudoersDir: join(root, "etc/sudoers.d"),
      hostnameFile: join(root, "etc/hostname"),
      fstab: join(root, "etc/fstab"),
      swapFile: join(root, "swapfile"),
      aptConfDir: join(root, "etc/apt/apt.conf.d"),
      phpConfRoot: join(root, "etc/php"),
      letsencryptLive: join(root, "etc/letsencrypt/live"),
      cacheRoot: join(root, "var/cache"),
    },
    answers,
  })
}

export interface TestHost {
  ctx: HostContext
  calls: RecordedCall[]
  entries: LogEntry[]
}

export function testHost(root: string, respond?: Responder, answers?: Record<string, string>): TestHost {
  const { runner, calls } = fakeRunner(respond)
  const { sink, entries } = createMemorySink()
  const ctx = createHostContext(testConfig(root, answers), { logger: createLogger({ sink }), runner })
  return { ctx, calls, entries }
}

export function prompterFor(host: TestHost, input: InputSource): Prompter {
  return new Prompter({ input, answers: host.ctx.config.answers, logger: host.ctx.logger })
}

/** Typed answers replayed in order; "" takes the default */
export function scriptedPrompter(host: TestHost, answers: readonly string[]): Prompter {
  return prompterFor(host, new ScriptedInputSource(answers))
}

/** Catch the error a call throws, for asserting on its fields */
export async function captureProvisionError(fn: () => unknown): Promise<ProvisionError> {
  try {
    await fn()
  } catch (error) {
    if (error instanceof ProvisionError) return error
    throw new Error(`expected a ProvisionError, got ${String(error)}`)
  }
  throw new Error("expected the call to throw")
}
