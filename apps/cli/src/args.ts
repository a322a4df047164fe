import { parseArgs } from "node:util"
import { describeFailure, ProvisionError } from "@hostkit/engine"
import { APP_KINDS, type AppKind, CONFIG_ENV_VAR, isAppKind } from "@hostkit/shared"

export type CliCommand = { kind: "provision" } | { kind: "deploy"; appKind: AppKind } | { kind: "help" }

export interface CliOptions {
  command: CliCommand
  /** No banners */
  quiet: boolean
  /** Accept every default without prompting */
  yes: boolean
  /** Evaluate checks only */
  dryRun: boolean
  verbose: boolean
  continueOnFailure: boolean
  configPath?: string
}

export const USAGE = `
Usage: hostkit <command> [options]

Commands:
  provision              Harden and set up this VPS (ssh, firewall, packages, stack)
  deploy <kind>          Clone, build and serve an app: ${APP_KINDS.join(", ")}

Options:
  --yes, -y              Accept every default instead of prompting
  --quiet, -q            Suppress banners
  --dry-run              Show what would change without changing anything
  --continue-on-failure  Keep running later steps after a step fails
  --config, -c <path>    Host config file (default: $${CONFIG_ENV_VAR}, else built-in defaults)
  --verbose, -v          Show command output
  --help, -h             Show this help

Exit codes:
  0 success, 1 step failed, 2 prerequisite missing, 3 validation failed,
  4 could not roll back, 5 another run holds the lock, 6 invalid input
`

const OPTIONS = {
  yes: { type: "boolean", short: "y", default: false },
  quiet: { type: "boolean", short: "q", default: false },
  "dry-run": { type: "boolean", default: false },
  "continue-on-failure": { type: "boolean", default: false },
  config: { type: "string", short: "c" },
  verbose: { type: "boolean", short: "v", default: false },
  help: { type: "boolean", short: "h", default: false },
} as const

const USAGE_HINT = "Run `hostkit --help` for usage."

function parse(argv: readonly string[]) {
  try {
    return parseArgs({ args: [...argv], options: OPTIONS, allowPositionals: true, strict: true })
  } catch (error) {
    throw ProvisionError.preconditionFailed(describeFailure(error), USAGE_HINT)
  }
}

function parseCommand(positionals: readonly string[]): CliCommand {
  const [name, ...rest] = positionals

  if (name === undefined || name === "help") return { kind: "help" }

  if (name === "provision") {
    if (rest.length > 0) {
      throw ProvisionError.preconditionFailed(`Unexpected argument: ${rest.join(" ")}`, USAGE_HINT)
    }
    return { kind: "provision" }
  }

  if (name === "deploy") {
    const [appKind, ...extra] = rest
    if (appKind === undefined) {
      throw ProvisionError.preconditionFailed(`deploy needs an app kind: ${APP_KINDS.join(", ")}`, USAGE_HINT)
    }
    if (!isAppKind(appKind)) {
      throw ProvisionError.preconditionFailed(
        `Unknown app kind: ${appKind} (expected one of ${APP_KINDS.join(", ")})`,
        USAGE_HINT,
      )
    }
    if (extra.length > 0) {
      throw ProvisionError.preconditionFailed(`Unexpected argument: ${extra.join(" ")}`, USAGE_HINT)
    }
    return { kind: "deploy", appKind }
  }

  throw ProvisionError.preconditionFailed(`Unknown command: ${name}`, USAGE_HINT)
}

/**
 * @throws ProvisionError (PRECONDITION_FAILED) on unknown flags, commands or app kinds
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const { values, positionals } = parse(argv)
  const command: CliCommand = values.help ? { kind: "help" } : parseCommand(positionals)

  return {
    command,
    quiet: values.quiet ?? false,
    yes: values.yes ?? false,
    dryRun: values["dry-run"] ?? false,
    verbose: values.verbose ?? false,
    continueOnFailure: values["continue-on-failure"] ?? false,
    configPath: values.config,
  }
}
