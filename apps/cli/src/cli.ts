import { existsSync } from "node:fs"
import {
  type AcquireLockOptions,
  type ActionGroup,
  type CommandRunner,
  DefaultsInputSource,
  describeFailure,
  type InputSource,
  previewPlan,
  ProvisionError,
  ReadlineInputSource,
  readLockInfo,
  runPlan,
} from "@hostkit/engine"
import { createConsoleSink, createLogger, type Logger } from "@hostkit/logger"
import { EXIT_CODES, type HostConfig, loadHostConfig } from "@hostkit/shared"
import { type CliOptions, parseCliArgs, USAGE } from "./args.js"
import { createHostContext, type HostContext } from "./context.js"
import { APP_KIND_REQUIREMENTS, buildDeployPlan, collectDeployAnswers, deploySummary } from "./plans/deploy.js"
import { buildProvisionPlan, collectProvisionAnswers, provisionNotes } from "./plans/provision.js"
import { requireCommands } from "./plans/steps.js"
import { Prompter } from "./prompt.js"
import { exitCodeFor, firstFailure, formatFailure, formatPreview, formatSummary } from "./report.js"

export interface CliDeps {
  runner?: CommandRunner
  /** Replaces the terminal or `--yes` input */
  input?: InputSource
  env?: NodeJS.ProcessEnv
  out?: (line: string) => void
  err?: (line: string) => void
  color?: boolean
  lock?: AcquireLockOptions
  /** Defaults to checking the effective uid */
  isRoot?: () => boolean
}

interface Output {
  out: (line: string) => void
  err: (line: string) => void
  useColor: boolean
}

interface Plan {
  groups: ActionGroup[]
  /** Printed after a successful run */
  notes: () => Promise<string[]>
}

function loadConfig(options: CliOptions, env: NodeJS.ProcessEnv): HostConfig {
  try {
    return loadHostConfig(options.configPath, env).config
  } catch (error) {
    throw ProvisionError.preconditionFailed(
      describeFailure(error),
      "Fix the host config or point --config at a valid file.",
    )
  }
}

async function buildPlan(options: CliOptions, ctx: HostContext, prompter: Prompter): Promise<Plan> {
  const { command } = options
  if (command.kind === "deploy") {
    await requireCommands(ctx.runner, APP_KIND_REQUIREMENTS[command.appKind])
    const answers = await collectDeployAnswers(command.appKind, prompter, ctx)
    return { groups: await buildDeployPlan(ctx, answers), notes: async () => deploySummary(ctx, answers) }
  }
  const answers = await collectProvisionAnswers(prompter)
  return { groups: await buildProvisionPlan(ctx, answers), notes: () => provisionNotes(ctx, answers) }
}

async function execute(options: CliOptions, config: HostConfig, logger: Logger, deps: CliDeps, io: Output): Promise<number> {
  const { out, err } = io
  const isRoot = deps.isRoot ?? (() => process.getuid?.() === 0)
  if (!isRoot()) {
    throw ProvisionError.prerequisiteMissing("hostkit must run as root.", "Run it again with sudo.")
  }

  const { lockFile } = config.paths
  // Any lock file counts as held here, readable or not; runPlan takes it for real
  if (existsSync(lockFile)) {
    const holder = readLockInfo(lockFile)
    throw ProvisionError.alreadyRunning(lockFile, holder ? `pid ${holder.pid} since ${holder.startedAt}` : undefined)
  }

  const input: InputSource = deps.input ?? (options.yes ? new DefaultsInputSource() : new ReadlineInputSource())
  try {
    const ctx = createHostContext(config, { logger, runner: deps.runner })
    const prompter = new Prompter({ input, answers: config.answers, logger })
    const title = options.command.kind === "deploy" ? `hostkit deploy ${options.command.appKind}` : "hostkit provision"
    logger.header(title)

    const plan = await buildPlan(options, ctx, prompter)

    if (options.dryRun) {
      for (const line of formatPreview(await previewPlan(plan.groups))) out(line)
      return EXIT_CODES.OK
    }

    const report = await runPlan(plan.groups, {
      lockPath: lockFile,
      logger,
      continueOnFailure: options.continueOnFailure,
      lock: deps.lock,
    })

    out("")
    out(formatSummary(report))
    const failed = firstFailure(report)
    if (failed) {
      for (const line of formatFailure(failed.error ?? "unknown failure", failed, io.useColor)) err(line)
      return exitCodeFor(report)
    }

    logger.footer(`${title} finished`)
    for (const note of await plan.notes()) out(note)
    return EXIT_CODES.OK
  } finally {
    input.close?.()
  }
}

/**
 * Entry point behind `bin/hostkit.js`. Resolves to the process exit code.
 */
export async function run(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const env = deps.env ?? process.env
  const out = deps.out ?? ((line: string) => console.log(line))
  const err = deps.err ?? ((line: string) => console.error(line))
  const useColor = deps.color ?? !env.NO_COLOR

  try {
    const options = parseCliArgs(argv)
    if (options.command.kind === "help") {
      out(USAGE)
      return EXIT_CODES.OK
    }

    const logger = createLogger({
      sink: createConsoleSink({ color: useColor, out, err }),
      quiet: options.quiet,
      verbose: options.verbose,
    })
    return await execute(options, loadConfig(options, env), logger, deps, { out, err, useColor })
  } catch (error) {
    for (const line of formatFailure(error, undefined, useColor)) err(line)
    return error instanceof ProvisionError ? error.exitCode : EXIT_CODES.ACTION_FAILED
  }
}
