/**
 * @hostkit/cli
 *
 * `hostkit provision` and `hostkit deploy <kind>`: prompts for answers,
 * turns them into ordered action groups and runs them through the engine.
 */

export { type CliCommand, type CliOptions, parseCliArgs, USAGE } from "./args.js"
export { type CliDeps, run } from "./cli.js"
export { createHostContext, type HostContext, type HostContextOptions } from "./context.js"
export type { AstroAnswers, DeployAnswers, DeployBase, GoAnswers, LaravelAnswers, NextAnswers } from "./plans/app-kinds.js"
export { APP_KIND_REQUIREMENTS, buildDeployPlan, collectDeployAnswers, deploySummary } from "./plans/deploy.js"
export { type TlsSetup, checkPemPair, siteUrls } from "./plans/nginx.js"
export { type PostgresDatabase, postgresDatabaseGroup, postgresUrl } from "./plans/postgres.js"
export {
  buildProvisionPlan,
  collectProvisionAnswers,
  type ProvisionAnswers,
  provisionNotes,
  STACK_COMPONENTS,
  type StackComponent,
} from "./plans/provision.js"
export { type AskOptions, Prompter, type PrompterOptions } from "./prompt.js"
export { exitCodeFor, formatFailure, formatPreview, formatSummary } from "./report.js"
