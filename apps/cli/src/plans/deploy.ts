import { readdir } from "node:fs/promises"
import { type ActionGroup, cloneAction, ProvisionError } from "@hostkit/engine"
import {
  type AppKind,
  folderNameFromGitUrl,
  getAppWebRoot,
  getCheckoutPath,
  getNginxSitePath,
  validateDomain,
  validateFolderName,
  validateGitUrl,
} from "@hostkit/shared"
import type { HostContext } from "../context.js"
import type { Prompter } from "../prompt.js"
import {
  astroGroups,
  collectAstro,
  collectGo,
  collectLaravel,
  collectNext,
  type DeployAnswers,
  type DeployBase,
  type DeployPaths,
  goGroups,
  laravelGroups,
  nextGroups,
} from "./app-kinds.js"
import { collectTls, siteUrls } from "./nginx.js"
import { task } from "./steps.js"

/** Commands that must be on PATH before a deploy of each kind starts */
export const APP_KIND_REQUIREMENTS: Record<AppKind, readonly string[]> = {
  next: ["git", "nginx", "node", "pnpm", "pm2"],
  laravel: ["git", "nginx", "php", "composer", "rsync"],
  go: ["git", "nginx", "go", "rsync"],
  astro: ["git", "nginx", "npm", "rsync"],
}

async function isNonEmptyDir(path: string): Promise<boolean> {
  try {
    return (await readdir(path)).length > 0
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return false
    throw error
  }
}

export function deployPaths(ctx: HostContext, folderName: string): DeployPaths {
  return {
    checkout: getCheckoutPath(ctx.config, folderName),
    webRoot: getAppWebRoot(ctx.config, folderName),
  }
}

async function collectBase(prompter: Prompter, ctx: HostContext): Promise<DeployBase> {
  const gitUrl = await prompter.ask("git.url", "Git repository URL", { validate: validateGitUrl })
  const folderName = await prompter.ask("folder", "Folder name for the app", {
    default: folderNameFromGitUrl(gitUrl),
    validate: validateFolderName,
  })

  const { checkout } = deployPaths(ctx, folderName)
  let overwrite = false
  if ((await isNonEmptyDir(checkout)) && (await ctx.git.remoteUrl(checkout)) !== gitUrl) {
    overwrite = await prompter.confirm("overwrite", `${checkout} exists and is not a checkout of ${gitUrl}. Overwrite it?`, false)
    if (!overwrite) {
      throw ProvisionError.preconditionFailed(
        `Destination ${checkout} exists and is not empty`,
        "Pick another folder name or remove the directory.",
      )
    }
  }

  const domain = await prompter.ask("domain", "Domain name (e.g. example.com)", { validate: validateDomain })
  const tls = await collectTls(prompter, ctx, domain)
  return { gitUrl, folderName, overwrite, domain, tls }
}

/**
 * Ask everything for one deploy up front: shared source and site
 * questions first, then the app kind's own.
 */
export async function collectDeployAnswers(kind: AppKind, prompter: Prompter, ctx: HostContext): Promise<DeployAnswers> {
  const base = await collectBase(prompter, ctx)
  switch (kind) {
    case "next":
      return collectNext(prompter, ctx, base)
    case "laravel":
      return collectLaravel(prompter, ctx, base)
    case "go":
      return collectGo(prompter, base)
    case "astro":
      return collectAstro(prompter, base)
  }
}

function sourceGroup(ctx: HostContext, answers: DeployAnswers, checkout: string): ActionGroup {
  const { git } = ctx
  return {
    name: `Source for ${answers.folderName}`,
    atomic: false,
    actions: [
      cloneAction({ url: answers.gitUrl, dest: checkout, fetcher: git, overwrite: answers.overwrite }),
      task({ name: "pull latest", run: () => git.pull(checkout) }),
    ],
  }
}

export async function buildDeployPlan(ctx: HostContext, answers: DeployAnswers): Promise<ActionGroup[]> {
  const paths = deployPaths(ctx, answers.folderName)
  const source = sourceGroup(ctx, answers, paths.checkout)

  switch (answers.kind) {
    case "next":
      return [source, ...(await nextGroups(ctx, answers, paths))]
    case "laravel":
      return [source, ...(await laravelGroups(ctx, answers, paths))]
    case "go":
      return [source, ...(await goGroups(ctx, answers, paths))]
    case "astro":
      return [source, ...(await astroGroups(ctx, answers, paths))]
  }
}

/** Lines printed after a successful deploy */
export function deploySummary(ctx: HostContext, answers: DeployAnswers): string[] {
  const { checkout, webRoot } = deployPaths(ctx, answers.folderName)
  const lines = siteUrls(answers.domain, answers.tls).map(url => `URL: ${url}`)

  lines.push(`App directory: ${answers.kind === "next" ? checkout : webRoot}`)
  lines.push(`Nginx config: ${getNginxSitePath(ctx.config, answers.folderName)}`)
  if (answers.kind === "next") lines.push(`pm2 process: ${answers.folderName}`)
  if (answers.kind === "go") lines.push(`systemd service: ${answers.folderName}.service`)
  if (answers.kind === "laravel" && answers.queueWorkers) lines.push(`Supervisor program: ${answers.folderName}-worker`)
  return lines
}
