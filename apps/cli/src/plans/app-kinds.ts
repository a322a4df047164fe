import { readFile } from "node:fs/promises"
import { join } from "node:path"
import {
  type ActionGroup,
  commandAction,
  directivesAction,
  directoryAction,
  hasCommand,
  ProvisionError,
  templateFileAction,
} from "@hostkit/engine"
import {
  getPhpFpmPoolPath,
  getPhpFpmSocket,
  getSupervisorConfPath,
  getSystemdUnitPath,
  type InputValidationResult,
  TIMEOUTS,
  validateNotEmpty,
  validatePort,
  validatePostgresIdentifier,
  validateRelativePath,
} from "@hostkit/shared"
import type { HostContext } from "../context.js"
import type { Prompter } from "../prompt.js"
import { nginxSiteGroups, type TlsSetup } from "./nginx.js"
import { collectPostgresDatabase, type PostgresDatabase, postgresDatabaseGroup, postgresUrl } from "./postgres.js"
import { buildStep, pathExists, publishGroup, requireCommands, requireOutput, task } from "./steps.js"

export interface DeployBase {
  gitUrl: string
  folderName: string
  /** Replace a non-empty checkout directory of another remote */
  overwrite: boolean
  domain: string
  tls: TlsSetup
}

export interface NextAnswers extends DeployBase {
  kind: "next"
  appPort: string
  /** Values written into .env before the build */
  env: Record<string, string>
  /** Created before the build; null leaves the database to the operator */
  database: PostgresDatabase | null
}

export interface LaravelAnswers extends DeployBase {
  kind: "laravel"
  env: Record<string, string>
  /** Created from DB_DATABASE, DB_USERNAME and DB_PASSWORD */
  database: PostgresDatabase | null
  generateAppKey: boolean
  configurePhpFpm: boolean
  queueWorkers: boolean
}

export interface GoAnswers extends DeployBase {
  kind: "go"
  appPort: string
  /** Relative to the checkout */
  mainPath: string
}

export interface AstroAnswers extends DeployBase {
  kind: "astro"
  /** Static output directory, relative to the checkout */
  buildDir: string
}

export type DeployAnswers = NextAnswers | LaravelAnswers | GoAnswers | AstroAnswers

export interface DeployPaths {
  checkout: string
  webRoot: string
}

function siteScheme(base: DeployBase): string {
  return base.tls.mode === "none" ? "http" : "https"
}

function askEnv(
  prompter: Prompter,
  key: string,
  defaultValue: string,
  validate?: (input: string) => InputValidationResult,
): Promise<string> {
  return prompter.ask(`env.${key}`, key, { default: defaultValue, validate })
}

/** `.env` seeded from `.env.example` when missing, then the given values set */
function envGroup(name: string, checkout: string, values: Readonly<Record<string, string>>): ActionGroup {
  return {
    name: `Environment for ${name}`,
    actions: [
      directivesAction({
        name: `configure ${join(checkout, ".env")}`,
        path: join(checkout, ".env"),
        fallbackFrom: join(checkout, ".env.example"),
        directives: values,
        syntax: "env",
        mode: 0o600,
      }),
    ],
  }
}

// =============================================================================
// Next.js: built in the checkout, served by pm2 behind an nginx proxy
// =============================================================================

export async function collectNext(prompter: Prompter, ctx: HostContext, base: DeployBase): Promise<NextAnswers> {
  const appPort = await prompter.ask("app.port", "Port the app listens on", { default: "3000", validate: validatePort })

  const env: Record<string, string> = {}
  let database: PostgresDatabase | null = null
  if (await prompter.confirm("postgres.create", "Create a PostgreSQL database and user?", false)) {
    database = await collectPostgresDatabase(prompter, ctx, { name: "next", user: "next_user" })
    env.POSTGRES_URL = postgresUrl(database)
  } else if (await prompter.confirm("env.postgres", "Configure POSTGRES_URL now?", false)) {
    env.POSTGRES_URL = await prompter.ask("env.POSTGRES_URL", "POSTGRES_URL", { validate: validateNotEmpty })
  }
  env.AUTH_URL = await askEnv(prompter, "AUTH_URL", `${siteScheme(base)}://${base.domain}`)

  return { ...base, kind: "next", appPort, env, database }
}

export async function nextGroups(ctx: HostContext, answers: NextAnswers, paths: DeployPaths): Promise<ActionGroup[]> {
  const { folderName: name } = answers
  const { checkout } = paths
  const ecosystem = join(checkout, "ecosystem.config.js")

  return [
    ...(answers.database ? [postgresDatabaseGroup(ctx, answers.database)] : []),
    envGroup(name, checkout, answers.env),
    {
      name: `Build ${name}`,
      atomic: false,
      actions: [
        buildStep(ctx, "pnpm install", "pnpm", ["install"], checkout, TIMEOUTS.INSTALL),
        buildStep(ctx, "pnpm run build", "pnpm", ["run", "build"], checkout),
        requireOutput(
          "check build output",
          [join(checkout, ".next"), join(checkout, "out")],
          "Build output (.next or out) not found. The build may have failed.",
        ),
      ],
    },
    ...(await nginxSiteGroups(ctx, {
      siteName: name,
      domain: answers.domain,
      templatePath: "nginx/next.conf",
      substitutions: { APP_PORT: answers.appPort, ROOT_PATH: checkout },
      tls: answers.tls,
    })),
    {
      name: `pm2 process ${name}`,
      atomic: false,
      actions: [
        task({
          name: `start ${name} with pm2`,
          run: async () => {
            if (!(await pathExists(ecosystem))) {
              throw ProvisionError.prerequisiteMissing(
                "ecosystem.config.js not found in project root. Cannot start pm2.",
                `Commit a pm2 ecosystem file whose app is named "${name}".`,
              )
            }
            if (await ctx.pm2.isOnline(name)) {
              await ctx.pm2.reload(name)
            } else {
              await ctx.pm2.start(ecosystem, checkout)
            }
          },
        }),
        task({ name: "save pm2 process list", policy: "best-effort", run: () => ctx.pm2.save() }),
      ],
    },
  ]
}

// =============================================================================
// Laravel: composer in the checkout, published to the web root, php-fpm
// =============================================================================

export async function collectLaravel(prompter: Prompter, ctx: HostContext, base: DeployBase): Promise<LaravelAnswers> {
  const env: Record<string, string> = {
    APP_ENV: await askEnv(prompter, "APP_ENV", "production"),
    APP_DEBUG: await askEnv(prompter, "APP_DEBUG", "false"),
    APP_URL: await askEnv(prompter, "APP_URL", `${siteScheme(base)}://${base.domain}`),
  }
  env.DB_CONNECTION = await askEnv(prompter, "DB_CONNECTION", "pgsql")
  const createDatabase =
    env.DB_CONNECTION === "pgsql" &&
    (await prompter.confirm("postgres.create", "Create the PostgreSQL database and user?", false))
  if (createDatabase) await requireCommands(ctx.runner, ["psql"])

  const identifier = createDatabase ? validatePostgresIdentifier : undefined
  env.DB_HOST = await askEnv(prompter, "DB_HOST", "127.0.0.1")
  env.DB_PORT = await askEnv(prompter, "DB_PORT", "5432", validatePort)
  const name = await askEnv(prompter, "DB_DATABASE", "laravel", identifier)
  const user = await askEnv(prompter, "DB_USERNAME", "laravel", identifier)
  const password = await askEnv(prompter, "DB_PASSWORD", "", createDatabase ? validateNotEmpty : undefined)
  env.DB_DATABASE = name
  env.DB_USERNAME = user
  env.DB_PASSWORD = password
  const database = createDatabase ? { name, user, password } : null

  const redisInstalled = await hasCommand(ctx.runner, "redis-server")
  if (await prompter.confirm("redis", "Use Redis for cache, queue and sessions?", redisInstalled)) {
    env.CACHE_STORE = "redis"
    env.QUEUE_CONNECTION = "redis"
    env.SESSION_DRIVER = "redis"
    env.REDIS_HOST = await askEnv(prompter, "REDIS_HOST", "127.0.0.1")
    env.REDIS_PORT = await askEnv(prompter, "REDIS_PORT", "6379", validatePort)
  }

  const generateAppKey = await prompter.confirm("app-key", "Generate APP_KEY if it is not set?", true)
  const configurePhpFpm = await prompter.confirm(
    "php-fpm",
    `Configure the php${ctx.config.web.phpVersion}-fpm pool?`,
    true,
  )
  const queueWorkers =
    (await hasCommand(ctx.runner, "supervisorctl")) &&
    (await prompter.confirm("queue-workers", "Set up Supervisor for queue workers?", true))

  return { ...base, kind: "laravel", env, database, generateAppKey, configurePhpFpm, queueWorkers }
}

async function hasAppKey(envPath: string): Promise<boolean> {
  try {
    return /^APP_KEY=\S+/m.test(await readFile(envPath, "utf8"))
  } catch {
    return false
  }
}

function phpFpmPoolGroup(ctx: HostContext): ActionGroup {
  const { config } = ctx
  const { user, group, phpVersion } = config.web
  return {
    name: `php${phpVersion}-fpm pool`,
    actions: [
      directivesAction({
        path: getPhpFpmPoolPath(config),
        syntax: "ini",
        directives: {
          user,
          group,
          listen: getPhpFpmSocket(config),
          "listen.owner": user,
          "listen.group": group,
          "listen.mode": "0660",
          pm: "dynamic",
        },
      }),
    ],
    activate: () => ctx.systemd.restart(`php${phpVersion}-fpm`),
  }
}

async function queueWorkerGroup(ctx: HostContext, name: string, appPath: string): Promise<ActionGroup> {
  const program = `${name}-worker`
  return {
    name: `Queue workers for ${name}`,
    actions: [
      templateFileAction({
        path: getSupervisorConfPath(ctx.config, program),
        template: await ctx.template("supervisor/laravel-worker.conf"),
        substitutions: { PROGRAM: program, APP_PATH: appPath, USER: ctx.config.web.user },
      }),
    ],
    activate: async () => {
      await ctx.supervisor.reread()
      await ctx.supervisor.update()
      await ctx.supervisor.restartGroup(program)
    },
  }
}

export async function laravelGroups(ctx: HostContext, answers: LaravelAnswers, paths: DeployPaths): Promise<ActionGroup[]> {
  const { folderName: name } = answers
  const { checkout, webRoot } = paths
  const envPath = join(checkout, ".env")
  const artisan = (command: string) => buildStep(ctx, `php artisan ${command}`, "php", ["artisan", command], webRoot)

  const groups: ActionGroup[] = [
    ...(answers.database ? [postgresDatabaseGroup(ctx, answers.database)] : []),
    {
      name: `Dependencies for ${name}`,
      atomic: false,
      actions: [
        buildStep(
          ctx,
          "composer install",
          "composer",
          ["install", "--optimize-autoloader", "--no-dev", "--no-interaction"],
          checkout,
          TIMEOUTS.INSTALL,
        ),
      ],
    },
    envGroup(name, checkout, answers.env),
  ]

  if (answers.generateAppKey) {
    groups.push({
      name: `Application key for ${name}`,
      atomic: false,
      actions: [
        commandAction({
          name: "generate APP_KEY",
          run: { command: "php", args: ["artisan", "key:generate", "--force"], options: { cwd: checkout } },
          check: async () => ((await hasAppKey(envPath)) ? "satisfied" : "unsatisfied"),
          runner: ctx.runner,
        }),
      ],
    })
  }

  const caches = ["config:cache", "route:cache", "view:cache"].map(artisan)
  if (answers.queueWorkers) caches.push(artisan("queue:restart"))
  groups.push(publishGroup(ctx, `Publish ${name}`, { source: checkout, dest: webRoot, protect: ["storage/"], after: caches }))

  if (answers.configurePhpFpm) groups.push(phpFpmPoolGroup(ctx))

  groups.push(
    ...(await nginxSiteGroups(ctx, {
      siteName: name,
      domain: answers.domain,
      templatePath: "nginx/laravel.conf",
      substitutions: { ROOT_PATH: webRoot, PHP_FPM_SOCKET: getPhpFpmSocket(ctx.config) },
      tls: answers.tls,
    })),
  )

  if (answers.queueWorkers) groups.push(await queueWorkerGroup(ctx, name, webRoot))
  return groups
}

// =============================================================================
// Go: one binary, run by systemd behind an nginx proxy
// =============================================================================

export async function collectGo(prompter: Prompter, base: DeployBase): Promise<GoAnswers> {
  const mainPath = await prompter.ask("go.main", "Path to the main Go file", {
    default: "cmd/web/main.go",
    validate: validateRelativePath,
  })
  const appPort = await prompter.ask("app.port", "Port the app listens on", { default: "8000", validate: validatePort })
  return { ...base, kind: "go", mainPath, appPort }
}

export async function goGroups(ctx: HostContext, answers: GoAnswers, paths: DeployPaths): Promise<ActionGroup[]> {
  const { config, runner } = ctx
  const { user, group } = config.web
  const { folderName: name, mainPath } = answers
  const { checkout, webRoot } = paths
  const envPath = join(checkout, ".env")
  const envExample = join(checkout, ".env.example")
  const goBuild = join(config.paths.cacheRoot, "go-build")
  const goMod = join(config.paths.cacheRoot, "go-mod")
  const unit = `${name}.service`

  return [
    {
      name: `Environment for ${name}`,
      actions: [
        task({
          name: "create .env from .env.example",
          isDone: async () => (await pathExists(envPath)) || !(await pathExists(envExample)),
          run: async apply => {
            await apply.stageFile(envPath, await readFile(envExample), 0o600)
          },
        }),
      ],
    },
    {
      name: `Build ${name}`,
      atomic: false,
      actions: [
        requireOutput(`check ${mainPath}`, [join(checkout, mainPath)], `Main Go file not found: ${mainPath}`),
        buildStep(ctx, "go build", "go", ["build", "-o", "app", mainPath], checkout),
        requireOutput("check binary", [join(checkout, "app")], "Go binary 'app' not found after build"),
      ],
    },
    publishGroup(ctx, `Publish ${name}`, { source: checkout, dest: webRoot }),
    {
      name: "Go caches",
      atomic: false,
      actions: [goBuild, goMod].map(path => directoryAction({ path, owner: { user, group }, runner })),
    },
    ...(await nginxSiteGroups(ctx, {
      siteName: name,
      domain: answers.domain,
      templatePath: "nginx/go.conf",
      substitutions: { APP_PORT: answers.appPort, ROOT_PATH: webRoot },
      tls: answers.tls,
    })),
    {
      name: `systemd unit ${unit}`,
      actions: [
        templateFileAction({
          path: getSystemdUnitPath(config, name),
          template: await ctx.template("systemd/go.service"),
          substitutions: {
            APP_NAME: name,
            APP_PORT: answers.appPort,
            USER: user,
            GROUP: group,
            APP_PATH: webRoot,
            GOCACHE: goBuild,
            GOMODCACHE: goMod,
          },
        }),
      ],
      activate: async () => {
        await ctx.systemd.daemonReload()
        await ctx.systemd.enable(unit)
      },
    },
    {
      name: `Restart ${unit}`,
      atomic: false,
      actions: [task({ name: `restart ${unit}`, run: () => ctx.systemd.restart(unit) })],
    },
  ]
}

// =============================================================================
// Astro: static build synced into the web root
// =============================================================================

export async function collectAstro(prompter: Prompter, base: DeployBase): Promise<AstroAnswers> {
  const buildDir = await prompter.ask("astro.dist", "Build output directory", {
    default: "dist",
    validate: validateRelativePath,
  })
  return { ...base, kind: "astro", buildDir }
}

export async function astroGroups(ctx: HostContext, answers: AstroAnswers, paths: DeployPaths): Promise<ActionGroup[]> {
  const { folderName: name, buildDir } = answers
  const { checkout, webRoot } = paths
  const output = join(checkout, buildDir)

  return [
    {
      name: `Build ${name}`,
      atomic: false,
      actions: [
        buildStep(ctx, "npm install", "npm", ["install"], checkout, TIMEOUTS.INSTALL),
        buildStep(ctx, "npm run build", "npm", ["run", "build"], checkout),
        requireOutput("check build output", [output], `Build output ${buildDir} not found. The build may have failed.`),
      ],
    },
    publishGroup(ctx, `Publish ${name}`, { source: output, dest: webRoot }),
    ...(await nginxSiteGroups(ctx, {
      siteName: name,
      domain: answers.domain,
      templatePath: "nginx/astro.conf",
      substitutions: { ROOT_PATH: webRoot },
      tls: answers.tls,
    })),
  ]
}
