import { readFile } from "node:fs/promises"
import { hostname as currentHostname } from "node:os"
import { join } from "node:path"
import {
  type Action,
  type ActionGroup,
  commandAction,
  commandValidator,
  directivesAction,
  directoryAction,
  fileAction,
  hasCommand,
  lineAction,
  packageAction,
  ProvisionError,
  runCommand,
  runCommandSafe,
  serviceAction,
  sshdValidator,
  templateFileAction,
} from "@hostkit/engine"
import {
  DEFAULTS,
  TIMEOUTS,
  validateHostname,
  validateKeyName,
  validateSshPort,
  validateSwapSize,
  validateTimezone,
  validateUsername,
} from "@hostkit/shared"
import type { HostContext } from "../context.js"
import type { Prompter } from "../prompt.js"

export const STACK_COMPONENTS = ["nginx", "php", "composer", "node", "supervisor", "redis", "postgres"] as const

export type StackComponent = (typeof STACK_COMPONENTS)[number]

const STACK_LABELS: Record<StackComponent, string> = {
  nginx: "Nginx",
  php: "PHP-FPM",
  composer: "Composer",
  node: "Node.js with pnpm and pm2",
  supervisor: "Supervisor",
  redis: "Redis",
  postgres: "PostgreSQL",
}

export interface ProvisionAnswers {
  upgradePackages: boolean
  hostname: string | null
  timezone: string | null
  swapSizeGb: number | null
  timeSync: boolean
  user: { name: string; passwordlessSudo: boolean } | null
  /** Keys only: PasswordAuthentication no, PubkeyAuthentication yes */
  hardenSsh: boolean
  /** New sshd port, null keeps the current one */
  sshPort: number | null
  /** Key file name under `paths.sshKeyDir`, null skips the deploy key */
  deployKey: string | null
  firewall: boolean
  fail2ban: boolean
  unattendedUpgrades: boolean
  stack: Record<StackComponent, boolean>
}

/**
 * Ask everything up front so the run itself never stops for input.
 */
export async function collectProvisionAnswers(prompter: Prompter): Promise<ProvisionAnswers> {
  const upgradePackages = await prompter.confirm("upgrade", "Upgrade installed packages now?", true)

  const hostname = (await prompter.confirm("hostname.change", "Change the hostname?", true))
    ? await prompter.ask("hostname", "New hostname", { default: DEFAULTS.HOSTNAME, validate: validateHostname })
    : null

  const timezone = (await prompter.confirm("timezone.change", "Set the timezone?", false))
    ? await prompter.ask("timezone", "Timezone (e.g. Europe/Berlin)", { default: "UTC", validate: validateTimezone })
    : null

  const swapSizeGb = (await prompter.confirm("swap", "Create a swap file (recommended for low RAM VPS)?", true))
    ? Number(await prompter.ask("swap.size", "Swap size in GB", { default: "2", validate: validateSwapSize }))
    : null

  const timeSync = await prompter.confirm("timesync", "Install chrony to keep the clock in sync?", true)

  let user: ProvisionAnswers["user"] = null
  if (await prompter.confirm("user.create", "Create a non-root sudo user?", true)) {
    const name = await prompter.ask("user.name", "Username", { default: DEFAULTS.NEW_USER, validate: validateUsername })
    const passwordlessSudo = await prompter.confirm("user.nopasswd", `Allow passwordless sudo for ${name}?`, true)
    user = { name, passwordlessSudo }
  }

  const hardenSsh = await prompter.confirm("ssh.harden", "Disable SSH password login (keys only)?", true)

  const sshPort = (await prompter.confirm("ssh.port.change", "Move SSH to another port?", false))
    ? Number(
        await prompter.ask("ssh.port", "New SSH port (1024-65535)", {
          default: String(DEFAULTS.SUGGESTED_SSH_PORT),
          validate: validateSshPort,
        }),
      )
    : null

  const deployKey = (await prompter.confirm(
    "ssh.deploy-key",
    "Generate an SSH key for pulling private Git repositories?",
    true,
  ))
    ? await prompter.ask("ssh.deploy-key.name", "Key file name", {
        default: DEFAULTS.DEPLOY_KEY_NAME,
        validate: validateKeyName,
      })
    : null

  const firewall = await prompter.confirm("firewall", "Enable the UFW firewall (SSH only)?", true)
  const fail2ban = await prompter.confirm("fail2ban", "Install fail2ban to ban repeated SSH failures?", true)
  const unattendedUpgrades = await prompter.confirm(
    "unattended-upgrades",
    "Enable unattended security upgrades?",
    true,
  )

  const stack: Record<StackComponent, boolean> = {
    nginx: false,
    php: false,
    composer: false,
    node: false,
    supervisor: false,
    redis: false,
    postgres: false,
  }
  for (const component of STACK_COMPONENTS) {
    stack[component] = await prompter.confirm(`stack.${component}`, `Install ${STACK_LABELS[component]}?`, true)
  }

  return {
    upgradePackages,
    hostname,
    timezone,
    swapSizeGb,
    timeSync,
    user,
    hardenSsh,
    sshPort,
    deployKey,
    firewall,
    fail2ban,
    unattendedUpgrades,
    stack,
  }
}

const APT_OPTIONS = { env: { DEBIAN_FRONTEND: "noninteractive" }, timeoutMs: TIMEOUTS.INSTALL }

function systemPackagesGroup(ctx: HostContext): ActionGroup {
  const { runner } = ctx
  return {
    name: "System packages",
    atomic: false,
    actions: [
      commandAction({ name: "refresh package index", run: { command: "apt-get", args: ["update"], options: APT_OPTIONS }, runner }),
      commandAction({
        name: "upgrade installed packages",
        run: { command: "apt-get", args: ["upgrade", "-y"], options: APT_OPTIONS },
        runner,
      }),
    ],
  }
}

function hostnameGroup(ctx: HostContext, hostname: string): ActionGroup {
  const { runner } = ctx
  return {
    name: "Hostname",
    actions: [fileAction({ name: `set hostname to ${hostname}`, path: ctx.config.paths.hostnameFile, content: `${hostname}\n` })],
    activate: async () => {
      await runCommand(runner, "hostnamectl", ["set-hostname", hostname])
    },
  }
}

function timezoneGroup(ctx: HostContext, timezone: string): ActionGroup {
  const { runner } = ctx
  return {
    name: "Timezone",
    atomic: false,
    actions: [
      commandAction({
        name: `set timezone to ${timezone}`,
        run: { command: "timedatectl", args: ["set-timezone", timezone] },
        check: async () => {
          const current = await runCommandSafe(runner, "timedatectl", ["show", "-p", "Timezone", "--value"])
          return current.stdout === timezone ? "satisfied" : "unsatisfied"
        },
        runner,
      }),
    ],
  }
}

function swapGroup(ctx: HostContext, sizeGb: number): ActionGroup {
  const { runner } = ctx
  const { swapFile, fstab } = ctx.config.paths

  return {
    name: "Swap",
    atomic: false,
    actions: [
      commandAction({
        name: `allocate ${sizeGb}G swap file`,
        run: {
          command: "sh",
          args: ["-c", 'fallocate -l "$1" "$2" && chmod 600 "$2" && mkswap "$2"', "sh", `${sizeGb}G`, swapFile],
        },
        creates: swapFile,
        runner,
      }),
      commandAction({
        name: `activate ${swapFile}`,
        run: { command: "swapon", args: [swapFile] },
        check: async () => {
          const active = await runCommandSafe(runner, "swapon", ["--show=NAME", "--noheadings"])
          return active.stdout.split("\n").includes(swapFile) ? "satisfied" : "unsatisfied"
        },
        runner,
      }),
      lineAction({ name: `register ${swapFile} in ${fstab}`, path: fstab, line: `${swapFile} none swap sw 0 0` }),
    ],
  }
}

function timeSyncGroup(ctx: HostContext): ActionGroup {
  return {
    name: "Time sync",
    atomic: false,
    actions: [
      packageAction({ package: "chrony", packages: ctx.packages }),
      serviceAction({ service: "chrony", services: ctx.systemd }),
    ],
  }
}

async function userGroup(ctx: HostContext, user: NonNullable<ProvisionAnswers["user"]>): Promise<ActionGroup> {
  const { runner } = ctx
  const { name } = user

  const actions: Action[] = [
    commandAction({
      name: `create user ${name}`,
      run: { command: "adduser", args: ["--gecos", "", "--disabled-password", name] },
      unless: { command: "id", args: ["-u", name] },
      rollback: async () => {
        await runCommand(runner, "deluser", ["--remove-home", name])
      },
      runner,
    }),
    commandAction({
      name: `add ${name} to sudo`,
      run: { command: "usermod", args: ["-aG", "sudo", name] },
      check: async () => {
        const groups = await runCommandSafe(runner, "id", ["-nG", name])
        return groups.exitCode === 0 && groups.stdout.split(/\s+/).includes("sudo") ? "satisfied" : "unsatisfied"
      },
      rollback: async () => {
        await runCommand(runner, "gpasswd", ["-d", name, "sudo"])
      },
      runner,
    }),
  ]

  if (user.passwordlessSudo) {
    actions.push(
      templateFileAction({
        name: `passwordless sudo for ${name}`,
        path: join(ctx.config.paths.sudoersDir, name),
        template: await ctx.template("sudoers/nopasswd"),
        substitutions: { USER: name },
        mode: 0o440,
      }),
    )
  }

  return {
    name: `User ${name}`,
    actions,
    validate: commandValidator("visudo", path => ["-cf", path], runner),
  }
}

function firewallGroup(ctx: HostContext, sshPort: number | null): ActionGroup {
  const { runner } = ctx
  const rules = sshPort === null ? ["OpenSSH"] : ["OpenSSH", `${sshPort}/tcp`]

  return {
    name: "Firewall",
    atomic: false,
    actions: [
      packageAction({ package: "ufw", packages: ctx.packages }),
      ...rules.map(rule =>
        commandAction({
          name: `allow ${rule}`,
          run: { command: "ufw", args: ["allow", rule] },
          check: async () => {
            const added = await runCommandSafe(runner, "ufw", ["show", "added"])
            return added.stdout.split("\n").some(line => line.trim() === `ufw allow ${rule}`) ? "satisfied" : "unsatisfied"
          },
          runner,
        }),
      ),
      commandAction({
        name: "enable ufw",
        run: { command: "ufw", args: ["--force", "enable"] },
        check: async () => {
          const status = await runCommandSafe(runner, "ufw", ["status"])
          return status.stdout.startsWith("Status: active") ? "satisfied" : "unsatisfied"
        },
        runner,
      }),
    ],
  }
}

/** Debian calls the unit `ssh`, RHEL-likes `sshd` */
async function restartSsh(ctx: HostContext): Promise<void> {
  for (const service of ["ssh", "sshd"]) {
    if (await ctx.systemd.isActive(service)) {
      await ctx.systemd.restart(service)
      return
    }
  }
  throw ProvisionError.preconditionFailed("Could not find an active SSH service to restart", "Restart sshd by hand.")
}

function sshGroup(ctx: HostContext, answers: ProvisionAnswers): ActionGroup {
  const directives: Record<string, string> = {}
  if (answers.hardenSsh) {
    directives.PasswordAuthentication = "no"
    directives.PubkeyAuthentication = "yes"
  }
  if (answers.sshPort !== null) directives.Port = String(answers.sshPort)

  return {
    name: "SSH daemon",
    actions: [directivesAction({ path: ctx.config.paths.sshdConfig, directives })],
    validate: sshdValidator(ctx.runner),
    activate: () => restartSsh(ctx),
  }
}

function deployKeyPath(ctx: HostContext, keyName: string): string {
  return join(ctx.config.paths.sshKeyDir, keyName)
}

/** ed25519 pair without a passphrase, generated only when the private key is absent */
function deployKeyGroup(ctx: HostContext, keyName: string, hostname: string): ActionGroup {
  const { runner } = ctx
  const keyPath = deployKeyPath(ctx, keyName)

  return {
    name: "Deploy key",
    atomic: false,
    actions: [
      directoryAction({ path: ctx.config.paths.sshKeyDir, mode: 0o700, runner }),
      commandAction({
        name: `generate ${keyPath}`,
        run: { command: "ssh-keygen", args: ["-q", "-t", "ed25519", "-N", "", "-C", `${keyName}@${hostname}`, "-f", keyPath] },
        creates: keyPath,
        runner,
      }),
    ],
  }
}

async function fail2banGroups(ctx: HostContext, sshPort: number | null): Promise<ActionGroup[]> {
  return [
    {
      name: "fail2ban",
      atomic: false,
      actions: [
        packageAction({ package: "fail2ban", packages: ctx.packages }),
        serviceAction({ service: "fail2ban", services: ctx.systemd }),
      ],
    },
    {
      name: "fail2ban jail",
      actions: [
        templateFileAction({
          path: ctx.config.paths.fail2banJail,
          template: await ctx.template("fail2ban/jail.local"),
          substitutions: {
            SSH_PORT: String(sshPort ?? DEFAULTS.SSH_PORT),
            MAX_RETRY: String(DEFAULTS.FAIL2BAN_MAX_RETRY),
            BAN_TIME: DEFAULTS.FAIL2BAN_BAN_TIME,
          },
        }),
      ],
      activate: () => ctx.systemd.restart("fail2ban"),
    },
  ]
}

async function unattendedUpgradesGroup(ctx: HostContext): Promise<ActionGroup> {
  return {
    name: "Unattended upgrades",
    atomic: false,
    actions: [
      packageAction({ package: "unattended-upgrades", packages: ctx.packages }),
      templateFileAction({
        path: join(ctx.config.paths.aptConfDir, "20auto-upgrades"),
        template: await ctx.template("apt/20auto-upgrades"),
        substitutions: {},
      }),
    ],
  }
}

function globalNpmTool(ctx: HostContext, tool: string): Action {
  const { runner } = ctx
  return commandAction({
    name: `install ${tool}`,
    run: { command: "npm", args: ["install", "-g", tool], options: { timeoutMs: TIMEOUTS.INSTALL } },
    check: async () => ((await hasCommand(runner, tool)) ? "satisfied" : "unsatisfied"),
    runner,
  })
}

function stackGroup(ctx: HostContext, component: StackComponent): ActionGroup {
  const php = `php${ctx.config.web.phpVersion}`
  const install = (...names: string[]) => names.map(name => packageAction({ package: name, packages: ctx.packages }))
  const enable = (service: string) => serviceAction({ service, services: ctx.systemd })

  const actions: Record<StackComponent, () => Action[]> = {
    nginx: () => [...install("nginx"), enable("nginx")],
    php: () => [
      ...install(
        ...["fpm", "cli", "common", "mysql", "pgsql", "curl", "gd", "mbstring", "xml", "zip", "bcmath", "intl"].map(
          ext => `${php}-${ext}`,
        ),
      ),
      enable(`${php}-fpm`),
    ],
    composer: () => install("composer"),
    node: () => [...install("nodejs", "npm"), globalNpmTool(ctx, "pnpm"), globalNpmTool(ctx, "pm2")],
    supervisor: () => [...install("supervisor"), enable("supervisor")],
    redis: () => [...install("redis-server"), enable("redis-server")],
    postgres: () => [...install("postgresql", "postgresql-contrib"), enable("postgresql")],
  }

  return { name: STACK_LABELS[component], atomic: false, actions: actions[component]() }
}

/**
 * Order matters: the firewall opens a new SSH port before sshd moves to
 * it, and the sudo user exists before password login is switched off.
 */
export async function buildProvisionPlan(ctx: HostContext, answers: ProvisionAnswers): Promise<ActionGroup[]> {
  const groups: ActionGroup[] = []

  if (answers.upgradePackages) groups.push(systemPackagesGroup(ctx))
  if (answers.hostname !== null) groups.push(hostnameGroup(ctx, answers.hostname))
  if (answers.timezone !== null) groups.push(timezoneGroup(ctx, answers.timezone))
  if (answers.swapSizeGb !== null) groups.push(swapGroup(ctx, answers.swapSizeGb))
  if (answers.timeSync) groups.push(timeSyncGroup(ctx))
  if (answers.user) groups.push(await userGroup(ctx, answers.user))
  if (answers.firewall) groups.push(firewallGroup(ctx, answers.sshPort))
  if (answers.hardenSsh || answers.sshPort !== null) groups.push(sshGroup(ctx, answers))
  if (answers.deployKey !== null) {
    groups.push(deployKeyGroup(ctx, answers.deployKey, answers.hostname ?? currentHostname()))
  }
  if (answers.fail2ban) groups.push(...(await fail2banGroups(ctx, answers.sshPort)))
  if (answers.unattendedUpgrades) groups.push(await unattendedUpgradesGroup(ctx))

  for (const component of STACK_COMPONENTS) {
    if (answers.stack[component]) groups.push(stackGroup(ctx, component))
  }

  return groups
}

/** Lines printed after a successful provision run */
export async function provisionNotes(ctx: HostContext, answers: ProvisionAnswers): Promise<string[]> {
  const notes: string[] = []
  if (answers.sshPort !== null) {
    notes.push(`SSH now listens on port ${answers.sshPort}. Test a new session before logging out.`)
  }
  if (answers.deployKey !== null) {
    const publicKey = `${deployKeyPath(ctx, answers.deployKey)}.pub`
    notes.push(
      `Deploy key: ${publicKey}`,
      (await readFile(publicKey, "utf8")).trim(),
      "Add it to your Git host's SSH keys, then test with `ssh -T git@github.com`.",
    )
  }
  return notes
}
