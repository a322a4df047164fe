import { lstat, mkdir, readFile, readlink, rm, stat } from "node:fs/promises"
import { ProvisionError } from "../errors.js"
import { type CommandRunner, runCommand, spawnCommand } from "../executors/common.js"
import { render, type SubstitutionMap, type Template } from "../template.js"
import type { Action, ActionPolicy, CheckState } from "../types.js"

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT"
}

async function readLive(path: string): Promise<{ content: Buffer; mode: number } | null> {
  try {
    const [content, info] = await Promise.all([readFile(path), stat(path)])
    return { content, mode: info.mode & 0o777 }
  } catch (error) {
    if (isNotFound(error)) return null
    throw error
  }
}

interface CommonOptions {
  /** Shown in progress output and reports */
  name?: string
  policy?: ActionPolicy
}

export interface FileActionOptions extends CommonOptions {
  path: string
  content: string | Buffer
  /** Permission bits; unset keeps the live file's mode (0644 for new files) */
  mode?: number
}

/** Ensure a file has exactly this content (and mode). Written through staging. */
export function fileAction(options: FileActionOptions): Action {
  const { path, mode } = options
  const desired = typeof options.content === "string" ? Buffer.from(options.content, "utf8") : options.content

  return {
    name: options.name ?? `write ${path}`,
    policy: options.policy,
    async check(): Promise<CheckState> {
      const live = await readLive(path)
      if (!live || !live.content.equals(desired)) return "unsatisfied"
      if (mode !== undefined && live.mode !== mode) return "unsatisfied"
      return "satisfied"
    },
    async apply(ctx) {
      await ctx.stageFile(path, desired, mode)
    },
  }
}

export interface TemplateFileActionOptions extends CommonOptions {
  path: string
  template: Template
  substitutions: SubstitutionMap
  mode?: number
}

/**
 * Render now, write later. A missing placeholder fails while the plan is
 * being built, before anything runs.
 */
export function templateFileAction(options: TemplateFileActionOptions): Action {
  const content = render(options.template, options.substitutions)
  return fileAction({
    name: options.name ?? `render ${options.path}`,
    policy: options.policy,
    path: options.path,
    content,
    mode: options.mode,
  })
}

/**
 * Line formats `applyDirectives` understands:
 * - `keyword`: `Key value` (sshd_config), `#` comments, new keys go before the first `Match` block
 * - `ini`: `key = value` (php-fpm pools), `;` comments
 * - `env`: `KEY=value` (.env files), `#` comments
 */
export type DirectiveSyntax = "keyword" | "ini" | "env"

interface SyntaxRules {
  key: RegExp
  /** Any top-level line setting the key, commented out or not */
  line(key: string): RegExp
  format(key: string, value: string): string
  insertBefore?: RegExp
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}

const SYNTAX: Record<DirectiveSyntax, SyntaxRules> = {
  keyword: {
    key: /^[A-Za-z][A-Za-z0-9_-]*$/,
    line: key => new RegExp(`^#*${key}(\\s|$)`),
    format: (key, value) => `${key} ${value}`,
    insertBefore: /^Match\s/,
  },
  ini: {
    key: /^[A-Za-z][A-Za-z0-9_.-]*$/,
    line: key => new RegExp(`^;*\\s*${escapeRegExp(key)}\\s*=`),
    format: (key, value) => `${key} = ${value}`,
  },
  env: {
    key: /^[A-Za-z_][A-Za-z0-9_]*$/,
    line: key => new RegExp(`^(?:#\\s*)?${key}=`),
    format: (key, value) => `${key}=${value}`,
  },
}

/**
 * Set directives in a line-oriented config file. Every top-level line for
 * the key, commented out or not, is replaced; indented lines (sshd `Match`
 * blocks) are left alone. A key with no line is added at the end, or
 * before the first `Match` block for `keyword` files.
 */
export function applyDirectives(
  content: string,
  directives: Readonly<Record<string, string>>,
  syntax: DirectiveSyntax = "keyword",
): string {
  const rules = SYNTAX[syntax]
  let lines = content.split("\n")

  for (const [key, value] of Object.entries(directives)) {
    if (!rules.key.test(key)) {
      throw ProvisionError.preconditionFailed(`Invalid directive name: ${key}`)
    }
    if (/[\r\n]/.test(value)) {
      throw ProvisionError.preconditionFailed(`Invalid value for ${key}: contains a line break`)
    }
    const pattern = rules.line(key)
    const wanted = rules.format(key, value)
    let found = false
    lines = lines.map(line => {
      if (!pattern.test(line)) return line
      found = true
      return wanted
    })
    if (found) continue

    const { insertBefore } = rules
    const block = insertBefore ? lines.findIndex(line => insertBefore.test(line)) : -1
    if (block !== -1) {
      lines.splice(block, 0, wanted)
    } else if (lines[lines.length - 1] === "") {
      lines.splice(lines.length - 1, 0, wanted)
    } else {
      lines.push(wanted)
    }
  }

  return lines.join("\n")
}

export interface DirectivesActionOptions extends CommonOptions {
  path: string
  directives: Readonly<Record<string, string>>
  syntax?: DirectiveSyntax
  /** Read instead when `path` does not exist yet, e.g. `.env.example` */
  fallbackFrom?: string
  mode?: number
}

export function directivesAction(options: DirectivesActionOptions): Action {
  const { path, directives, syntax, fallbackFrom } = options

  const current = async () => {
    const live = (await readLive(path)) ?? (fallbackFrom ? await readLive(fallbackFrom) : null)
    return live ? live.content.toString("utf8") : ""
  }

  return {
    name: options.name ?? `set ${Object.keys(directives).join(", ")} in ${path}`,
    policy: options.policy,
    async check() {
      if (!(await readLive(path))) return "unsatisfied"
      const content = await current()
      return applyDirectives(content, directives, syntax) === content ? "satisfied" : "unsatisfied"
    },
    async apply(ctx) {
      await ctx.stageFile(path, applyDirectives(await current(), directives, syntax), options.mode)
    },
  }
}

export interface LineActionOptions extends CommonOptions {
  path: string
  line: string
  mode?: number
}

/** Ensure a file contains a line, appending it when absent (fstab entries) */
export function lineAction(options: LineActionOptions): Action {
  const { path, line } = options

  const current = async () => {
    const live = await readLive(path)
    return live ? live.content.toString("utf8") : ""
  }

  return {
    name: options.name ?? `add "${line}" to ${path}`,
    policy: options.policy,
    async check() {
      return (await current()).split("\n").includes(line) ? "satisfied" : "unsatisfied"
    },
    async apply(ctx) {
      const content = await current()
      const base = content === "" || content.endsWith("\n") ? content : `${content}\n`
      await ctx.stageFile(path, `${base}${line}\n`, options.mode)
    },
  }
}

export interface SymlinkActionOptions extends CommonOptions {
  /** The link itself, e.g. /etc/nginx/sites-enabled/shop.conf */
  path: string
  /** What it points at */
  target: string
}

export function symlinkAction(options: SymlinkActionOptions): Action {
  const { path, target } = options
  return {
    name: options.name ?? `link ${path} -> ${target}`,
    policy: options.policy,
    async check() {
      try {
        const info = await lstat(path)
        if (!info.isSymbolicLink()) return "unsatisfied"
        return (await readlink(path)) === target ? "satisfied" : "unsatisfied"
      } catch (error) {
        if (isNotFound(error)) return "unsatisfied"
        throw error
      }
    },
    async apply(ctx) {
      await ctx.stageSymlink(path, target)
    },
  }
}

export interface DirectoryActionOptions extends CommonOptions {
  path: string
  mode?: number
  /** `chown -R user:group` after creating */
  owner?: { user: string; group: string }
  runner?: CommandRunner
}

/** Ensure a directory exists. Rollback removes what this action created. */
export function directoryAction(options: DirectoryActionOptions): Action {
  const { path, owner } = options
  const runner = options.runner ?? spawnCommand
  let created: string | undefined

  return {
    name: options.name ?? `create ${path}`,
    policy: options.policy,
    async check() {
      try {
        return (await stat(path)).isDirectory() ? "satisfied" : "unsatisfied"
      } catch (error) {
        if (isNotFound(error)) return "unsatisfied"
        throw error
      }
    },
    async apply() {
      created = await mkdir(path, { recursive: true, mode: options.mode })
      if (owner) {
        await runCommand(runner, "chown", ["-R", `${owner.user}:${owner.group}`, path])
      }
    },
    async rollback() {
      if (created) await rm(created, { recursive: true, force: true })
    },
  }
}
