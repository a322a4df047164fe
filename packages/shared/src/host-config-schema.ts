/**
 * Host Config Zod Schema — SINGLE SOURCE OF TRUTH
 *
 * Validates hostkit.config.json at parse time.
 * One schema, one type, one parse function. Unknown keys cause errors.
 *
 * Every field has a default matching a stock Debian/Ubuntu host, so an
 * empty object parses to a complete config.
 */

import { z } from "zod"

// ---------------------------------------------------------------------------
// Reusable validators
// ---------------------------------------------------------------------------

const pathStr = z.string().min(1).regex(/^\//, "Must be an absolute path")
const systemName = z.string().regex(/^[a-z_][a-z0-9_-]*$/, "Must be a valid system user or group name")

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

export const hostConfigSchema = z
  .object({
    paths: z
      .object({
        templatesRoot: pathStr.default("/opt/hostkit/templates"),
        webRoot: pathStr.default("/var/www"),
        checkoutRoot: pathStr.default("/srv/hostkit/checkouts"),
        lockFile: pathStr.default("/run/lock/hostkit.lock"),
        nginxDir: pathStr.default("/etc/nginx"),
        nginxSitesAvailable: pathStr.default("/etc/nginx/sites-available"),
        nginxSitesEnabled: pathStr.default("/etc/nginx/sites-enabled"),
        sshdConfig: pathStr.default("/etc/ssh/sshd_config"),
        /** Where the deploy key pair is generated */
        sshKeyDir: pathStr.default("/root/.ssh"),
        systemdUnitDir: pathStr.default("/etc/systemd/system"),
        supervisorConfDir: pathStr.default("/etc/supervisor/conf.d"),
        fail2banJail: pathStr.default("/etc/fail2ban/jail.local"),
        sudoersDir: pathStr.default("/etc/sudoers.d"),
        hostnameFile: pathStr.default("/etc/hostname"),
        fstab: pathStr.default("/etc/fstab"),
        swapFile: pathStr.default("/swapfile"),
        aptConfDir: pathStr.default("/etc/apt/apt.conf.d"),
        phpConfRoot: pathStr.default("/etc/php"),
        letsencryptLive: pathStr.default("/etc/letsencrypt/live"),
        cacheRoot: pathStr.default("/var/cache"),
      })
      .strict()
      .default({}),

    web: z
      .object({
        user: systemName.default("www-data"),
        group: systemName.default("www-data"),
        phpVersion: z
          .string()
          .regex(/^\d+\.\d+$/, "Must look like 8.4")
          .default("8.4"),
      })
      .strict()
      .default({}),

    /** Pre-seeded prompt answers keyed by question id, used for unattended runs */
    answers: z.record(z.string()).default({}),
  })
  .strict()

// ---------------------------------------------------------------------------
// Derived type
// ---------------------------------------------------------------------------

export type HostConfig = z.infer<typeof hostConfigSchema>

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value)
}

/**
 * Strip `_comment` keys recursively. The example file uses them for
 * documentation, but they must not reach the strict schema.
 */
function stripCommentKeys(obj: unknown): void {
  if (Array.isArray(obj)) {
    for (const item of obj) stripCommentKeys(item)
    return
  }
  if (!isRecord(obj)) return
  for (const key of Object.keys(obj)) {
    if (key === "_comment") {
      delete obj[key]
    } else {
      stripCommentKeys(obj[key])
    }
  }
}

/**
 * Parse and validate raw JSON string as HostConfig.
 * Throws an Error on malformed JSON, or a ZodError on schema validation failure.
 */
export function parseHostConfig(raw: string): HostConfig {
  let data: unknown
  try {
    data = JSON.parse(raw)
  } catch (e) {
    throw new Error(`Invalid JSON in host config: ${e instanceof Error ? e.message : String(e)}`)
  }
  stripCommentKeys(data)
  return hostConfigSchema.parse(data)
}

/** The config every field-default produces. */
export function defaultHostConfig(): HostConfig {
  return hostConfigSchema.parse({})
}
