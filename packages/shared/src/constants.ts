/**
 * Process exit codes. One code per failure class so automation wrapping
 * `hostkit` can tell "fix your input" from "a human must look at the host".
 */
export const EXIT_CODES = {
  OK: 0,
  ACTION_FAILED: 1,
  PREREQUISITE_MISSING: 2,
  VALIDATION_FAILED: 3,
  ROLLBACK_FAILED: 4,
  ALREADY_RUNNING: 5,
  PRECONDITION_FAILED: 6,
} as const

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES]

/** Application kinds `hostkit deploy` knows how to build and serve */
export const APP_KINDS = ["next", "laravel", "go", "astro"] as const

export type AppKind = (typeof APP_KINDS)[number]

export function isAppKind(value: string): value is AppKind {
  return APP_KINDS.some(kind => kind === value)
}

export const DEFAULTS = {
  SSH_PORT: 22,
  SUGGESTED_SSH_PORT: 2204,
  /** Lowest port accepted for a moved sshd; below this needs no change */
  MIN_CUSTOM_SSH_PORT: 1024,
  MAX_PORT: 65535,
  NEW_USER: "vps-user",
  HOSTNAME: "hostkit-server",
  FAIL2BAN_MAX_RETRY: 5,
  FAIL2BAN_BAN_TIME: "1h",
  DEPLOY_KEY_NAME: "id_ed25519",
} as const

export const TIMEOUTS = {
  /** apt-get, composer, pnpm: slow on small VPS plans */
  INSTALL: 15 * 60_000,
  BUILD: 20 * 60_000,
  SERVICE: 30_000,
  VALIDATE: 30_000,
} as const
