/**
 * ============================================================================
 * HOST CONFIGURATION
 * ============================================================================
 *
 * Loads hostkit.config.json from `--config <path>` or the HOSTKIT_CONFIG_PATH
 * env var. No config file at all = stock Debian/Ubuntu defaults.
 * A path that was named but does not exist, or does not parse, fails fast.
 */

import { existsSync, readFileSync } from "node:fs"
import { defaultHostConfig, type HostConfig, parseHostConfig } from "./host-config-schema.js"

export const CONFIG_ENV_VAR = "HOSTKIT_CONFIG_PATH"

export interface LoadedHostConfig {
  config: HostConfig
  /** File the config was read from, null when running on defaults */
  source: string | null
}

/**
 * Pick the config path: explicit flag first, then the env var.
 */
export function resolveConfigPath(explicitPath?: string, env: NodeJS.ProcessEnv = process.env): string | null {
  if (explicitPath) return explicitPath
  const fromEnv = env[CONFIG_ENV_VAR]
  return fromEnv ? fromEnv : null
}

export function loadHostConfig(explicitPath?: string, env: NodeJS.ProcessEnv = process.env): LoadedHostConfig {
  const configPath = resolveConfigPath(explicitPath, env)

  if (!configPath) {
    return { config: defaultHostConfig(), source: null }
  }

  if (!existsSync(configPath)) {
    throw new Error(`FATAL: Host config not found at ${configPath}.`)
  }

  try {
    const raw = readFileSync(configPath, "utf8")
    return { config: parseHostConfig(raw), source: configPath }
  } catch (err) {
    throw new Error(`FATAL: Failed to parse ${configPath}: ${err instanceof Error ? err.message : String(err)}`)
  }
}

// =============================================================================
// Derived paths
// =============================================================================

/** nginx site file for an app, e.g. /etc/nginx/sites-available/shop.conf */
export function getNginxSitePath(config: HostConfig, siteName: string): string {
  return `${config.paths.nginxSitesAvailable}/${siteName}.conf`
}

export function getNginxEnabledPath(config: HostConfig, siteName: string): string {
  return `${config.paths.nginxSitesEnabled}/${siteName}.conf`
}

/** Public directory an app is synced into, e.g. /var/www/shop */
export function getAppWebRoot(config: HostConfig, folderName: string): string {
  return `${config.paths.webRoot}/${folderName}`
}

export function getCheckoutPath(config: HostConfig, folderName: string): string {
  return `${config.paths.checkoutRoot}/${folderName}`
}

export function getSystemdUnitPath(config: HostConfig, serviceName: string): string {
  return `${config.paths.systemdUnitDir}/${serviceName}.service`
}

export function getSupervisorConfPath(config: HostConfig, programName: string): string {
  return `${config.paths.supervisorConfDir}/${programName}.conf`
}

export function getPhpFpmSocket(config: HostConfig): string {
  return `/run/php/php${config.web.phpVersion}-fpm.sock`
}

/** Default php-fpm pool, e.g. /etc/php/8.4/fpm/pool.d/www.conf */
export function getPhpFpmPoolPath(config: HostConfig): string {
  return `${config.paths.phpConfRoot}/${config.web.phpVersion}/fpm/pool.d/www.conf`
}
