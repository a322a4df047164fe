/**
 * @hostkit/shared
 *
 * Host configuration, constants and operator-input validators used by every
 * package in the monorepo.
 *
 * @example
 * ```typescript
 * import { loadHostConfig, EXIT_CODES } from "@hostkit/shared"
 *
 * const { config } = loadHostConfig()
 * const webRoot = config.paths.webRoot // "/var/www"
 * ```
 */

export {
  CONFIG_ENV_VAR,
  getAppWebRoot,
  getCheckoutPath,
  getNginxEnabledPath,
  getNginxSitePath,
  getPhpFpmPoolPath,
  getPhpFpmSocket,
  getSupervisorConfPath,
  getSystemdUnitPath,
  type LoadedHostConfig,
  loadHostConfig,
  resolveConfigPath,
} from "./config.js"
export { APP_KINDS, type AppKind, DEFAULTS, EXIT_CODES, type ExitCode, isAppKind, TIMEOUTS } from "./constants.js"
export { defaultHostConfig, type HostConfig, hostConfigSchema, parseHostConfig } from "./host-config-schema.js"
export {
  folderNameFromGitUrl,
  type InputValidationResult,
  validateDomain,
  validateFolderName,
  validateGitUrl,
  validateHostname,
  validateKeyName,
  validateNotEmpty,
  validatePort,
  validatePostgresIdentifier,
  validateRelativePath,
  validateSshPort,
  validateSwapSize,
  validateTimezone,
  validateUsername,
} from "./validation.js"
