import { DEFAULTS } from "./constants.js"

/**
 * Result of validating operator input
 */
export interface InputValidationResult {
  valid: boolean
  /** Normalised value (trimmed, lower-cased where relevant) */
  value: string
  /** Error message if validation failed */
  error?: string
}

function ok(value: string): InputValidationResult {
  return { valid: true, value }
}

function invalid(value: string, error: string): InputValidationResult {
  return { valid: false, value, error }
}

/**
 * Domain must be lower-case labels with a TLD of two or more letters.
 * Rejects path separators so it is safe to use in file names.
 */
export function validateDomain(input: string): InputValidationResult {
  const value = input.trim().toLowerCase()
  if (!value) return invalid(value, "Domain cannot be empty")
  if (value.includes("..") || value.includes("/")) {
    return invalid(value, `Path traversal detected in domain: ${value}`)
  }
  if (!/^(?:[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?\.)+[a-z]{2,}$/.test(value)) {
    return invalid(value, `Invalid domain (must have a valid TLD like .com, .net): ${value}`)
  }
  return ok(value)
}

/**
 * Folder names become directories under the web root and checkout root,
 * nginx site names and service names.
 */
export function validateFolderName(input: string): InputValidationResult {
  const value = input.trim()
  if (!value) return invalid(value, "Folder name cannot be empty")
  if (/[/\\*]/.test(value) || value === "." || value === "..") {
    return invalid(value, `Invalid folder name (cannot contain /, \\, *): ${value}`)
  }
  if (!/^[A-Za-z0-9._-]+$/.test(value)) {
    return invalid(value, `Invalid folder name (letters, digits, dot, dash, underscore only): ${value}`)
  }
  return ok(value)
}

/** HTTPS, git:// or scp-style SSH remote */
export function validateGitUrl(input: string): InputValidationResult {
  const value = input.trim()
  if (!value) return invalid(value, "Git URL cannot be empty")
  if (!/^(?:https:\/\/|git:\/\/|ssh:\/\/|git@[a-zA-Z0-9.-]+:)[a-zA-Z0-9./_~:@-]+$/.test(value)) {
    return invalid(
      value,
      "Invalid Git URL. Must be a valid HTTPS, git:// or SSH URL (e.g., git@github.com:user/repo.git)",
    )
  }
  return ok(value)
}

/** Default folder for a remote: last path segment without `.git` */
export function folderNameFromGitUrl(gitUrl: string): string {
  const trimmed = gitUrl.trim().replace(/\/+$/, "")
  const lastSegment = trimmed.split(/[/:]/).pop() ?? ""
  return lastSegment.replace(/\.git$/, "")
}

export function validateSshPort(input: string): InputValidationResult {
  const value = input.trim()
  if (!/^\d+$/.test(value)) return invalid(value, `Invalid port number: ${value}`)
  const port = Number(value)
  if (port !== DEFAULTS.SSH_PORT && (port < DEFAULTS.MIN_CUSTOM_SSH_PORT || port > DEFAULTS.MAX_PORT)) {
    return invalid(value, `Invalid port number. Must be ${DEFAULTS.SSH_PORT} or between 1024 and 65535.`)
  }
  return ok(String(port))
}

/** Linux user names as accepted by adduser's default NAME_REGEX */
export function validateUsername(input: string): InputValidationResult {
  const value = input.trim()
  if (!/^[a-z][-a-z0-9_]{0,31}$/.test(value)) {
    return invalid(value, `Invalid username: ${value}`)
  }
  return ok(value)
}

export function validateHostname(input: string): InputValidationResult {
  const value = input.trim().toLowerCase()
  if (!/^[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?$/.test(value)) {
    return invalid(value, `Invalid hostname: ${value}`)
  }
  return ok(value)
}

/** Any TCP port an app may listen on */
export function validatePort(input: string): InputValidationResult {
  const value = input.trim()
  const port = Number(value)
  if (!/^\d+$/.test(value) || port < 1 || port > DEFAULTS.MAX_PORT) {
    return invalid(value, `Invalid port number: ${value}`)
  }
  return ok(String(port))
}

/** IANA zone name as `timedatectl set-timezone` takes it, e.g. Europe/Berlin */
export function validateTimezone(input: string): InputValidationResult {
  const value = input.trim()
  if (!/^[A-Za-z][A-Za-z0-9_+-]*(?:\/[A-Za-z0-9_+-]+)*$/.test(value)) {
    return invalid(value, `Invalid timezone: ${value}`)
  }
  return ok(value)
}

/** Whole gigabytes, 1 to 64 */
export function validateSwapSize(input: string): InputValidationResult {
  const value = input.trim()
  const size = Number(value)
  if (!/^\d+$/.test(value) || size < 1 || size > 64) {
    return invalid(value, `Invalid swap size (whole GB between 1 and 64): ${value}`)
  }
  return ok(String(size))
}

/** Path inside a checkout: relative, no `..` segments */
export function validateRelativePath(input: string): InputValidationResult {
  const value = input.trim().replace(/^\.\//, "")
  if (!value) return invalid(value, "Path cannot be empty")
  if (value.startsWith("/") || value.split("/").includes("..")) {
    return invalid(value, `Path must stay inside the project: ${value}`)
  }
  return ok(value)
}

export function validateNotEmpty(input: string): InputValidationResult {
  const value = input.trim()
  return value ? ok(value) : invalid(value, "Value cannot be empty")
}

/** Unquoted PostgreSQL identifier: database and role names */
export function validatePostgresIdentifier(input: string): InputValidationResult {
  const value = input.trim()
  if (!/^[a-z_][a-z0-9_]{0,62}$/.test(value)) {
    return invalid(value, `Invalid PostgreSQL name (lower-case letters, digits, underscores): ${value}`)
  }
  return ok(value)
}

/** File name for an SSH key under the key directory */
export function validateKeyName(input: string): InputValidationResult {
  const value = input.trim()
  if (!/^[A-Za-z0-9][A-Za-z0-9._-]*$/.test(value) || value.endsWith(".pub")) {
    return invalid(value, `Invalid key name: ${value}`)
  }
  return ok(value)
}
