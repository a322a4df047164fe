import { EXIT_CODES, type ExitCode } from "@hostkit/shared"

export type ProvisionErrorCode =
  | "MISSING_PLACEHOLDER"
  | "ACTION_FAILED"
  | "VALIDATION_FAILED"
  | "UNCOMMITTABLE"
  | "ALREADY_RUNNING"
  | "PRECONDITION_FAILED"
  | "PREREQUISITE_MISSING"
  | "ROLLBACK_FAILED"
  | "UNKNOWN"

const EXIT_CODE_BY_ERROR: Record<ProvisionErrorCode, ExitCode> = {
  MISSING_PLACEHOLDER: EXIT_CODES.PRECONDITION_FAILED,
  ACTION_FAILED: EXIT_CODES.ACTION_FAILED,
  VALIDATION_FAILED: EXIT_CODES.VALIDATION_FAILED,
  UNCOMMITTABLE: EXIT_CODES.ROLLBACK_FAILED,
  ALREADY_RUNNING: EXIT_CODES.ALREADY_RUNNING,
  PRECONDITION_FAILED: EXIT_CODES.PRECONDITION_FAILED,
  PREREQUISITE_MISSING: EXIT_CODES.PREREQUISITE_MISSING,
  ROLLBACK_FAILED: EXIT_CODES.ROLLBACK_FAILED,
  UNKNOWN: EXIT_CODES.ACTION_FAILED,
}

export interface ProvisionErrorDetails {
  /** Placeholder name for MISSING_PLACEHOLDER */
  placeholder?: string
  /** Action that failed */
  action?: string
  /** Group the failure belongs to */
  group?: string
  /** Message of the command or exception underneath */
  underlyingMessage?: string
  lockPath?: string
  /** Template file the placeholder came from, if any */
  origin?: string
}

export interface ProvisionErrorOptions {
  cause?: unknown
  /** Operator-facing fix, printed under the failure */
  hint?: string
}

export class ProvisionError extends Error {
  readonly code: ProvisionErrorCode
  readonly details: ProvisionErrorDetails
  readonly hint?: string

  constructor(
    code: ProvisionErrorCode,
    message: string,
    details: ProvisionErrorDetails = {},
    options: ProvisionErrorOptions = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })
    this.name = "ProvisionError"
    this.code = code
    this.details = details
    this.hint = options.hint
  }

  get exitCode(): ExitCode {
    return EXIT_CODE_BY_ERROR[this.code]
  }

  static missingPlaceholder(name: string, origin?: string): ProvisionError {
    const where = origin ? ` in ${origin}` : ""
    return new ProvisionError("MISSING_PLACEHOLDER", `Missing value for placeholder {${name}}${where}`, {
      placeholder: name,
      origin,
    })
  }

  static actionFailed(action: string, underlyingMessage: string, cause?: unknown): ProvisionError {
    return new ProvisionError(
      "ACTION_FAILED",
      `${action} failed: ${underlyingMessage}`,
      { action, underlyingMessage },
      { cause },
    )
  }

  /**
   * @param stillApplied - steps that ran before validation and could not be undone
   */
  static validationFailed(
    group: string,
    reason: string,
    cause?: unknown,
    stillApplied: readonly string[] = [],
  ): ProvisionError {
    const hint =
      stillApplied.length === 0
        ? "Live files were left untouched. Fix the template or answers and run again."
        : `Live files were left untouched, but these steps stayed applied: ${stillApplied.join(", ")}. Fix the template or answers and run again.`
    return new ProvisionError(
      "VALIDATION_FAILED",
      `Validation failed for ${group}: ${reason}`,
      { group, underlyingMessage: reason },
      { cause, hint },
    )
  }

  static uncommittable(group: string, reason: string, cause?: unknown): ProvisionError {
    return new ProvisionError(
      "UNCOMMITTABLE",
      `${group} failed after commit and could not be undone: ${reason}`,
      { group, underlyingMessage: reason },
      { cause, hint: "The host is partially configured. Inspect it by hand before running again." },
    )
  }

  static alreadyRunning(lockPath: string, holder?: string): ProvisionError {
    const by = holder ? ` (held by ${holder})` : ""
    return new ProvisionError(
      "ALREADY_RUNNING",
      `Another hostkit run holds ${lockPath}${by}`,
      { lockPath },
      { hint: `Wait for it to finish. If no run is active, remove ${lockPath} by hand.` },
    )
  }

  static preconditionFailed(message: string, hint?: string): ProvisionError {
    return new ProvisionError("PRECONDITION_FAILED", message, {}, { hint })
  }

  static prerequisiteMissing(message: string, hint?: string): ProvisionError {
    return new ProvisionError("PREREQUISITE_MISSING", message, {}, { hint })
  }

  static rollbackFailed(group: string, reason: string, cause?: unknown): ProvisionError {
    return new ProvisionError(
      "ROLLBACK_FAILED",
      `Rollback of ${group} failed: ${reason}`,
      { group, underlyingMessage: reason },
      { cause, hint: "The host is partially configured. Inspect it by hand before running again." },
    )
  }

  static generic(message: string, cause?: unknown): ProvisionError {
    return new ProvisionError("UNKNOWN", message, {}, { cause })
  }
}

export function isProvisionError(error: unknown): error is ProvisionError {
  return error instanceof ProvisionError
}
