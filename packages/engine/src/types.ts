import type { Logger } from "@hostkit/logger"
import type { ProvisionError } from "./errors.js"

export type CheckState = "satisfied" | "unsatisfied"

/**
 * Whether a failing action aborts its group ("required") or is recorded
 * and skipped past ("best-effort").
 */
export type ActionPolicy = "required" | "best-effort"

export type ApplyResult =
  | { kind: "applied" }
  | { kind: "already-satisfied" }
  | { kind: "failed"; reason: string }
  | { kind: "skipped"; reason: string }

/**
 * A file written next to its target, waiting to be renamed into place.
 * The staged name is dot-prefixed so include globs never load it.
 */
export interface StagedFile {
  target: string
  stagedPath: string
  kind: "file" | "symlink"
  mode?: number
}

/**
 * Handed to `apply`. File-producing actions stage through it instead of
 * writing the live path.
 */
export interface ApplyContext {
  stageFile(target: string, content: string | Buffer, mode?: number): Promise<StagedFile>
  stageSymlink(target: string, linkTarget: string): Promise<StagedFile>
  logger: Logger
}

export interface Action {
  readonly name: string
  /** Defaults to "required" */
  readonly policy?: ActionPolicy
  /**
   * Re-run `check` after commit and fail when it is still unsatisfied.
   * Off for actions whose check cannot observe the outcome (always-run builds).
   */
  readonly postCheck?: boolean
  /** Side-effect free */
  check(): Promise<CheckState>
  /** Only called after `check` returned "unsatisfied" */
  apply(ctx: ApplyContext): Promise<void>
  rollback?(): Promise<void>
}

/** Throws when the staged files must not go live */
export type GroupValidator = (staged: readonly StagedFile[]) => Promise<void>

interface GroupBase {
  name: string
  actions: readonly Action[]
}

/**
 * Stages every file, validates, then commits together. Activation runs
 * after commit; failures from then on roll the group back.
 */
export interface AtomicGroup extends GroupBase {
  atomic?: true
  validate?: GroupValidator
  activate?: () => Promise<void>
}

/**
 * Each action commits as soon as it applies. A required failure stops the
 * group and leaves earlier steps in place.
 */
export interface SequentialGroup extends GroupBase {
  atomic: false
}

export type ActionGroup = AtomicGroup | SequentialGroup

export interface ActionOutcome {
  action: string
  policy: ActionPolicy
  result: ApplyResult
}

export type GroupStatus =
  | "applied"
  | "already-satisfied"
  | "failed"
  | "validation-failed"
  | "rolled-back"
  | "uncommittable"
  | "skipped"

export interface RollbackReport {
  /** Actions undone, in the order they were undone */
  restored: string[]
  /** Applied actions the engine had no way to undo */
  notReversible: string[]
  failures: { action: string; message: string }[]
}

export interface GroupOutcome {
  group: string
  status: GroupStatus
  results: ActionOutcome[]
  error?: ProvisionError
  rollback?: RollbackReport
}

export interface PlanReport {
  status: "succeeded" | "failed"
  groups: GroupOutcome[]
}

export interface PreviewEntry {
  group: string
  action: string
  state: CheckState | "error"
  error?: string
}
