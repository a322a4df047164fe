import { createLogger, type Logger } from "@hostkit/logger"
import { isProvisionError, ProvisionError } from "./errors.js"
import { describeFailure } from "./executors/common.js"
import { type AcquireLockOptions, withLock } from "./lock.js"
import { commitStaged, restoreSnapshot, type Snapshot, StagingArea } from "./staging.js"
import type {
  Action,
  ActionGroup,
  ActionOutcome,
  ActionPolicy,
  ApplyContext,
  CheckState,
  GroupOutcome,
  GroupStatus,
  PlanReport,
  PreviewEntry,
  RollbackReport,
  StagedFile,
} from "./types.js"

export interface TransactionOptions {
  logger?: Logger
  /** Distinguishes staged file names; defaults to the pid */
  tag?: string
}

export interface RunPlanOptions extends TransactionOptions {
  lockPath: string
  /** Keep going after a group fails. Groups are committed independently either way. */
  continueOnFailure?: boolean
  lock?: AcquireLockOptions
}

interface AppliedAction {
  action: Action
  staged: StagedFile[]
  committed: { file: StagedFile; snapshot: Snapshot }[]
}

type Attempt =
  | { kind: "satisfied" }
  | { kind: "applied"; record: AppliedAction }
  | { kind: "failed"; error: ProvisionError }

type CommitStage = "commit" | "activate" | "post-check"

function silentLogger(): Logger {
  return createLogger({ sink: () => undefined })
}

function policyOf(action: Action): ActionPolicy {
  return action.policy ?? "required"
}

function actionError(action: Action, error: unknown): ProvisionError {
  if (isProvisionError(error)) return error
  return ProvisionError.actionFailed(action.name, describeFailure(error), error)
}

function reasonOf(error: ProvisionError): string {
  return error.details.underlyingMessage ?? error.message
}

export function isSuccessfulStatus(status: GroupStatus): boolean {
  return status === "applied" || status === "already-satisfied"
}

function contextFor(area: StagingArea, record: AppliedAction, logger: Logger): ApplyContext {
  return {
    logger,
    stageFile: async (target, content, mode) => {
      const file = await area.stageFile(target, content, mode)
      record.staged.push(file)
      return file
    },
    stageSymlink: async (target, linkTarget) => {
      const file = await area.stageSymlink(target, linkTarget)
      record.staged.push(file)
      return file
    },
  }
}

async function commitRecord(area: StagingArea, record: AppliedAction): Promise<void> {
  for (const file of record.staged) {
    if (!area.isPending(file)) continue
    const snapshot = await commitStaged(file)
    area.release(file)
    record.committed.push({ file, snapshot })
  }
}

async function postCheck(action: Action): Promise<void> {
  if (action.postCheck === false) return
  const state = await action.check()
  if (state !== "satisfied") {
    throw ProvisionError.actionFailed(action.name, "still unsatisfied after apply")
  }
}

/** Undone by restoring its files or calling its rollback */
function isReversible(record: AppliedAction): boolean {
  return record.action.rollback !== undefined || record.staged.length > 0
}

async function attempt(action: Action, area: StagingArea, logger: Logger, sequential: boolean): Promise<Attempt> {
  let state: CheckState
  try {
    state = await action.check()
  } catch (error) {
    return { kind: "failed", error: actionError(action, error) }
  }
  if (state === "satisfied") return { kind: "satisfied" }

  const record: AppliedAction = { action, staged: [], committed: [] }
  try {
    await action.apply(contextFor(area, record, logger.child({ action: action.name })))
  } catch (error) {
    await area.discard(record.staged)
    return { kind: "failed", error: actionError(action, error) }
  }

  if (sequential) {
    try {
      await commitRecord(area, record)
      await postCheck(action)
    } catch (error) {
      await area.discard(record.staged)
      return { kind: "failed", error: actionError(action, error) }
    }
  }
  return { kind: "applied", record }
}

/**
 * Undo applied actions in reverse order: committed files come back from
 * their snapshots, then the action's own rollback runs.
 */
async function undo(records: readonly AppliedAction[], tag: string | undefined, logger: Logger): Promise<RollbackReport> {
  const report: RollbackReport = { restored: [], notReversible: [], failures: [] }

  for (const record of [...records].reverse()) {
    const { action } = record
    if (record.committed.length === 0 && !action.rollback) {
      // Staged-only actions were discarded already
      if (record.staged.length === 0) report.notReversible.push(action.name)
      continue
    }
    try {
      for (const { file, snapshot } of [...record.committed].reverse()) {
        await restoreSnapshot(file.target, snapshot, tag)
      }
      await action.rollback?.()
      report.restored.push(action.name)
      logger.info(`↺ ${action.name} rolled back`)
    } catch (error) {
      const message = describeFailure(error)
      report.failures.push({ action: action.name, message })
      logger.error(`Rollback of ${action.name} failed`, error)
    }
  }
  return report
}

function skippedFrom(actions: readonly Action[], reason: string): ActionOutcome[] {
  return actions.map(
    (action): ActionOutcome => ({ action: action.name, policy: policyOf(action), result: { kind: "skipped", reason } }),
  )
}

/**
 * Run one group: check, apply (staging file writes), validate, commit,
 * activate, post-check. Failures before commit leave live files untouched.
 */
export async function runGroup(group: ActionGroup, options: TransactionOptions = {}): Promise<GroupOutcome> {
  const logger = (options.logger ?? silentLogger()).child({ group: group.name })
  const area = new StagingArea(options.tag)
  const sequential = group.atomic === false
  const results: ActionOutcome[] = []
  const applied: AppliedAction[] = []

  for (const [index, action] of group.actions.entries()) {
    const policy = policyOf(action)
    const outcome = await attempt(action, area, logger, sequential)

    if (outcome.kind === "satisfied") {
      results.push({ action: action.name, policy, result: { kind: "already-satisfied" } })
      logger.info(`• ${action.name} (already satisfied)`)
      continue
    }

    if (outcome.kind === "applied") {
      results.push({ action: action.name, policy, result: { kind: "applied" } })
      applied.push(outcome.record)
      logger.success(action.name)
      continue
    }

    const { error } = outcome
    results.push({ action: action.name, policy, result: { kind: "failed", reason: reasonOf(error) } })

    if (policy === "best-effort") {
      logger.warn(`${action.name} failed (optional)`, error)
      continue
    }

    logger.error(`${action.name} failed`, error)
    results.push(...skippedFrom(group.actions.slice(index + 1), `${action.name} failed`))

    // Sequential steps stay committed; a re-run resumes through check
    if (sequential) {
      return { group: group.name, status: "failed", results, error }
    }

    await area.discard()
    const rollback = await undo(applied, options.tag, logger)
    if (rollback.failures.length > 0) {
      return {
        group: group.name,
        status: "uncommittable",
        results,
        error: ProvisionError.uncommittable(group.name, rollbackReason(reasonOf(error), rollback), error),
        rollback,
      }
    }
    return { group: group.name, status: "failed", results, error, rollback }
  }

  if (applied.length === 0) {
    return { group: group.name, status: "already-satisfied", results }
  }
  if (group.atomic === false) {
    return { group: group.name, status: "applied", results }
  }

  if (group.validate) {
    try {
      await group.validate(area.files())
    } catch (cause) {
      await area.discard()
      logger.error(`${group.name} did not validate`, cause)
      const rollback = await undo(applied, options.tag, logger)
      const error = ProvisionError.validationFailed(group.name, describeFailure(cause), cause, rollback.notReversible)
      if (rollback.failures.length > 0) {
        return {
          group: group.name,
          status: "uncommittable",
          results,
          error: ProvisionError.uncommittable(group.name, rollbackReason(reasonOf(error), rollback), cause),
          rollback,
        }
      }
      return { group: group.name, status: "validation-failed", results, error, rollback }
    }
  }

  let stage: CommitStage = "commit"
  try {
    for (const record of applied) {
      await commitRecord(area, record)
    }
    stage = "activate"
    if (group.activate) await group.activate()
    stage = "post-check"
    for (const record of applied) {
      await postCheck(record.action)
    }
  } catch (cause) {
    await area.discard()
    const reason = describeFailure(cause)
    logger.error(`${group.name}: ${stage} failed`, cause)

    const notReversible = applied.filter(record => !isReversible(record)).map(record => record.action.name)
    if (notReversible.length > 0) {
      return {
        group: group.name,
        status: "uncommittable",
        results,
        error: ProvisionError.uncommittable(group.name, `${stage} failed: ${reason}`, cause),
        rollback: { restored: [], notReversible, failures: [] },
      }
    }

    const rollback = await undo(applied, options.tag, logger)
    // Reload the restored configuration. Files that did not exist before are
    // gone again, leaving nothing to reload.
    const hadPrevious = applied.some(record => record.committed.some(({ snapshot }) => snapshot.kind !== "absent"))
    if (stage !== "commit" && group.activate && hadPrevious && rollback.failures.length === 0) {
      try {
        await group.activate()
      } catch (activateError) {
        rollback.failures.push({ action: "activate", message: describeFailure(activateError) })
      }
    }

    if (rollback.failures.length > 0) {
      return {
        group: group.name,
        status: "uncommittable",
        results,
        error: ProvisionError.uncommittable(group.name, rollbackReason(`${stage} failed: ${reason}`, rollback), cause),
        rollback,
      }
    }

    const error = isProvisionError(cause)
      ? cause
      : new ProvisionError(
          "ACTION_FAILED",
          `${group.name}: ${stage} failed: ${reason}`,
          { group: group.name, underlyingMessage: reason },
          { cause },
        )
    return { group: group.name, status: "rolled-back", results, error, rollback }
  }

  return { group: group.name, status: "applied", results }
}

function rollbackReason(reason: string, rollback: RollbackReport): string {
  const first = rollback.failures[0]
  return first ? `${reason}; rollback of ${first.action} failed: ${first.message}` : reason
}

/**
 * Run groups in order under the advisory lock. Each group commits on its
 * own; after the first unsuccessful group the rest are skipped unless
 * `continueOnFailure` is set.
 */
export async function runPlan(groups: readonly ActionGroup[], options: RunPlanOptions): Promise<PlanReport> {
  const logger = options.logger ?? silentLogger()

  return withLock(
    options.lockPath,
    async () => {
      const outcomes: GroupOutcome[] = []
      let stopped = false

      for (const group of groups) {
        if (stopped) {
          outcomes.push({
            group: group.name,
            status: "skipped",
            results: skippedFrom(group.actions, "an earlier group failed"),
          })
          continue
        }

        logger.header(group.name)
        const outcome = await runGroup(group, { ...options, logger })
        outcomes.push(outcome)
        if (!isSuccessfulStatus(outcome.status) && !options.continueOnFailure) {
          stopped = true
        }
      }

      const succeeded = outcomes.every(outcome => isSuccessfulStatus(outcome.status))
      return { status: succeeded ? "succeeded" : "failed", groups: outcomes }
    },
    options.lock,
  )
}

/**
 * Dry run: evaluate every check, change nothing.
 */
export async function previewPlan(groups: readonly ActionGroup[]): Promise<PreviewEntry[]> {
  const entries: PreviewEntry[] = []
  for (const group of groups) {
    for (const action of group.actions) {
      try {
        entries.push({ group: group.name, action: action.name, state: await action.check() })
      } catch (error) {
        entries.push({ group: group.name, action: action.name, state: "error", error: describeFailure(error) })
      }
    }
  }
  return entries
}
