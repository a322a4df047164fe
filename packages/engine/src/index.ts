/**
 * @hostkit/engine
 *
 * Template rendering and the idempotent, transactional mutation engine:
 * actions check before they apply, file writes are staged beside their
 * targets, validated, renamed into place and rolled back on failure.
 *
 * @example
 * ```typescript
 * import { fileAction, nginxValidator, runPlan } from "@hostkit/engine"
 *
 * const report = await runPlan(
 *   [{ name: "nginx site", actions: [fileAction({ path, content })], validate: nginxValidator({ nginxDir }) }],
 *   { lockPath: "/run/lock/hostkit.lock" },
 * )
 * ```
 */

export {
  applyDirectives,
  type DirectiveSyntax,
  type DirectivesActionOptions,
  type DirectoryActionOptions,
  directivesAction,
  directoryAction,
  type FileActionOptions,
  fileAction,
  type LineActionOptions,
  lineAction,
  type SymlinkActionOptions,
  symlinkAction,
  type TemplateFileActionOptions,
  templateFileAction,
} from "./actions/files.js"
export {
  type CheckoutFetcher,
  type CloneActionOptions,
  type CommandActionOptions,
  type CommandSpec,
  type ControllableServiceManager,
  cloneAction,
  commandAction,
  type PackageActionOptions,
  packageAction,
  type ServiceActionOptions,
  serviceAction,
} from "./actions/system.js"
export {
  isProvisionError,
  ProvisionError,
  type ProvisionErrorCode,
  type ProvisionErrorDetails,
  type ProvisionErrorOptions,
} from "./errors.js"
export {
  CommandError,
  type CommandOptions,
  type CommandResult,
  type CommandRunner,
  describeFailure,
  formatCommand,
  hasCommand,
  runCommand,
  runCommandSafe,
  spawnCommand,
} from "./executors/common.js"
export { type CloneOptions, GitSourceFetcher, type SourceFetcher } from "./executors/git.js"
export { DefaultsInputSource, type InputSource, ReadlineInputSource, ScriptedInputSource } from "./executors/input.js"
export { AptPackageManager, type PackageManager } from "./executors/packages.js"
export {
  Pm2Manager,
  type ServiceManager,
  SupervisorManager,
  SystemdServiceManager,
  validateServiceName,
} from "./executors/services.js"
export {
  commandValidator,
  type NginxValidatorOptions,
  nginxHarness,
  nginxValidator,
  sshdValidator,
} from "./executors/validators.js"
export { type AcquireLockOptions, acquireLock, type LockHandle, type LockInfo, readLockInfo, withLock } from "./lock.js"
export {
  commitStaged,
  restoreSnapshot,
  type Snapshot,
  StagingArea,
  stagedPathFor,
  takeSnapshot,
} from "./staging.js"
export {
  loadTemplate,
  parseTemplate,
  render,
  renderTemplateFile,
  type SubstitutionMap,
  type Template,
  type TemplateSegment,
} from "./template.js"
export {
  isSuccessfulStatus,
  previewPlan,
  type RunPlanOptions,
  runGroup,
  runPlan,
  type TransactionOptions,
} from "./transaction.js"
export type {
  Action,
  ActionGroup,
  ActionOutcome,
  ActionPolicy,
  ApplyContext,
  ApplyResult,
  AtomicGroup,
  CheckState,
  GroupOutcome,
  GroupStatus,
  GroupValidator,
  PlanReport,
  PreviewEntry,
  RollbackReport,
  SequentialGroup,
  StagedFile,
} from "./types.js"
