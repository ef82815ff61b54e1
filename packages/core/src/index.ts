/**
 * @tuneup/core
 *
 * tuneup reconciliation core — catalog model and validation, state
 * inspection, planner, executor, verifier, run log, and adapter interfaces.
 *
 * This package performs no I/O of its own. It contains no imports of
 * node:fs, node:child_process, node:readline or node:net; node:crypto is
 * used for content hashing only. Concrete adapters live in @tuneup/host.
 */

// Types
export type {
  Confirmation,
  FileBackedResource,
  FileCopyResource,
  InitramfsHookResource,
  KernelParamResource,
  KeyValueResource,
  MountOptionResource,
  PackageResource,
  Precondition,
  PreconditionKind,
  Resource,
  UnitResource,
} from './types/resource.js';
export {
  ENVIRONMENT_FILE,
  FILE_BACKED_KINDS,
  ResourceKind,
  TRIGGER_ORDER,
  Trigger,
  isFileBacked,
} from './types/resource.js';

export type { Presence, SystemFact, SystemFacts, UnitActiveState } from './types/facts.js';
export { UNKNOWN_FACTS, UnitState } from './types/facts.js';

export type { Action } from './types/action.js';
export { ActionPhase, ActionType, isMutating } from './types/action.js';

export type {
  AttributeCheck,
  CmdlineTokenCheck,
  RuntimeCheck,
  UnitActiveCheck,
  VerificationResult,
  VerifyPass,
} from './types/verification.js';
export { VerificationStatus, hasFailures } from './types/verification.js';

export type {
  BackupRecord,
  ExecutionOutcome,
  ExecutionReport,
  HaltReason,
  TriggerOutcome,
} from './types/run.js';
export { StatusTag, countFailures } from './types/run.js';

export { ReconcileError, ReconcileErrorCode, errorMessage } from './errors.js';

// Adapter interfaces; implementations live in @tuneup/host
export type {
  BackupStore,
  Collaborators,
  CommandOptions,
  CommandResult,
  CommandRunner,
  PackageManager,
  Prompter,
  RebootTracker,
  Rebuilder,
  ServiceManager,
  SystemFs,
  UdevControl,
} from './adapters/index.js';

// Run log
export type { Clock, RunLogEntry, RunLogEvent, RunLogSink, StatusReporter } from './logging/run-log.js';
export { MemoryRunLogSink, RunLogger, silentReporter, systemClock } from './logging/run-log.js';

// Catalog
export { Catalog } from './catalog/catalog.js';
export type { PreconditionResult } from './catalog/preconditions.js';
export { evaluatePrecondition, evaluatePreconditions } from './catalog/preconditions.js';
export type { SourceLoader, ValidationError, ValidationResult } from './catalog/validator.js';
export { parseCatalogDocument } from './catalog/validator.js';

// Text matching
export { lineDiff } from './matching/diff.js';
export { decodeText, renderDesired } from './matching/render.js';

// Inspection
export type { FactsDeps } from './inspector/facts.js';
export {
  COMMAND_NOT_FOUND,
  CRYPTTAB,
  FSTAB,
  PCI_DEVICES,
  collectSystemFacts,
  detectBtrfsSubvolumes,
  detectLuks,
  detectLvm,
  detectPciVendors,
} from './inspector/facts.js';
export type { InspectorDeps } from './inspector/inspector.js';
export { StateInspector, sha256 } from './inspector/inspector.js';

// Planning, execution, verification
export { Planner, orderActions, phaseOf, planResource } from './planner/planner.js';
export type { ExecuteOptions, ExecutorDeps } from './executor/executor.js';
export { Executor } from './executor/executor.js';
export type { Mutator } from './executor/mutator.js';
export { DryRunMutator, LiveMutator } from './executor/mutator.js';
export type { VerifierDeps } from './verifier/verifier.js';
export { PROC_CMDLINE, Verifier, runtimeChecksFor, selectedChoice } from './verifier/verifier.js';

export type { DiffReport, ReconcilerDeps } from './reconciler.js';
export { Reconciler } from './reconciler.js';
