/**
 * tuneup core — Run Types
 *
 * Records produced by one invocation: backups, per-action outcomes, and the
 * executor's final report.
 */

import type { Action } from './action.js';
import type { Trigger } from './resource.js';
import type { ReconcileErrorCode } from '../errors.js';

/**
 * A copy of a target taken immediately before its first mutation in a run.
 *
 * Taken only if the target existed. Owned by the run that created it;
 * restoring is an explicit operator action.
 */
export interface BackupRecord {
  readonly originalPath: string;
  readonly backupPath: string;
  /** Timestamp key of the run, also the backup directory name. */
  readonly runId: string;
}

/** One-line console tag for a resource outcome. */
export enum StatusTag {
  Ok = 'OK',
  Fail = 'FAIL',
  Info = 'INFO',
  Warn = 'WARN',
}

export interface ExecutionOutcome {
  readonly action: Action;
  readonly tag: StatusTag;
  readonly message: string;
  /** Whether a live or simulated mutation was carried out. */
  readonly applied: boolean;
  readonly error?: ReconcileErrorCode | undefined;
  readonly backup?: BackupRecord | undefined;
}

export interface TriggerOutcome {
  readonly trigger: Trigger;
  readonly tag: StatusTag;
  readonly message: string;
}

export interface HaltReason {
  readonly code: ReconcileErrorCode.BackupFailed | ReconcileErrorCode.UnsafeSystemState;
  readonly message: string;
  /** What the operator must do before re-running. */
  readonly remediation: string;
  readonly resourceId?: string | undefined;
}

export interface ExecutionReport {
  readonly runId: string;
  readonly dryRun: boolean;
  readonly outcomes: ReadonlyArray<ExecutionOutcome>;
  readonly triggers: ReadonlyArray<TriggerOutcome>;
  readonly backups: ReadonlyArray<BackupRecord>;
  readonly rebootRequired: boolean;
  /** Set when a hard-stop condition ended the run early. */
  readonly halted?: HaltReason | undefined;
}

export function countFailures(report: ExecutionReport): number {
  return (
    report.outcomes.filter((o) => o.tag === StatusTag.Fail).length +
    report.triggers.filter((t) => t.tag === StatusTag.Fail).length
  );
}
