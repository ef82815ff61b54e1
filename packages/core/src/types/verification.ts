/**
 * tuneup core — Verification Types
 *
 * VerificationResults are produced fresh on every verify invocation and are
 * never persisted beyond the run log.
 */

import type { Precondition } from './resource.js';

export enum VerificationStatus {
  Pass = 'Pass',
  Fail = 'Fail',
  Skipped = 'Skipped',
  Info = 'Info',
}

export interface VerificationResult {
  /** A resource id, a derived runtime check id, or a catalog runtime check id. */
  readonly subjectId: string;
  readonly expected: string;
  readonly actual: string;
  readonly status: VerificationStatus;
  readonly detail?: string | undefined;
}

// ---------------------------------------------------------------------------
// Runtime checks
// ---------------------------------------------------------------------------

interface RuntimeCheckBase {
  readonly id: string;
  readonly preconditions: ReadonlyArray<Precondition>;
  /** Only meaningful after a reboot; reports Info while one is pending. */
  readonly requiresReboot: boolean;
}

/** A token expected on the running kernel's command line. */
export interface CmdlineTokenCheck extends RuntimeCheckBase {
  readonly kind: 'cmdline-token';
  readonly token: string;
}

/**
 * A sysfs/procfs attribute.
 *
 * 'equals' compares the trimmed content; 'selected' expects the bracketed
 * choice in a list such as `mq-deadline kyber [none]`.
 */
export interface AttributeCheck extends RuntimeCheckBase {
  readonly kind: 'attribute';
  readonly path: string;
  readonly expected: string;
  readonly match: 'equals' | 'selected';
}

/** A unit's active state. */
export interface UnitActiveCheck extends RuntimeCheckBase {
  readonly kind: 'unit-active';
  readonly unit: string;
  readonly expectActive: boolean;
}

export type RuntimeCheck = CmdlineTokenCheck | AttributeCheck | UnitActiveCheck;

export type VerifyPass = 'all' | 'static' | 'runtime';

export function hasFailures(results: ReadonlyArray<VerificationResult>): boolean {
  return results.some((r) => r.status === VerificationStatus.Fail);
}
