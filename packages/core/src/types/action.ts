/**
 * tuneup core — Action Types
 *
 * An Action is the Planner's decision for one resource. Actions are created
 * fresh per reconciliation run, consumed once by the Executor, then dropped.
 */

import type { ResourceKind } from './resource.js';
import type { ReconcileErrorCode } from '../errors.js';

export enum ActionType {
  Create = 'Create',
  Update = 'Update',
  Remove = 'Remove',
  Skip = 'Skip',
}

/**
 * Execution phase. Lower phases run first:
 *
 *   0  packages installed   (files may assume their packages exist)
 *   1  file writes          (units must exist before being toggled)
 *   2  units enabled
 *   3  packages removed, units masked (destructive; only after file writes succeed)
 */
export enum ActionPhase {
  Packages = 0,
  Files = 1,
  Enable = 2,
  Destructive = 3,
}

export interface Action {
  readonly resourceId: string;
  readonly kind: ResourceKind;
  readonly type: ActionType;
  readonly reason: string;
  readonly phase: ActionPhase;
  readonly requiresReboot: boolean;
  /** Line diff of current vs desired content, for file-backed kinds. */
  readonly diffText?: string | undefined;
  /**
   * Why a Skip is not simply "already up to date": an unmet precondition,
   * an unknown state, or an error the operator must fix.
   */
  readonly blocked?: ReconcileErrorCode | undefined;
}

export function isMutating(action: Action): boolean {
  return action.type !== ActionType.Skip;
}
