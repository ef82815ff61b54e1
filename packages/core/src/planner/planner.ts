/**
 * tuneup core — Planner / Differ
 *
 * Compares desired and current state per resource and produces one typed
 * Action each:
 *
 *   preconditions unmet              → Skip, PreconditionUnmet (reason recorded, never dropped)
 *   target unsafe to edit            → Skip, UnsafeSystemState
 *   FileCopy source missing          → Skip, SourceMissing
 *   state unknown                    → Skip, StateUnknown
 *   PackageAbsent, installed         → Remove
 *   PackageAbsent, not installed     → Skip
 *   present and matching             → Skip
 *   present, mismatched              → Update (with diff)
 *   absent                           → Create (with diff)
 *
 * Resources representing one setting in two backing stores (a kernel token
 * and a modprobe option file for the same module parameter) are planned
 * independently. The pair is not reconciled against each other: the token
 * wins for built-in modules, the option file for loadable ones.
 *
 * planResource() is pure. plan() inspects through the StateInspector and
 * orders the result by phase.
 */

import {
  ResourceKind,
  isFileBacked,
  type Resource,
} from '../types/resource.js';
import type { SystemFact, SystemFacts } from '../types/facts.js';
import { ActionPhase, ActionType, type Action } from '../types/action.js';
import { ReconcileErrorCode } from '../errors.js';
import { evaluatePreconditions } from '../catalog/preconditions.js';
import type { Catalog } from '../catalog/catalog.js';
import type { StateInspector } from '../inspector/inspector.js';
import type { RunLogger } from '../logging/run-log.js';
import { renderDesired, decodeText } from '../matching/render.js';
import { lineDiff } from '../matching/diff.js';

const PHASE_BY_KIND: Readonly<Record<ResourceKind, ActionPhase>> = {
  [ResourceKind.PackagePresent]: ActionPhase.Packages,
  [ResourceKind.FileCopy]: ActionPhase.Files,
  [ResourceKind.TextPatch]: ActionPhase.Files,
  [ResourceKind.EnvVar]: ActionPhase.Files,
  [ResourceKind.KernelParam]: ActionPhase.Files,
  [ResourceKind.MountOption]: ActionPhase.Files,
  [ResourceKind.InitramfsHook]: ActionPhase.Files,
  [ResourceKind.ServiceEnable]: ActionPhase.Enable,
  [ResourceKind.PackageAbsent]: ActionPhase.Destructive,
  [ResourceKind.ServiceMask]: ActionPhase.Destructive,
};

export function phaseOf(kind: ResourceKind): ActionPhase {
  return PHASE_BY_KIND[kind];
}

export function planResource(resource: Resource, fact: SystemFact, facts: SystemFacts): Action {
  const base = {
    resourceId: resource.id,
    kind: resource.kind,
    phase: phaseOf(resource.kind),
    requiresReboot: resource.requiresReboot,
  };
  const skip = (reason: string, blocked?: ReconcileErrorCode): Action => ({
    ...base,
    type: ActionType.Skip,
    reason,
    blocked,
  });

  const pre = evaluatePreconditions(resource.preconditions, facts);
  if (!pre.met) return skip(pre.reason, ReconcileErrorCode.PreconditionUnmet);

  if (fact.unsafe !== undefined) {
    return skip(`${fact.unsafe}; edit ${resource.target} manually`, ReconcileErrorCode.UnsafeSystemState);
  }
  if (resource.kind === ResourceKind.FileCopy && resource.desired === null) {
    return skip(`source ${resource.source} missing from catalog`, ReconcileErrorCode.SourceMissing);
  }
  if (fact.presence === 'unknown') {
    return skip(`current state unknown (${fact.rawValue ?? 'no detail'})`, ReconcileErrorCode.StateUnknown);
  }

  if (resource.kind === ResourceKind.PackageAbsent) {
    return fact.presence === 'present'
      ? { ...base, type: ActionType.Remove, reason: `${resource.target} installed` }
      : skip(`${resource.target} not installed`);
  }

  if (fact.matches) return skip('already up to date');

  const type = fact.presence === 'present' ? ActionType.Update : ActionType.Create;
  const reason =
    type === ActionType.Create
      ? createReason(resource, fact)
      : `${resource.target} differs (current: ${fact.rawValue ?? 'none'})`;

  let diffText: string | undefined;
  if (isFileBacked(resource)) {
    const current = fact.content ?? null;
    const next = renderDesired(resource, current);
    const nextText = next === null ? null : decodeText(next);
    // A present file without content could not be decoded; there is no line diff to show.
    if (nextText !== null && (current !== null || fact.presence !== 'present')) diffText = lineDiff(current, nextText);
  }
  return { ...base, type, reason, diffText };
}

function createReason(resource: Resource, fact: SystemFact): string {
  if (isFileBacked(resource)) {
    return fact.content === null || fact.content === undefined
      ? `${resource.target} missing`
      : `not set in ${resource.target}`;
  }
  if (resource.kind === ResourceKind.PackagePresent) return `${resource.target} not installed`;
  return `${resource.target} not found`;
}

/** Stable sort by phase; catalog order is kept within a phase. */
export function orderActions(actions: ReadonlyArray<Action>): Action[] {
  return actions
    .map((action, index) => ({ action, index }))
    .sort((a, b) => a.action.phase - b.action.phase || a.index - b.index)
    .map(({ action }) => action);
}

export class Planner {
  constructor(
    private readonly catalog: Catalog,
    private readonly inspector: StateInspector,
    private readonly log: RunLogger,
  ) {}

  async plan(facts: SystemFacts): Promise<Action[]> {
    const actions: Action[] = [];
    for (const resource of this.catalog.all()) {
      const fact = await this.inspector.inspect(resource);
      this.log.record('inspect', `${fact.presence}${fact.matches ? ', matches' : ''}`, resource.id, {
        rawValue: fact.rawValue,
        unsafe: fact.unsafe,
      });
      const action = planResource(resource, fact, facts);
      this.log.record('decide', `${action.type}: ${action.reason}`, resource.id, {
        phase: action.phase,
        blocked: action.blocked,
      });
      actions.push(action);
    }
    return orderActions(actions);
  }
}
