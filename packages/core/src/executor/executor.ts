/**
 * tuneup core — Executor
 *
 * Applies an ordered Action list one action at a time.
 *
 * Per Create/Update of a file-backed resource:
 *   1. show the diff
 *   2. back up the current target, only if it exists
 *   3. re-read and re-render the target, then write it
 *   4. log the outcome
 * Packages and units go through their managers; a non-zero exit is a FAIL
 * for that resource only.
 *
 * A failed action never aborts the run. The two exceptions end it with a
 * halted report:
 *   - the run's backup directory cannot be created (BackupFailed)
 *   - the operator declines a confirmation marked onDecline: 'halt'
 *     (UnsafeSystemState), e.g. the LUKS boot hook
 *
 * Destructive actions (package removal, masking) are deferred when any file
 * write in the run failed, so a half-applied file set is never followed by
 * removals that would leave nothing to roll back to.
 *
 * Triggers collected from applied actions run once, after all actions, in
 * TRIGGER_ORDER.
 */

import type { BackupStore, Collaborators, Prompter, RebootTracker, SystemFs, CommandResult } from '../adapters/index.js';
import { ActionPhase, ActionType, isMutating, type Action } from '../types/action.js';
import {
  ResourceKind,
  TRIGGER_ORDER,
  isFileBacked,
  type FileBackedResource,
  type Resource,
  type Trigger,
} from '../types/resource.js';
import {
  StatusTag,
  type BackupRecord,
  type ExecutionOutcome,
  type ExecutionReport,
  type HaltReason,
  type TriggerOutcome,
} from '../types/run.js';
import { ReconcileErrorCode, errorMessage } from '../errors.js';
import type { Catalog } from '../catalog/catalog.js';
import { systemClock, type Clock, type RunLogger } from '../logging/run-log.js';
import { decodeText, renderDesired } from '../matching/render.js';
import { DryRunMutator, LiveMutator, type Mutator } from './mutator.js';

export interface ExecutorDeps {
  readonly catalog: Catalog;
  readonly fs: SystemFs;
  readonly collaborators: Collaborators;
  readonly backups: BackupStore;
  readonly reboot: RebootTracker;
  readonly prompter: Prompter;
  readonly log: RunLogger;
  readonly clock?: Clock | undefined;
}

export interface ExecuteOptions {
  readonly dryRun: boolean;
}

/** Console tag for a Skip, by its blocking code. */
const SKIP_TAGS: Readonly<Partial<Record<ReconcileErrorCode, StatusTag>>> = {
  [ReconcileErrorCode.PreconditionUnmet]: StatusTag.Info,
  [ReconcileErrorCode.SourceMissing]: StatusTag.Fail,
  [ReconcileErrorCode.UnsafeSystemState]: StatusTag.Warn,
  [ReconcileErrorCode.StateUnknown]: StatusTag.Warn,
};

export class Executor {
  private readonly clock: Clock;

  constructor(private readonly deps: ExecutorDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  async execute(actions: ReadonlyArray<Action>, options: ExecuteOptions): Promise<ExecutionReport> {
    const { log } = this.deps;
    const runId = log.runId;
    const mutator: Mutator = options.dryRun
      ? new DryRunMutator(this.deps.backups)
      : new LiveMutator(this.deps.fs, this.deps.backups, this.deps.collaborators);

    const outcomes: ExecutionOutcome[] = [];
    const backups: BackupRecord[] = [];
    const triggers = new Set<Trigger>();
    let rebootRequired = false;
    let fileFailures = 0;

    const finish = (halted?: HaltReason, triggerOutcomes: ReadonlyArray<TriggerOutcome> = []): ExecutionReport => ({
      runId,
      dryRun: options.dryRun,
      outcomes,
      triggers: triggerOutcomes,
      backups,
      rebootRequired,
      halted,
    });

    if (!options.dryRun && actions.some(isMutating)) {
      try {
        await this.deps.backups.prepare(runId);
      } catch (err: unknown) {
        const halted: HaltReason = {
          code: ReconcileErrorCode.BackupFailed,
          message: `cannot create backup directory: ${errorMessage(err)}`,
          remediation: 'Make the tuneup home directory writable (see --home / TUNEUP_HOME) and re-run.',
        };
        log.status(StatusTag.Fail, 'backup', halted.message);
        return finish(halted);
      }
    }

    for (const action of actions) {
      const resource = this.deps.catalog.get(action.resourceId);
      if (resource === undefined) {
        outcomes.push(this.report(action, StatusTag.Fail, 'resource not in catalog', false, ReconcileErrorCode.SourceMissing));
        continue;
      }

      if (action.type === ActionType.Skip) {
        const tag = action.blocked === undefined ? StatusTag.Ok : (SKIP_TAGS[action.blocked] ?? StatusTag.Info);
        outcomes.push(this.report(action, tag, action.reason, false, action.blocked));
        continue;
      }

      if (action.phase === ActionPhase.Destructive && fileFailures > 0) {
        outcomes.push(
          this.report(action, StatusTag.Warn, `deferred: ${fileFailures} file write(s) failed earlier in this run`, false),
        );
        continue;
      }

      if (resource.confirmation !== undefined) {
        if (options.dryRun) {
          log.status(StatusTag.Info, resource.id, `would ask: ${resource.confirmation.prompt}`);
        } else if (!(await this.deps.prompter.confirm(resource.confirmation.prompt))) {
          if (resource.confirmation.onDecline === 'halt') {
            const halted: HaltReason = {
              code: ReconcileErrorCode.UnsafeSystemState,
              resourceId: resource.id,
              message: `declined: ${resource.confirmation.prompt}`,
              remediation: `Continuing without ${resource.id} would leave the system unbootable. ` +
                `Apply it manually or re-run and accept.`,
            };
            outcomes.push(this.report(action, StatusTag.Fail, halted.message, false, ReconcileErrorCode.UnsafeSystemState));
            return finish(halted);
          }
          outcomes.push(this.report(action, StatusTag.Warn, 'declined by operator', false));
          continue;
        }
      }

      const outcome = isFileBacked(resource)
        ? await this.applyFile(action, resource, mutator, runId)
        : await this.applyCommand(action, resource, mutator);
      outcomes.push(outcome);
      const backup = outcome.backup;
      if (backup !== undefined && !backups.some((b) => b.originalPath === backup.originalPath)) {
        backups.push(backup);
      }

      if (outcome.applied) {
        for (const t of resource.triggers) triggers.add(t);
        if (resource.requiresReboot) rebootRequired = true;
      } else if (isFileBacked(resource)) {
        fileFailures++;
      }
    }

    const triggerOutcomes = await this.runTriggers(triggers, mutator);

    if (rebootRequired) {
      if (options.dryRun) {
        log.status(StatusTag.Info, 'reboot', 'a reboot would be required');
      } else {
        await this.markReboot(runId);
      }
    }

    return finish(undefined, triggerOutcomes);
  }

  // -------------------------------------------------------------------------
  // Files
  // -------------------------------------------------------------------------

  private async applyFile(
    action: Action,
    resource: FileBackedResource,
    mutator: Mutator,
    runId: string,
  ): Promise<ExecutionOutcome> {
    const { log } = this.deps;
    if (action.diffText !== undefined) log.detail(resource.id, action.diffText);

    let current: Uint8Array | null;
    try {
      current = await this.deps.fs.read(resource.target);
    } catch (err: unknown) {
      return this.report(action, StatusTag.Fail, `cannot read ${resource.target}: ${errorMessage(err)}`, false,
        ReconcileErrorCode.MutationFailed);
    }

    const currentText = current === null ? null : decodeText(current);
    if (current !== null && currentText === null && resource.kind !== ResourceKind.FileCopy) {
      return this.report(action, StatusTag.Fail, `${resource.target} is not valid UTF-8; edit it manually`, false,
        ReconcileErrorCode.UnsafeSystemState);
    }

    let backup: BackupRecord | undefined;
    if (current !== null) {
      try {
        backup = await mutator.backup(runId, resource.target, current);
        log.record('backup', `${mutator.dryRun ? 'would back up' : 'backed up'} ${resource.target} to ${backup.backupPath}`,
          resource.id);
      } catch (err: unknown) {
        return this.report(action, StatusTag.Fail, `backup failed: ${errorMessage(err)}`, false,
          ReconcileErrorCode.BackupFailed);
      }
    }

    const next = renderDesired(resource, currentText);
    if (next === null) {
      return this.report(action, StatusTag.Fail, 'nothing to write', false, ReconcileErrorCode.SourceMissing, backup);
    }

    try {
      await mutator.write(resource.target, next, resource.requiresSudo);
    } catch (err: unknown) {
      return this.report(action, StatusTag.Fail, `write failed: ${errorMessage(err)}`, false,
        ReconcileErrorCode.MutationFailed, backup);
    }

    const verb = current === null ? 'create' : 'update';
    return mutator.dryRun
      ? this.report(action, StatusTag.Info, `would ${verb} ${resource.target}`, true, undefined, backup)
      : this.report(action, StatusTag.Ok, `${verb}d ${resource.target}`, true, undefined, backup);
  }

  // -------------------------------------------------------------------------
  // Packages and units
  // -------------------------------------------------------------------------

  private async applyCommand(action: Action, resource: Resource, mutator: Mutator): Promise<ExecutionOutcome> {
    let result: CommandResult;
    switch (resource.kind) {
      case ResourceKind.PackagePresent:
        result = await mutator.install(resource.target);
        break;
      case ResourceKind.PackageAbsent:
        result = await mutator.remove(resource.target);
        break;
      case ResourceKind.ServiceEnable:
        result = await mutator.enable(resource.target);
        break;
      case ResourceKind.ServiceMask:
        result = await mutator.mask(resource.target);
        break;
      default:
        return this.report(action, StatusTag.Fail, `no command for ${resource.kind}`, false,
          ReconcileErrorCode.MutationFailed);
    }

    this.deps.log.command(result);
    if (result.exitCode !== 0) {
      this.deps.log.detail(resource.id, result.output);
      return this.report(action, StatusTag.Fail, `${result.command} exited ${result.exitCode}`, false,
        ReconcileErrorCode.MutationFailed);
    }
    return mutator.dryRun
      ? this.report(action, StatusTag.Info, `would ${result.command.replace(/^\(dry-run\) /, '')}`, true)
      : this.report(action, StatusTag.Ok, result.command, true);
  }

  // -------------------------------------------------------------------------
  // Triggers and reboot marker
  // -------------------------------------------------------------------------

  private async runTriggers(triggers: ReadonlySet<Trigger>, mutator: Mutator): Promise<TriggerOutcome[]> {
    const { log } = this.deps;
    const outcomes: TriggerOutcome[] = [];
    for (const trigger of TRIGGER_ORDER) {
      if (!triggers.has(trigger)) continue;
      const results = await mutator.runTrigger(trigger);
      for (const r of results) log.command(r);

      const failed = results.find((r) => r.exitCode !== 0);
      let outcome: TriggerOutcome;
      if (failed !== undefined) {
        log.detail(trigger, failed.output);
        outcome = { trigger, tag: StatusTag.Fail, message: `${failed.command} exited ${failed.exitCode}` };
      } else {
        outcome = {
          trigger,
          tag: mutator.dryRun ? StatusTag.Info : StatusTag.Ok,
          message: results.map((r) => r.command).join('; '),
        };
      }
      log.status(outcome.tag, trigger, outcome.message);
      outcomes.push(outcome);
    }
    return outcomes;
  }

  private async markReboot(runId: string): Promise<void> {
    const { log } = this.deps;
    try {
      await this.deps.reboot.markPending(runId, this.clock());
      log.status(StatusTag.Warn, 'reboot', 'reboot required for kernel, module or mount changes to take effect');
    } catch (err: unknown) {
      log.status(StatusTag.Warn, 'reboot', `reboot required; marker not written: ${errorMessage(err)}`);
    }
  }

  private report(
    action: Action,
    tag: StatusTag,
    message: string,
    applied: boolean,
    error?: ReconcileErrorCode,
    backup?: BackupRecord,
  ): ExecutionOutcome {
    this.deps.log.status(tag, action.resourceId, message);
    return { action, tag, message, applied, error, backup };
  }
}
