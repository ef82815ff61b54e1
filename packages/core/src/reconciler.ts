/**
 * tuneup core — Reconciler
 *
 * Entry points for one invocation. Each call collects SystemFacts, then
 * either plans and executes (install), plans only (diff) or verifies. One
 * Reconciler serves one run; its RunLogger carries the run id.
 */

import type {
  BackupStore,
  Collaborators,
  CommandRunner,
  Prompter,
  RebootTracker,
  SystemFs,
} from './adapters/index.js';
import type { Action } from './types/action.js';
import { ActionType } from './types/action.js';
import type { SystemFacts } from './types/facts.js';
import type { ExecutionReport } from './types/run.js';
import type { VerificationResult, VerifyPass } from './types/verification.js';
import type { Catalog } from './catalog/catalog.js';
import { collectSystemFacts } from './inspector/facts.js';
import { StateInspector } from './inspector/inspector.js';
import { Planner } from './planner/planner.js';
import { Executor } from './executor/executor.js';
import { Verifier } from './verifier/verifier.js';
import type { Clock, RunLogger } from './logging/run-log.js';

export interface ReconcilerDeps {
  readonly catalog: Catalog;
  readonly fs: SystemFs;
  readonly runner: CommandRunner;
  readonly collaborators: Collaborators;
  readonly backups: BackupStore;
  readonly reboot: RebootTracker;
  readonly prompter: Prompter;
  readonly log: RunLogger;
  readonly clock?: Clock | undefined;
}

export interface DiffReport {
  readonly facts: SystemFacts;
  /** Every planned action, in execution order. */
  readonly actions: ReadonlyArray<Action>;
  /** The actions that would change something. */
  readonly changes: ReadonlyArray<Action>;
}

export class Reconciler {
  private readonly inspector: StateInspector;

  constructor(private readonly deps: ReconcilerDeps) {
    this.inspector = new StateInspector({
      fs: deps.fs,
      packages: deps.collaborators.packages,
      services: deps.collaborators.services,
    });
  }

  async facts(): Promise<SystemFacts> {
    const facts = await collectSystemFacts(this.deps.catalog, {
      fs: this.deps.fs,
      runner: this.deps.runner,
      packages: this.deps.collaborators.packages,
    });
    this.deps.log.record('facts', 'system facts collected', undefined, {
      luks: facts.luks,
      lvm: facts.lvm,
      btrfsSubvolumes: facts.btrfsSubvolumes,
      pciVendors: facts.pciVendors,
      packages: facts.packages,
      paths: facts.paths,
    });
    return facts;
  }

  async plan(facts?: SystemFacts): Promise<Action[]> {
    const planner = new Planner(this.deps.catalog, this.inspector, this.deps.log);
    return planner.plan(facts ?? (await this.facts()));
  }

  async install(options: { readonly dryRun: boolean }): Promise<ExecutionReport> {
    const actions = await this.plan();
    const executor = new Executor({
      catalog: this.deps.catalog,
      fs: this.deps.fs,
      collaborators: this.deps.collaborators,
      backups: this.deps.backups,
      reboot: this.deps.reboot,
      prompter: this.deps.prompter,
      log: this.deps.log,
      clock: this.deps.clock,
    });
    return executor.execute(actions, options);
  }

  async diff(): Promise<DiffReport> {
    const facts = await this.facts();
    const actions = await this.plan(facts);
    return { facts, actions, changes: actions.filter((a) => a.type !== ActionType.Skip) };
  }

  async verify(pass: VerifyPass): Promise<VerificationResult[]> {
    const facts = await this.facts();
    const verifier = new Verifier({
      catalog: this.deps.catalog,
      inspector: this.inspector,
      fs: this.deps.fs,
      services: this.deps.collaborators.services,
      reboot: this.deps.reboot,
      log: this.deps.log,
    });
    return verifier.verify(pass, facts);
  }
}
