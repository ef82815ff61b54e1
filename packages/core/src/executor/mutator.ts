/**
 * tuneup core — Mutators
 *
 * The Executor performs every mutation through a Mutator. LiveMutator calls
 * the real collaborators; DryRunMutator is the no-op stand-in used by
 * --dry-run, which reports what would have run and changes nothing.
 */

import type {
  BackupStore,
  Collaborators,
  CommandResult,
  SystemFs,
} from '../adapters/index.js';
import type { BackupRecord } from '../types/run.js';
import { Trigger } from '../types/resource.js';

export interface Mutator {
  readonly dryRun: boolean;
  backup(runId: string, path: string, content: Uint8Array): Promise<BackupRecord>;
  write(path: string, content: Uint8Array, sudo: boolean): Promise<void>;
  install(name: string): Promise<CommandResult>;
  remove(name: string): Promise<CommandResult>;
  enable(unit: string): Promise<CommandResult>;
  mask(unit: string): Promise<CommandResult>;
  /** One result per collaborator call the trigger makes. */
  runTrigger(trigger: Trigger): Promise<ReadonlyArray<CommandResult>>;
}

export class LiveMutator implements Mutator {
  readonly dryRun = false;

  constructor(
    private readonly fs: SystemFs,
    private readonly backups: BackupStore,
    private readonly collaborators: Collaborators,
  ) {}

  backup(runId: string, path: string, content: Uint8Array): Promise<BackupRecord> {
    return this.backups.save(runId, path, content);
  }

  write(path: string, content: Uint8Array, sudo: boolean): Promise<void> {
    return this.fs.write(path, content, { sudo });
  }

  install(name: string): Promise<CommandResult> {
    return this.collaborators.packages.install([name]);
  }

  remove(name: string): Promise<CommandResult> {
    return this.collaborators.packages.remove([name]);
  }

  enable(unit: string): Promise<CommandResult> {
    return this.collaborators.services.enable([unit]);
  }

  mask(unit: string): Promise<CommandResult> {
    return this.collaborators.services.mask([unit]);
  }

  async runTrigger(trigger: Trigger): Promise<ReadonlyArray<CommandResult>> {
    switch (trigger) {
      case Trigger.Udev: {
        const reload = await this.collaborators.udev.reloadRules();
        if (reload.exitCode !== 0) return [reload];
        return [reload, await this.collaborators.udev.trigger()];
      }
      case Trigger.Initramfs:
        return [await this.collaborators.initramfs.rebuild()];
      case Trigger.Bootloader:
        return [await this.collaborators.bootloader.rebuild()];
    }
  }
}

export class DryRunMutator implements Mutator {
  readonly dryRun = true;

  constructor(private readonly backups: BackupStore) {}

  backup(runId: string, path: string): Promise<BackupRecord> {
    return Promise.resolve({ originalPath: path, backupPath: this.backups.pathFor(runId, path), runId });
  }

  write(): Promise<void> {
    return Promise.resolve();
  }

  install(name: string): Promise<CommandResult> {
    return wouldRun(`install package ${name}`);
  }

  remove(name: string): Promise<CommandResult> {
    return wouldRun(`remove package ${name}`);
  }

  enable(unit: string): Promise<CommandResult> {
    return wouldRun(`enable ${unit}`);
  }

  mask(unit: string): Promise<CommandResult> {
    return wouldRun(`mask ${unit}`);
  }

  async runTrigger(trigger: Trigger): Promise<ReadonlyArray<CommandResult>> {
    return [await wouldRun(`run ${trigger} rebuild`)];
  }
}

function wouldRun(description: string): Promise<CommandResult> {
  return Promise.resolve({ command: `(dry-run) ${description}`, exitCode: 0, output: '' });
}
