/**
 * tuneup host — Collaborator Adapters
 *
 * Thin wrappers that express each collaborator of the reconciler as one or
 * two external commands run through the CommandRunner:
 *
 *   packages   pacman
 *   services   systemctl
 *   initramfs  mkinitcpio -P
 *   bootloader sdboot-manage gen
 *   udev       udevadm
 *
 * Query methods translate exit codes and output into the core's enums;
 * anything they cannot interpret becomes null or Unknown, never a guess.
 */

import { UnitState } from '@tuneup/core';
import type {
  Collaborators,
  CommandResult,
  CommandRunner,
  PackageManager,
  Rebuilder,
  ServiceManager,
  UdevControl,
  UnitActiveState,
} from '@tuneup/core';

// ---------------------------------------------------------------------------
// pacman
// ---------------------------------------------------------------------------

export class PacmanPackageManager implements PackageManager {
  constructor(private readonly runner: CommandRunner) {}

  async isInstalled(name: string): Promise<boolean | null> {
    const result = await this.runner.run('pacman', ['-Q', name]);
    if (result.exitCode === 0) return true;
    if (result.exitCode === 1) return false;
    return null;
  }

  install(names: ReadonlyArray<string>): Promise<CommandResult> {
    return this.runner.run('pacman', ['-S', '--needed', '--noconfirm', ...names], { sudo: true });
  }

  remove(names: ReadonlyArray<string>): Promise<CommandResult> {
    return this.runner.run('pacman', ['-Rns', '--noconfirm', ...names], { sudo: true });
  }
}

// ---------------------------------------------------------------------------
// systemctl
// ---------------------------------------------------------------------------

const ENABLEMENT: Readonly<Record<string, UnitState>> = {
  enabled: UnitState.Enabled,
  'enabled-runtime': UnitState.Enabled,
  masked: UnitState.Masked,
  'masked-runtime': UnitState.Masked,
  indirect: UnitState.Indirect,
  static: UnitState.Indirect,
  generated: UnitState.Indirect,
  alias: UnitState.Indirect,
  linked: UnitState.Indirect,
  'linked-runtime': UnitState.Indirect,
  disabled: UnitState.Disabled,
  'not-found': UnitState.NotFound,
};

/** Map `systemctl is-enabled` output to a UnitState. */
export function parseEnablement(result: CommandResult): UnitState {
  const word = result.output.trim().split(/\s+/)[0] ?? '';
  const state = ENABLEMENT[word];
  if (state !== undefined) return state;
  if (/No such file|not found|does not exist/i.test(result.output)) return UnitState.NotFound;
  return UnitState.Unknown;
}

/** Map `systemctl is-active` output to a UnitActiveState. */
export function parseActiveState(result: CommandResult): UnitActiveState {
  const word = result.output.trim().split(/\s+/)[0] ?? '';
  switch (word) {
    case 'active':
    case 'reloading':
      return 'active';
    case 'inactive':
    case 'deactivating':
      return 'inactive';
    case 'failed':
      return 'failed';
    default:
      return 'unknown';
  }
}

export class SystemctlServiceManager implements ServiceManager {
  constructor(private readonly runner: CommandRunner) {}

  async enablementState(unit: string): Promise<UnitState> {
    return parseEnablement(await this.runner.run('systemctl', ['is-enabled', unit]));
  }

  async activeState(unit: string): Promise<UnitActiveState> {
    return parseActiveState(await this.runner.run('systemctl', ['is-active', unit]));
  }

  mask(units: ReadonlyArray<string>): Promise<CommandResult> {
    return this.runner.run('systemctl', ['mask', ...units], { sudo: true });
  }

  enable(units: ReadonlyArray<string>): Promise<CommandResult> {
    return this.runner.run('systemctl', ['enable', ...units], { sudo: true });
  }
}

// ---------------------------------------------------------------------------
// Rebuild steps and udev
// ---------------------------------------------------------------------------

export class CommandRebuilder implements Rebuilder {
  constructor(
    readonly name: string,
    private readonly runner: CommandRunner,
    private readonly command: string,
    private readonly args: ReadonlyArray<string>,
  ) {}

  rebuild(): Promise<CommandResult> {
    return this.runner.run(this.command, this.args, { sudo: true });
  }
}

export class UdevadmControl implements UdevControl {
  constructor(private readonly runner: CommandRunner) {}

  reloadRules(): Promise<CommandResult> {
    return this.runner.run('udevadm', ['control', '--reload-rules'], { sudo: true });
  }

  trigger(): Promise<CommandResult> {
    return this.runner.run('udevadm', ['trigger'], { sudo: true });
  }
}

export function createCollaborators(runner: CommandRunner): Collaborators {
  return {
    packages: new PacmanPackageManager(runner),
    services: new SystemctlServiceManager(runner),
    initramfs: new CommandRebuilder('mkinitcpio', runner, 'mkinitcpio', ['-P']),
    bootloader: new CommandRebuilder('sdboot-manage', runner, 'sdboot-manage', ['gen']),
    udev: new UdevadmControl(runner),
  };
}
