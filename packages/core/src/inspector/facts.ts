/**
 * tuneup core — System Fact Collection
 *
 * Gathers the whole-system facts preconditions are evaluated against. Runs
 * once per invocation, before planning. Each fact that cannot be determined
 * is recorded as null.
 */

import type { CommandRunner, PackageManager, SystemFs } from '../adapters/index.js';
import type { SystemFacts } from '../types/facts.js';
import type { Catalog } from '../catalog/catalog.js';
import { decodeText } from '../matching/render.js';
import { hasActiveCrypttabEntry } from '../matching/mkinitcpio.js';
import { isBtrfsSubvolumeRoot } from '../matching/fstab.js';

export const CRYPTTAB = '/etc/crypttab';
export const FSTAB = '/etc/fstab';
export const PCI_DEVICES = '/sys/bus/pci/devices';

/** Exit status of a command that could not be spawned. */
export const COMMAND_NOT_FOUND = 127;

export interface FactsDeps {
  readonly fs: SystemFs;
  readonly runner: CommandRunner;
  readonly packages: PackageManager;
}

async function readText(fs: SystemFs, path: string): Promise<string | null | undefined> {
  try {
    const bytes = await fs.read(path);
    return bytes === null ? null : (decodeText(bytes) ?? undefined);
  } catch {
    // unreadable: undefined distinguishes it from "absent" (null)
    return undefined;
  }
}

export async function detectLuks(fs: SystemFs): Promise<boolean | null> {
  const text = await readText(fs, CRYPTTAB);
  if (text === undefined) return null;
  return text !== null && hasActiveCrypttabEntry(text);
}

export async function detectBtrfsSubvolumes(fs: SystemFs): Promise<boolean | null> {
  const text = await readText(fs, FSTAB);
  if (text === undefined || text === null) return null;
  return isBtrfsSubvolumeRoot(text);
}

/** Physical volumes reported by `pvs`; no lvm2 tools means no LVM. */
export async function detectLvm(runner: CommandRunner): Promise<boolean | null> {
  const result = await runner.run('pvs', ['--noheadings', '-o', 'pv_name'], { sudo: true });
  if (result.exitCode === COMMAND_NOT_FOUND) return false;
  if (result.exitCode !== 0) return null;
  return result.output.trim() !== '';
}

export async function detectPciVendors(fs: SystemFs): Promise<ReadonlyArray<string> | null> {
  let devices: ReadonlyArray<string> | null;
  try {
    devices = await fs.list(PCI_DEVICES);
  } catch {
    return null;
  }
  if (devices === null) return null;

  const vendors = new Set<string>();
  for (const device of devices) {
    const text = await readText(fs, `${PCI_DEVICES}/${device}/vendor`);
    if (typeof text === 'string') vendors.add(text.trim().replace(/^0x/, '').toLowerCase());
  }
  return [...vendors].sort();
}

export async function collectSystemFacts(catalog: Catalog, deps: FactsDeps): Promise<SystemFacts> {
  const packages: Record<string, boolean | null> = {};
  for (const name of catalog.referencedPackages()) {
    packages[name] = await deps.packages.isInstalled(name);
  }

  const paths: Record<string, boolean | null> = {};
  for (const path of catalog.referencedPaths()) {
    try {
      paths[path] = await deps.fs.exists(path);
    } catch {
      paths[path] = null;
    }
  }

  return {
    luks: await detectLuks(deps.fs),
    lvm: await detectLvm(deps.runner),
    btrfsSubvolumes: await detectBtrfsSubvolumes(deps.fs),
    pciVendors: await detectPciVendors(deps.fs),
    packages,
    paths,
  };
}
