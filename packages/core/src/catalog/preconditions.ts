/**
 * tuneup core — Precondition Evaluation
 *
 * Preconditions are evaluated in declaration order; the first unmet one
 * supplies the skip reason. An unknown fact never satisfies a precondition.
 */

import type { Precondition } from '../types/resource.js';
import type { SystemFacts } from '../types/facts.js';

export type PreconditionResult =
  | { readonly met: true }
  | { readonly met: false; readonly reason: string };

const MET: PreconditionResult = { met: true };

function unmet(reason: string): PreconditionResult {
  return { met: false, reason };
}

export function evaluatePrecondition(p: Precondition, facts: SystemFacts): PreconditionResult {
  switch (p.kind) {
    case 'package-installed': {
      const installed = facts.packages[p.name];
      if (installed === true) return MET;
      return unmet(installed === false ? `package ${p.name} not installed` : `package ${p.name} state unknown`);
    }
    case 'package-missing': {
      const installed = facts.packages[p.name];
      if (installed === false) return MET;
      return unmet(installed === true ? `package ${p.name} installed` : `package ${p.name} state unknown`);
    }
    case 'luks-present':
      if (facts.luks === true) return MET;
      return unmet(facts.luks === false ? 'no LUKS volume in /etc/crypttab' : 'LUKS state unknown');
    case 'no-lvm':
      if (facts.lvm === false) return MET;
      return unmet(facts.lvm === true ? 'LVM volumes present' : 'LVM state unknown');
    case 'not-btrfs-subvolumes':
      if (facts.btrfsSubvolumes === false) return MET;
      return unmet(facts.btrfsSubvolumes === true ? 'btrfs detected' : 'root filesystem layout unknown');
    case 'pci-vendor': {
      const label = p.label ?? `PCI vendor ${p.vendorId}`;
      if (facts.pciVendors === null) return unmet(`${label} presence unknown`);
      return facts.pciVendors.includes(p.vendorId.toLowerCase()) ? MET : unmet(`no ${label} device`);
    }
    case 'path-exists': {
      const exists = facts.paths[p.path];
      if (exists === true) return MET;
      return unmet(exists === false ? `${p.path} not found` : `${p.path} state unknown`);
    }
  }
}

export function evaluatePreconditions(
  preconditions: ReadonlyArray<Precondition>,
  facts: SystemFacts,
): PreconditionResult {
  for (const p of preconditions) {
    const result = evaluatePrecondition(p, facts);
    if (!result.met) return result;
  }
  return MET;
}
