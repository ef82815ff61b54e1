/**
 * tuneup core — System Fact Types
 *
 * SystemFacts are whole-system observations collected once per run and used
 * to evaluate preconditions. A SystemFact is the per-resource reading the
 * State Inspector produces.
 *
 * Unknown is always modelled explicitly (null or 'unknown') and is never
 * folded into "absent": a failed query must not look like a missing package
 * or an unset parameter, or the planner would act on a false negative.
 */

// ---------------------------------------------------------------------------
// System-wide facts
// ---------------------------------------------------------------------------

export interface SystemFacts {
  /** An active (non-comment) entry exists in /etc/crypttab. */
  readonly luks: boolean | null;
  /** LVM physical volumes are present. */
  readonly lvm: boolean | null;
  /** The root fstab entry mounts a btrfs subvolume. */
  readonly btrfsSubvolumes: boolean | null;
  /** Lowercase PCI vendor ids without the 0x prefix, e.g. '14c3'. */
  readonly pciVendors: ReadonlyArray<string> | null;
  /** Installed state of every package a precondition names. */
  readonly packages: Readonly<Record<string, boolean | null>>;
  /** Existence of every path a precondition names. */
  readonly paths: Readonly<Record<string, boolean | null>>;
}

export const UNKNOWN_FACTS: SystemFacts = {
  luks: null,
  lvm: null,
  btrfsSubvolumes: null,
  pciVendors: null,
  packages: {},
  paths: {},
};

// ---------------------------------------------------------------------------
// Per-resource facts
// ---------------------------------------------------------------------------

export type Presence = 'present' | 'absent' | 'unknown';

/** Unit enablement as reported by the service manager. */
export enum UnitState {
  Masked = 'masked',
  Enabled = 'enabled',
  Indirect = 'indirect',
  Disabled = 'disabled',
  NotFound = 'not-found',
  Unknown = 'unknown',
}

/** Unit runtime state as reported by the service manager. */
export type UnitActiveState = 'active' | 'inactive' | 'failed' | 'unknown';

export interface SystemFact {
  readonly resourceId: string;
  readonly presence: Presence;
  /** True only when presence is 'present' and the value equals the desired one. */
  readonly matches: boolean;
  /** Human-readable current value: a hash, a line, a unit state. */
  readonly rawValue: string | null;
  /** Current text of a file-backed target; null when the file is absent. */
  readonly content?: string | null | undefined;
  /** Set when the target's syntax is too ambiguous to edit automatically. */
  readonly unsafe?: string | undefined;
}
