/**
 * tuneup core — Resource Types
 *
 * A Resource is the unit of reconciliation: one declaratively desired piece
 * of system configuration (a file, a kernel parameter, a unit state, a
 * package's presence).
 *
 * These types are pure data shapes. Matching and rendering live in
 * ../matching/, reading live state lives in ../inspector/.
 */

// ---------------------------------------------------------------------------
// Resource Kind
// ---------------------------------------------------------------------------

export enum ResourceKind {
  /** Copy bytes verbatim to a target path. */
  FileCopy = 'file-copy',
  /** One `KEY=value` line inside a multi-key file. */
  TextPatch = 'text-patch',
  /** One `KEY=value` line in the environment file. */
  EnvVar = 'env-var',
  /** One token on the configured kernel command line. */
  KernelParam = 'kernel-param',
  /** One mount option on one fstab entry. */
  MountOption = 'mount-option',
  /** One hook in the initramfs HOOKS array. */
  InitramfsHook = 'initramfs-hook',
  ServiceMask = 'service-mask',
  ServiceEnable = 'service-enable',
  PackagePresent = 'package-present',
  PackageAbsent = 'package-absent',
}

/** Kinds whose mutation is a file write (backed up before overwrite). */
export const FILE_BACKED_KINDS: ReadonlySet<ResourceKind> = new Set([
  ResourceKind.FileCopy,
  ResourceKind.TextPatch,
  ResourceKind.EnvVar,
  ResourceKind.KernelParam,
  ResourceKind.MountOption,
  ResourceKind.InitramfsHook,
]);

/** Default target for EnvVar resources that do not name one. */
export const ENVIRONMENT_FILE = '/etc/environment';

// ---------------------------------------------------------------------------
// Preconditions
// ---------------------------------------------------------------------------

/**
 * A predicate over SystemFacts gating whether a resource is in scope.
 *
 * Tagged data, evaluated uniformly by evaluatePreconditions(). A resource
 * with any unmet precondition is planned as Skip, never mutated.
 */
export type Precondition =
  | { readonly kind: 'package-installed'; readonly name: string }
  | { readonly kind: 'package-missing'; readonly name: string }
  | { readonly kind: 'luks-present' }
  | { readonly kind: 'no-lvm' }
  | { readonly kind: 'not-btrfs-subvolumes' }
  | { readonly kind: 'pci-vendor'; readonly vendorId: string; readonly label?: string | undefined }
  | { readonly kind: 'path-exists'; readonly path: string };

export type PreconditionKind = Precondition['kind'];

// ---------------------------------------------------------------------------
// Triggers and confirmation
// ---------------------------------------------------------------------------

/**
 * Collaborator rebuilds a resource needs once it has changed.
 * They run once per run, after every action, in TRIGGER_ORDER.
 */
export enum Trigger {
  Udev = 'udev',
  Initramfs = 'initramfs',
  Bootloader = 'bootloader',
}

export const TRIGGER_ORDER: ReadonlyArray<Trigger> = [
  Trigger.Udev,
  Trigger.Initramfs,
  Trigger.Bootloader,
];

export interface Confirmation {
  /** Question put to the operator before the resource is touched. */
  readonly prompt: string;
  /**
   * 'halt' stops the whole run when the operator declines (continuing would
   * leave the system unbootable); 'skip' only skips this resource.
   */
  readonly onDecline: 'halt' | 'skip';
}

// ---------------------------------------------------------------------------
// Resources
// ---------------------------------------------------------------------------

interface ResourceBase {
  /** Stable key, unique within a Catalog. */
  readonly id: string;
  /** Path, unit name, or package name. */
  readonly target: string;
  readonly description?: string | undefined;
  readonly preconditions: ReadonlyArray<Precondition>;
  readonly requiresSudo: boolean;
  readonly requiresReboot: boolean;
  readonly triggers: ReadonlyArray<Trigger>;
  readonly confirmation?: Confirmation | undefined;
  /** Substrings the static verifier expects in the target file. */
  readonly checks: ReadonlyArray<string>;
}

export interface FileCopyResource extends ResourceBase {
  readonly kind: ResourceKind.FileCopy;
  /** Catalog-relative source path, kept for messages. */
  readonly source: string;
  /** Desired bytes; null when the source file is missing from the catalog. */
  readonly desired: Uint8Array | null;
}

export interface KeyValueResource extends ResourceBase {
  readonly kind: ResourceKind.TextPatch | ResourceKind.EnvVar;
  readonly desired: { readonly key: string; readonly value: string };
}

export interface KernelParamResource extends ResourceBase {
  readonly kind: ResourceKind.KernelParam;
  readonly desired: {
    readonly token: string;
    /** Shell variable holding the options, e.g. LINUX_OPTIONS. Whole file when absent. */
    readonly variable?: string | undefined;
  };
}

export interface MountOptionResource extends ResourceBase {
  readonly kind: ResourceKind.MountOption;
  readonly desired: { readonly mountPoint: string; readonly option: string };
}

export interface InitramfsHookResource extends ResourceBase {
  readonly kind: ResourceKind.InitramfsHook;
  readonly desired: {
    readonly hook: string;
    /** Insert before this hook when present; appended otherwise. */
    readonly before?: string | undefined;
  };
}

export interface UnitResource extends ResourceBase {
  readonly kind: ResourceKind.ServiceMask | ResourceKind.ServiceEnable;
}

export interface PackageResource extends ResourceBase {
  readonly kind: ResourceKind.PackagePresent | ResourceKind.PackageAbsent;
}

export type FileBackedResource =
  | FileCopyResource
  | KeyValueResource
  | KernelParamResource
  | MountOptionResource
  | InitramfsHookResource;

export type Resource = FileBackedResource | UnitResource | PackageResource;

export function isFileBacked(resource: Resource): resource is FileBackedResource {
  return FILE_BACKED_KINDS.has(resource.kind);
}
