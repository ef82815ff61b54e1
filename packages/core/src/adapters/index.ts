/**
 * tuneup core — Adapter Interfaces
 *
 * Every side effect of the reconciler flows through one of these adapters.
 * Core code never touches the filesystem, spawns a process, or prompts the
 * operator directly; concrete implementations live in @tuneup/host and are
 * injected at construction time.
 *
 * Query methods report "could not tell" as null or 'unknown' rather than
 * throwing, so callers can keep unknown distinct from absent.
 */

import type { UnitActiveState, UnitState } from '../types/facts.js';
import type { BackupRecord } from '../types/run.js';

// ---------------------------------------------------------------------------
// Command boundary
// ---------------------------------------------------------------------------

/**
 * Structured result of an external command.
 *
 * `command` is the display form with sensitive arguments already redacted.
 * Runners never throw for a failing or missing command: a binary that
 * cannot be spawned is reported with exitCode 127.
 */
export interface CommandResult {
  readonly command: string;
  readonly exitCode: number;
  /** Combined stdout and stderr. */
  readonly output: string;
}

export interface CommandOptions {
  /** Bytes written to the child's stdin. */
  readonly input?: Uint8Array | undefined;
  /** Run through sudo when the current user is not root. */
  readonly sudo?: boolean | undefined;
}

export interface CommandRunner {
  run(command: string, args: ReadonlyArray<string>, options?: CommandOptions): Promise<CommandResult>;
}

// ---------------------------------------------------------------------------
// Filesystem
// ---------------------------------------------------------------------------

export interface SystemFs {
  /**
   * Read a file. Returns null when it does not exist.
   * @throws on any other error (permission, I/O); callers map that to unknown
   */
  read(path: string): Promise<Uint8Array | null>;

  /** Directory entry names, or null when the directory does not exist. */
  list(path: string): Promise<ReadonlyArray<string> | null>;

  exists(path: string): Promise<boolean>;

  /** Write bytes, creating parent directories. Elevated when `sudo` is set. */
  write(path: string, content: Uint8Array, options?: { readonly sudo?: boolean | undefined }): Promise<void>;
}

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

export interface PackageManager {
  /** null when the package manager could not be queried. */
  isInstalled(name: string): Promise<boolean | null>;
  install(names: ReadonlyArray<string>): Promise<CommandResult>;
  remove(names: ReadonlyArray<string>): Promise<CommandResult>;
}

export interface ServiceManager {
  enablementState(unit: string): Promise<UnitState>;
  activeState(unit: string): Promise<UnitActiveState>;
  mask(units: ReadonlyArray<string>): Promise<CommandResult>;
  enable(units: ReadonlyArray<string>): Promise<CommandResult>;
}

/** Initramfs builder or bootloader entry generator: an opaque rebuild step. */
export interface Rebuilder {
  readonly name: string;
  rebuild(): Promise<CommandResult>;
}

export interface UdevControl {
  reloadRules(): Promise<CommandResult>;
  trigger(): Promise<CommandResult>;
}

export interface Collaborators {
  readonly packages: PackageManager;
  readonly services: ServiceManager;
  readonly initramfs: Rebuilder;
  readonly bootloader: Rebuilder;
  readonly udev: UdevControl;
}

// ---------------------------------------------------------------------------
// Run artifacts
// ---------------------------------------------------------------------------

/**
 * Per-run backup tree. Each run writes under its own directory so a later
 * run can never clobber an earlier run's backups.
 */
export interface BackupStore {
  /**
   * Create the run's backup directory.
   * @throws when it cannot be created; the run must not continue
   */
  prepare(runId: string): Promise<void>;

  /** Where `originalPath` would be backed up in this run. */
  pathFor(runId: string, originalPath: string): string;

  /**
   * Store a copy of `content`. When the path was already backed up in this
   * run the earlier copy is kept and its record returned.
   */
  save(runId: string, originalPath: string, content: Uint8Array): Promise<BackupRecord>;
}

/** Tracks whether a reboot-requiring change is waiting for a reboot. */
export interface RebootTracker {
  markPending(runId: string, at: string): Promise<void>;
  /** ISO timestamp of the last reboot-requiring change, or null. */
  pendingSince(): Promise<string | null>;
  /** ISO timestamp of the current boot, or null when unknown. */
  bootedAt(): Promise<string | null>;
}

export interface Prompter {
  confirm(question: string): Promise<boolean>;
}
