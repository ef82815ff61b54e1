/**
 * tuneup core — Test Fixtures
 *
 * In-memory stand-ins for every adapter interface, plus a harness that
 * wires them into a Reconciler. No test touches the real filesystem or
 * spawns a process.
 */

import type {
  BackupRecord,
  BackupStore,
  Collaborators,
  CommandOptions,
  CommandResult,
  CommandRunner,
  PackageManager,
  Prompter,
  RebootTracker,
  Rebuilder,
  ServiceManager,
  SystemFs,
  UdevControl,
  UnitActiveState,
} from '../src/index.js';
import {
  Catalog,
  MemoryRunLogSink,
  Reconciler,
  RunLogger,
  UnitState,
  parseCatalogDocument,
  type StatusReporter,
  type StatusTag,
} from '../src/index.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function bytes(text: string): Uint8Array {
  return encoder.encode(text);
}

export function text(content: Uint8Array | undefined | null): string | null {
  return content === undefined || content === null ? null : decoder.decode(content);
}

// ---------------------------------------------------------------------------
// Filesystem
// ---------------------------------------------------------------------------

export class MemorySystemFs implements SystemFs {
  readonly files = new Map<string, Uint8Array>();
  readonly unreadable = new Set<string>();
  readonly failWrites = new Set<string>();
  readonly writes: Array<{ path: string; sudo: boolean }> = [];

  constructor(initial: Readonly<Record<string, string>> = {}) {
    for (const [path, content] of Object.entries(initial)) this.files.set(path, bytes(content));
  }

  read(path: string): Promise<Uint8Array | null> {
    if (this.unreadable.has(path)) return Promise.reject(new Error(`EACCES: permission denied, open '${path}'`));
    return Promise.resolve(this.files.get(path) ?? null);
  }

  list(path: string): Promise<ReadonlyArray<string> | null> {
    const prefix = `${path}/`;
    const names = new Set<string>();
    for (const file of this.files.keys()) {
      if (file.startsWith(prefix)) names.add(file.slice(prefix.length).split('/')[0] ?? '');
    }
    return Promise.resolve(names.size === 0 ? null : [...names].sort());
  }

  exists(path: string): Promise<boolean> {
    const prefix = `${path}/`;
    return Promise.resolve(this.files.has(path) || [...this.files.keys()].some((f) => f.startsWith(prefix)));
  }

  write(path: string, content: Uint8Array, options?: { readonly sudo?: boolean | undefined }): Promise<void> {
    if (this.failWrites.has(path)) return Promise.reject(new Error(`EROFS: read-only file system, open '${path}'`));
    this.writes.push({ path, sudo: options?.sudo ?? false });
    this.files.set(path, content);
    return Promise.resolve();
  }

  text(path: string): string | null {
    return text(this.files.get(path));
  }
}

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

function ok(command: string): CommandResult {
  return { command, exitCode: 0, output: '' };
}

export class FakePackageManager implements PackageManager {
  readonly installed = new Set<string>();
  readonly failing = new Set<string>();
  readonly calls: string[] = [];
  unavailable = false;

  constructor(installed: ReadonlyArray<string> = []) {
    for (const name of installed) this.installed.add(name);
  }

  isInstalled(name: string): Promise<boolean | null> {
    return Promise.resolve(this.unavailable ? null : this.installed.has(name));
  }

  install(names: ReadonlyArray<string>): Promise<CommandResult> {
    const command = `pacman -S --needed --noconfirm ${names.join(' ')}`;
    this.calls.push(command);
    if (names.some((n) => this.failing.has(n))) {
      return Promise.resolve({ command, exitCode: 1, output: `error: target not found: ${names.join(' ')}` });
    }
    for (const n of names) this.installed.add(n);
    return Promise.resolve(ok(command));
  }

  remove(names: ReadonlyArray<string>): Promise<CommandResult> {
    const command = `pacman -Rns --noconfirm ${names.join(' ')}`;
    this.calls.push(command);
    for (const n of names) this.installed.delete(n);
    return Promise.resolve(ok(command));
  }
}

export class FakeServiceManager implements ServiceManager {
  readonly states = new Map<string, UnitState>();
  readonly active = new Map<string, UnitActiveState>();
  readonly calls: string[] = [];

  enablementState(unit: string): Promise<UnitState> {
    return Promise.resolve(this.states.get(unit) ?? UnitState.NotFound);
  }

  activeState(unit: string): Promise<UnitActiveState> {
    return Promise.resolve(this.active.get(unit) ?? 'inactive');
  }

  mask(units: ReadonlyArray<string>): Promise<CommandResult> {
    const command = `systemctl mask ${units.join(' ')}`;
    this.calls.push(command);
    for (const u of units) this.states.set(u, UnitState.Masked);
    return Promise.resolve(ok(command));
  }

  enable(units: ReadonlyArray<string>): Promise<CommandResult> {
    const command = `systemctl enable ${units.join(' ')}`;
    this.calls.push(command);
    for (const u of units) this.states.set(u, UnitState.Enabled);
    return Promise.resolve(ok(command));
  }
}

export class FakeRebuilder implements Rebuilder {
  runs = 0;
  exitCode = 0;

  constructor(
    readonly name: string,
    private readonly command: string,
  ) {}

  rebuild(): Promise<CommandResult> {
    this.runs++;
    return Promise.resolve({ command: this.command, exitCode: this.exitCode, output: this.exitCode === 0 ? '' : 'boom' });
  }
}

export class FakeUdev implements UdevControl {
  readonly calls: string[] = [];

  reloadRules(): Promise<CommandResult> {
    this.calls.push('reload');
    return Promise.resolve(ok('udevadm control --reload-rules'));
  }

  trigger(): Promise<CommandResult> {
    this.calls.push('trigger');
    return Promise.resolve(ok('udevadm trigger'));
  }
}

/** Runner answering by command name; anything unscripted is "not found". */
export class FakeRunner implements CommandRunner {
  readonly results = new Map<string, CommandResult>();
  readonly calls: Array<{ command: string; args: ReadonlyArray<string>; options?: CommandOptions | undefined }> = [];

  run(command: string, args: ReadonlyArray<string>, options?: CommandOptions): Promise<CommandResult> {
    this.calls.push({ command, args, options });
    const display = [command, ...args].join(' ');
    return Promise.resolve(this.results.get(command) ?? { command: display, exitCode: 127, output: `${command}: not found` });
  }
}

// ---------------------------------------------------------------------------
// Run artifacts
// ---------------------------------------------------------------------------

export class MemoryBackupStore implements BackupStore {
  readonly prepared: string[] = [];
  readonly saved = new Map<string, Uint8Array>();
  readonly records = new Map<string, BackupRecord>();
  failPrepare = false;
  failSave = false;

  prepare(runId: string): Promise<void> {
    if (this.failPrepare) return Promise.reject(new Error(`EACCES: permission denied, mkdir 'backups/${runId}'`));
    this.prepared.push(runId);
    return Promise.resolve();
  }

  pathFor(runId: string, originalPath: string): string {
    return `/home/test/.local/state/tuneup/backups/${runId}${originalPath}`;
  }

  save(runId: string, originalPath: string, content: Uint8Array): Promise<BackupRecord> {
    if (this.failSave) return Promise.reject(new Error('ENOSPC: no space left on device'));
    const existing = this.records.get(originalPath);
    if (existing !== undefined) return Promise.resolve(existing);
    const record: BackupRecord = { originalPath, backupPath: this.pathFor(runId, originalPath), runId };
    this.records.set(originalPath, record);
    this.saved.set(record.backupPath, content);
    return Promise.resolve(record);
  }
}

export class FakeRebootTracker implements RebootTracker {
  marked: Array<{ runId: string; at: string }> = [];

  constructor(
    private pending: string | null = null,
    private readonly booted: string | null = '2026-01-01T00:00:00.000Z',
  ) {}

  markPending(runId: string, at: string): Promise<void> {
    this.marked.push({ runId, at });
    this.pending = at;
    return Promise.resolve();
  }

  pendingSince(): Promise<string | null> {
    return Promise.resolve(this.pending);
  }

  bootedAt(): Promise<string | null> {
    return Promise.resolve(this.booted);
  }
}

/** Answers confirmations from a script; records every question asked. */
export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];

  constructor(private readonly answers: ReadonlyArray<boolean> = []) {}

  confirm(question: string): Promise<boolean> {
    this.questions.push(question);
    return Promise.resolve(this.answers[this.questions.length - 1] ?? false);
  }
}

export class RecordingReporter implements StatusReporter {
  readonly lines: Array<{ tag: StatusTag; subject: string; message: string }> = [];
  readonly details: string[] = [];

  status(tag: StatusTag, subject: string, message: string): void {
    this.lines.push({ tag, subject, message });
  }

  detail(content: string): void {
    this.details.push(content);
  }

  find(subject: string): { tag: StatusTag; subject: string; message: string } | undefined {
    return this.lines.find((l) => l.subject === subject);
  }
}

// ---------------------------------------------------------------------------
// Catalog and harness
// ---------------------------------------------------------------------------

/** Build a Catalog from a document; throws listing every validation error. */
export function catalogFrom(doc: unknown, sources: Readonly<Record<string, string>> = {}): Catalog {
  const result = parseCatalogDocument(doc, (source) => {
    const content = sources[source];
    return content === undefined ? null : bytes(content);
  });
  if (!result.ok) throw new Error(result.errors.map((e) => `${e.context ?? ''}: ${e.message}`).join('\n'));
  return result.value;
}

export const FIXED_CLOCK = (): string => '2026-03-01T12:00:00.000Z';

export interface HarnessOptions {
  readonly files?: Readonly<Record<string, string>>;
  readonly installed?: ReadonlyArray<string>;
  readonly answers?: ReadonlyArray<boolean>;
  readonly runId?: string;
  readonly reboot?: FakeRebootTracker;
}

export interface Harness {
  readonly fs: MemorySystemFs;
  readonly runner: FakeRunner;
  readonly packages: FakePackageManager;
  readonly services: FakeServiceManager;
  readonly initramfs: FakeRebuilder;
  readonly bootloader: FakeRebuilder;
  readonly udev: FakeUdev;
  readonly collaborators: Collaborators;
  readonly backups: MemoryBackupStore;
  readonly reboot: FakeRebootTracker;
  readonly prompter: ScriptedPrompter;
  readonly sink: MemoryRunLogSink;
  readonly reporter: RecordingReporter;
  readonly log: RunLogger;
  readonly reconciler: Reconciler;
}

export function harness(catalog: Catalog, options: HarnessOptions = {}): Harness {
  const fs = new MemorySystemFs(options.files);
  const runner = new FakeRunner();
  const packages = new FakePackageManager(options.installed);
  const services = new FakeServiceManager();
  const initramfs = new FakeRebuilder('mkinitcpio', 'mkinitcpio -P');
  const bootloader = new FakeRebuilder('sdboot-manage', 'sdboot-manage gen');
  const udev = new FakeUdev();
  const collaborators: Collaborators = { packages, services, initramfs, bootloader, udev };
  const backups = new MemoryBackupStore();
  const reboot = options.reboot ?? new FakeRebootTracker();
  const prompter = new ScriptedPrompter(options.answers);
  const sink = new MemoryRunLogSink();
  const reporter = new RecordingReporter();
  const log = new RunLogger(options.runId ?? '20260301T120000Z', sink, reporter, FIXED_CLOCK);
  const reconciler = new Reconciler({
    catalog,
    fs,
    runner,
    collaborators,
    backups,
    reboot,
    prompter,
    log,
    clock: FIXED_CLOCK,
  });
  return {
    fs, runner, packages, services, initramfs, bootloader, udev, collaborators,
    backups, reboot, prompter, sink, reporter, log, reconciler,
  };
}
