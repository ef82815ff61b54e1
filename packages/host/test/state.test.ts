/**
 * tuneup host — Run State Tests
 *
 *   SIO-U1: FileStateIO round-trips JSON; missing or malformed files read as undefined
 *   SIO-U2: appendLine writes under logs/
 *   BAK-U1: backups land at <root>/<runId>/<original path>, owner-only
 *   BAK-U2: the first copy of a path in a run is kept
 *   BAK-U3: an uncreatable backup directory is BackupFailed
 *   BAK-U4: an existing run directory is BackupFailed, never shared
 *   RBT-U1: reboot marker round-trip and validation
 *   RBT-U2: boot time parsed from /proc/stat
 *   RID-U1..3: run ids are compact UTC timestamps with a random suffix
 *
 * Isolation: temp directories per test.
 */

import { describe, it, expect } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, statSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ReconcileError, ReconcileErrorCode } from '@tuneup/core';
import { FileStateIO, MemoryStateIO } from '../src/state/state-io.js';
import { DirectoryBackupStore } from '../src/state/backup-store.js';
import { FileRebootTracker, REBOOT_MARKER, parseBootTime } from '../src/state/reboot-tracker.js';
import { newRunId } from '../src/state/run-id.js';

function tempDir(label: string): string {
  return mkdtempSync(join(tmpdir(), `tuneup-state-${label}-`));
}

const encode = (s: string): Uint8Array => new TextEncoder().encode(s);

describe('FileStateIO', () => {
  it('SIO-U1: JSON round-trip, missing and malformed files', () => {
    const home = tempDir('sio1');
    const io = new FileStateIO(home);

    expect(io.readJson('reboot-pending.json')).toBeUndefined();
    io.writeJson('reboot-pending.json', { runId: 'r1', at: '2026-03-01T12:00:00.000Z' });
    expect(io.readJson('reboot-pending.json')).toEqual({ runId: 'r1', at: '2026-03-01T12:00:00.000Z' });

    writeFileSync(join(home, 'state', 'broken.json'), '{ not json');
    expect(io.readJson('broken.json')).toBeUndefined();
  });

  it('SIO-U2: appendLine appends newline-terminated lines under logs/', () => {
    const home = tempDir('sio2');
    const io = new FileStateIO(home);

    io.appendLine('run-x.jsonl', '{"a":1}');
    io.appendLine('run-x.jsonl', '{"a":2}');

    expect(readFileSync(join(home, 'logs', 'run-x.jsonl'), 'utf-8')).toBe('{"a":1}\n{"a":2}\n');
  });
});

describe('DirectoryBackupStore', () => {
  it('BAK-U1: stores a copy under the run directory', async () => {
    const root = join(tempDir('bak1'), 'backups');
    const store = new DirectoryBackupStore(root);

    await store.prepare('20260301T120000Z');
    const record = await store.save('20260301T120000Z', '/etc/mkinitcpio.conf', encode('HOOKS=(base udev)\n'));

    const expectedPath = join(root, '20260301T120000Z', 'etc', 'mkinitcpio.conf');
    expect(record).toEqual({
      originalPath: '/etc/mkinitcpio.conf',
      backupPath: expectedPath,
      runId: '20260301T120000Z',
    });
    expect(store.pathFor('20260301T120000Z', '/etc/mkinitcpio.conf')).toBe(expectedPath);
    expect(readFileSync(expectedPath, 'utf-8')).toBe('HOOKS=(base udev)\n');
    expect(statSync(expectedPath).mode & 0o777).toBe(0o600);
  });

  it('BAK-U2: a second save of the same path in a run keeps the first copy', async () => {
    const root = tempDir('bak2');
    const store = new DirectoryBackupStore(root);
    await store.prepare('r1');

    await store.save('r1', '/etc/fstab', encode('original\n'));
    const again = await store.save('r1', '/etc/fstab', encode('already patched\n'));

    expect(readFileSync(again.backupPath, 'utf-8')).toBe('original\n');
  });

  it('BAK-U3: prepare fails with BackupFailed when the root is not a directory', async () => {
    const dir = tempDir('bak3');
    writeFileSync(join(dir, 'backups'), 'not a directory');
    const store = new DirectoryBackupStore(join(dir, 'backups'));

    const err: unknown = await store.prepare('r1').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ReconcileError);
    if (err instanceof ReconcileError) expect(err.code).toBe(ReconcileErrorCode.BackupFailed);
  });

  it('BAK-U4: a run directory left by another run is not reused', async () => {
    const root = tempDir('bak4');
    await new DirectoryBackupStore(root).prepare('r1');

    const err: unknown = await new DirectoryBackupStore(root).prepare('r1').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ReconcileError);
    if (err instanceof ReconcileError) {
      expect(err.code).toBe(ReconcileErrorCode.BackupFailed);
      expect(err.message.startsWith(`cannot create backup directory ${join(root, 'r1')}: EEXIST`)).toBe(true);
    }
  });
});

describe('FileRebootTracker', () => {
  it('RBT-U1: markPending then pendingSince; invalid markers are ignored', async () => {
    const io = new MemoryStateIO();
    const tracker = new FileRebootTracker(io);

    expect(await tracker.pendingSince()).toBeNull();
    await tracker.markPending('20260301T120000Z', '2026-03-01T12:00:05.000Z');
    expect(await tracker.pendingSince()).toBe('2026-03-01T12:00:05.000Z');
    expect(io.readJson(REBOOT_MARKER)).toEqual({ runId: '20260301T120000Z', at: '2026-03-01T12:00:05.000Z' });

    io.writeJson(REBOOT_MARKER, { runId: 7, at: 'yesterday' });
    expect(await tracker.pendingSince()).toBeNull();
  });

  it('RBT-U2: bootedAt reads btime; a missing stat file yields null', async () => {
    const dir = tempDir('rbt2');
    const stat = join(dir, 'stat');
    writeFileSync(stat, 'cpu  1 2 3 4\nbtime 1767225600\nprocesses 42\n');

    expect(await new FileRebootTracker(new MemoryStateIO(), stat).bootedAt()).toBe('2026-01-01T00:00:00.000Z');
    expect(await new FileRebootTracker(new MemoryStateIO(), join(dir, 'absent')).bootedAt()).toBeNull();
    expect(parseBootTime('cpu 1 2 3\n')).toBeNull();
  });
});

describe('newRunId', () => {
  it('RID-U1: formats the UTC time without separators, keeping milliseconds and a suffix', () => {
    expect(newRunId(new Date('2026-03-01T12:00:00.123Z'), '5f0c9a1e')).toBe('20260301T120000.123Z-5f0c9a1e');
    expect(newRunId(new Date('2026-03-01T12:00:00.123Z'))).toMatch(/^20260301T120000\.123Z-[0-9a-f]{8}$/);
  });

  it('RID-U2: invocations in the same millisecond get distinct ids', () => {
    const at = new Date('2026-03-01T12:00:00.100Z');
    expect(newRunId(at)).not.toBe(newRunId(at));
    expect(newRunId(at, 'a')).not.toBe(newRunId(new Date('2026-03-01T12:00:00.900Z'), 'a'));
  });

  it('RID-U3: the backup directory exists only after prepare', async () => {
    const root = tempDir('rid');
    const store = new DirectoryBackupStore(root);
    const runId = newRunId(new Date('2026-03-01T12:00:00.000Z'));

    expect(existsSync(join(root, runId))).toBe(false);
    await store.prepare(runId);
    expect(existsSync(join(root, runId))).toBe(true);
  });
});
