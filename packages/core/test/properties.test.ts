/**
 * tuneup core — Reconciler Properties
 *
 * End-to-end properties of install / diff / verify against in-memory
 * collaborators:
 *
 *   PROP-1: install then verify-static reports Pass for every resource
 *   PROP-2: dry-run yields the same plan as a following real run, and leaves
 *           every target byte-identical
 *   PROP-3: a backup exists for a mutated target iff it existed before
 *   PROP-4: btrfs subvolume roots skip fstab editing
 *   PROP-5: unknown package state never plans an install
 *   PROP-6: diff lists only the actions that would change something
 */

import { describe, it, expect } from 'vitest';
import {
  ActionType,
  ReconcileErrorCode,
  StatusTag,
  UnitState,
  VerificationStatus,
  sha256,
} from '../src/index.js';
import { catalogFrom, harness, type Harness } from './fixtures.js';

const LOADER = 'timeout 3\ndefault @saved\n';

const catalog = catalogFrom(
  {
    resources: [
      { id: 'pkg-iwd', kind: 'package-present', target: 'iwd' },
      {
        id: 'loader-conf',
        kind: 'file-copy',
        target: '/boot/loader/loader.conf',
        source: 'boot/loader.conf',
        checks: ['default @saved'],
      },
      { id: 'env-editor', kind: 'env-var', key: 'EDITOR', value: 'nvim' },
      {
        id: 'cmdline-nowatchdog',
        kind: 'kernel-param',
        target: '/etc/sdboot-manage.conf',
        variable: 'LINUX_OPTIONS',
        token: 'nowatchdog',
        triggers: ['bootloader'],
        requiresReboot: true,
      },
      {
        id: 'fstab-root-noatime',
        kind: 'mount-option',
        mountPoint: '/',
        option: 'noatime',
        preconditions: [{ kind: 'not-btrfs-subvolumes' }],
        requiresReboot: true,
      },
      { id: 'enable-fstrim', kind: 'service-enable', target: 'fstrim.timer' },
      { id: 'rm-wpa', kind: 'package-absent', target: 'wpa_supplicant' },
    ],
  },
  { 'boot/loader.conf': LOADER },
);

const FILES = {
  '/boot/loader/loader.conf': 'timeout 0\n',
  '/etc/sdboot-manage.conf': 'LINUX_OPTIONS="quiet"\n',
  '/etc/fstab': 'UUID=1111 / ext4 rw,relatime 0 1\n',
};

function setup(files: Readonly<Record<string, string>> = FILES): Harness {
  const h = harness(catalog, { files, installed: ['wpa_supplicant'] });
  h.services.states.set('fstrim.timer', UnitState.Disabled);
  return h;
}

function hashes(h: Harness): Map<string, string> {
  return new Map([...h.fs.files].map(([path, content]) => [path, sha256(content)]));
}

describe('reconciler properties', () => {
  it('PROP-1: after install every resource verifies Pass statically', async () => {
    const h = setup();
    const report = await h.reconciler.install({ dryRun: false });
    expect(report.halted).toBeUndefined();
    expect(report.outcomes.filter((o) => o.tag === StatusTag.Fail)).toEqual([]);

    const results = await h.reconciler.verify('static');
    expect(results.filter((r) => r.status !== VerificationStatus.Pass)).toEqual([]);
    expect(results.map((r) => r.subjectId)).toContain('loader-conf#default @saved');
    expect(h.fs.text('/etc/fstab')).toBe('UUID=1111 / ext4 rw,noatime 0 1\n');
  });

  it('PROP-2: dry-run plans what a real run would do and changes no byte', async () => {
    const h = setup();
    const before = hashes(h);
    const dry = await h.reconciler.install({ dryRun: true });
    expect(hashes(h)).toEqual(before);
    expect(h.packages.calls).toEqual([]);
    expect(h.services.calls).toEqual([]);
    expect(h.bootloader.runs).toBe(0);
    expect(h.reboot.marked).toEqual([]);

    const live = await h.reconciler.install({ dryRun: false });
    const decisions = (r: typeof dry) => r.outcomes.map((o) => [o.action.resourceId, o.action.type]);
    expect(decisions(live)).toEqual(decisions(dry));
  });

  it('PROP-3: backups are taken for exactly the targets that existed', async () => {
    const h = setup();
    const report = await h.reconciler.install({ dryRun: false });
    expect(report.backups.map((b) => b.originalPath).sort()).toEqual([
      '/boot/loader/loader.conf',
      '/etc/fstab',
      '/etc/sdboot-manage.conf',
    ]);
    const saved = h.backups.saved.get(
      '/home/test/.local/state/tuneup/backups/20260301T120000Z/boot/loader/loader.conf',
    );
    expect(saved === undefined ? null : new TextDecoder().decode(saved)).toBe('timeout 0\n');
  });

  it('PROP-4: a btrfs subvolume root skips the fstab edit', async () => {
    const h = setup({ ...FILES, '/etc/fstab': 'UUID=2222 / btrfs rw,relatime,subvol=/@ 0 0\n' });
    const report = await h.reconciler.install({ dryRun: false });
    const fstab = report.outcomes.find((o) => o.action.resourceId === 'fstab-root-noatime');
    expect(fstab?.action.type).toBe(ActionType.Skip);
    expect(fstab?.message).toBe('btrfs detected');
    expect(fstab?.error).toBe(ReconcileErrorCode.PreconditionUnmet);
    expect(h.fs.text('/etc/fstab')).toBe('UUID=2222 / btrfs rw,relatime,subvol=/@ 0 0\n');
  });

  it('PROP-5: an unavailable package manager never plans an install', async () => {
    const h = setup();
    h.packages.unavailable = true;
    const actions = await h.reconciler.plan();
    const iwd = actions.find((a) => a.resourceId === 'pkg-iwd');
    expect(iwd?.type).toBe(ActionType.Skip);
    expect(iwd?.blocked).toBe(ReconcileErrorCode.StateUnknown);
  });

  it('PROP-6: diff lists only changing actions and mutates nothing', async () => {
    const h = setup({ ...FILES, '/boot/loader/loader.conf': LOADER });
    const diff = await h.reconciler.diff();
    expect(diff.changes.map((a) => a.resourceId)).toEqual([
      'pkg-iwd',
      'env-editor',
      'cmdline-nowatchdog',
      'fstab-root-noatime',
      'enable-fstrim',
      'rm-wpa',
    ]);
    expect(diff.actions).toHaveLength(7);
    expect(h.fs.writes).toEqual([]);
  });
});
