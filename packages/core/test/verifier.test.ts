/**
 * tuneup core — Verifier Tests
 *
 *   VER-S*: static pass (config-file truth and `checks` substrings)
 *   VER-R*: runtime pass (/proc/cmdline, sysfs attributes, unit states)
 */

import { describe, it, expect } from 'vitest';
import {
  UnitState,
  VerificationStatus,
  hasFailures,
  selectedChoice,
  type VerificationResult,
} from '../src/index.js';
import { FakeRebootTracker, catalogFrom, harness } from './fixtures.js';

const LOADER_CONF = 'timeout 3\ndefault @saved\neditor no\n';
const MT_OPTIONS = 'options mt7921e disable_aspm=1\n';
const MEDIATEK = [{ kind: 'pci-vendor', vendorId: '14c3', label: 'MediaTek' }];

const catalog = catalogFrom(
  {
    resources: [
      {
        id: 'loader-conf',
        kind: 'file-copy',
        target: '/boot/loader/loader.conf',
        source: 'boot/loader.conf',
        checks: ['default @saved'],
      },
      {
        id: 'cmdline-nowatchdog',
        kind: 'kernel-param',
        target: '/etc/sdboot-manage.conf',
        variable: 'LINUX_OPTIONS',
        token: 'nowatchdog',
        requiresReboot: true,
      },
      {
        id: 'mt7921e-modprobe',
        kind: 'file-copy',
        target: '/etc/modprobe.d/mt7921e.conf',
        source: 'modprobe/mt7921e.conf',
        preconditions: MEDIATEK,
        requiresReboot: true,
      },
      {
        id: 'mt7921e-cmdline',
        kind: 'kernel-param',
        target: '/etc/sdboot-manage.conf',
        variable: 'LINUX_OPTIONS',
        token: 'mt7921e.disable_aspm=1',
        preconditions: MEDIATEK,
        requiresReboot: true,
      },
      { id: 'fstrim', kind: 'service-enable', target: 'fstrim.timer' },
    ],
    runtimeChecks: [
      { id: 'nvme-scheduler', kind: 'attribute', path: '/sys/block/nvme0n1/queue/scheduler', expected: 'none', match: 'selected' },
      { id: 'swappiness', kind: 'attribute', path: '/proc/sys/vm/swappiness', expected: '10' },
    ],
  },
  { 'boot/loader.conf': LOADER_CONF, 'modprobe/mt7921e.conf': MT_OPTIONS },
);

const MEDIATEK_DEVICE = { '/sys/bus/pci/devices/0000:02:00.0/vendor': '0x14c3\n' };

function byId(results: ReadonlyArray<VerificationResult>): Map<string, VerificationResult> {
  return new Map(results.map((r) => [r.subjectId, r]));
}

describe('Verifier — static pass', () => {
  it('VER-S1: a fully applied system passes, including checks substrings', async () => {
    const h = harness(catalog, {
      files: {
        ...MEDIATEK_DEVICE,
        '/boot/loader/loader.conf': LOADER_CONF,
        '/etc/modprobe.d/mt7921e.conf': MT_OPTIONS,
        '/etc/sdboot-manage.conf': 'LINUX_OPTIONS="quiet nowatchdog mt7921e.disable_aspm=1"\n',
      },
    });
    h.services.states.set('fstrim.timer', UnitState.Enabled);
    const results = await h.reconciler.verify('static');
    const r = byId(results);

    expect(r.get('loader-conf#default @saved')).toEqual({
      subjectId: 'loader-conf#default @saved',
      expected: 'contains "default @saved"',
      actual: 'found',
      status: VerificationStatus.Pass,
    });
    expect(r.get('cmdline-nowatchdog')?.status).toBe(VerificationStatus.Pass);
    expect(r.get('mt7921e-modprobe')?.status).toBe(VerificationStatus.Pass);
  });

  it('VER-S2: dual representations are verified independently (one Pass, one Fail)', async () => {
    const h = harness(catalog, {
      files: {
        ...MEDIATEK_DEVICE,
        '/etc/sdboot-manage.conf': 'LINUX_OPTIONS="quiet mt7921e.disable_aspm=1"\n',
      },
    });
    const r = byId(await h.reconciler.verify('static'));

    expect(r.get('mt7921e-cmdline')).toEqual({
      subjectId: 'mt7921e-cmdline',
      expected: 'mt7921e.disable_aspm=1 in LINUX_OPTIONS',
      actual: 'mt7921e.disable_aspm=1',
      status: VerificationStatus.Pass,
    });
    expect(r.get('mt7921e-modprobe')).toEqual({
      subjectId: 'mt7921e-modprobe',
      expected: '/etc/modprobe.d/mt7921e.conf matches modprobe/mt7921e.conf',
      actual: 'absent',
      status: VerificationStatus.Fail,
    });
  });

  it('VER-S3: resources out of scope are Skipped with the precondition reason', async () => {
    const h = harness(catalog);
    const r = byId(await h.reconciler.verify('static'));
    expect(r.get('mt7921e-modprobe')?.status).toBe(VerificationStatus.Skipped);
    expect(r.get('mt7921e-modprobe')?.actual).toBe('MediaTek presence unknown');
  });

  it('VER-S4: an unreadable target fails with an unknown reading', async () => {
    const h = harness(catalog, { files: { '/boot/loader/loader.conf': LOADER_CONF } });
    h.fs.unreadable.add('/boot/loader/loader.conf');
    const r = byId(await h.reconciler.verify('static'));
    expect(r.get('loader-conf')?.status).toBe(VerificationStatus.Fail);
    expect(r.get('loader-conf')?.actual).toBe(
      "unknown (cannot read /boot/loader/loader.conf: EACCES: permission denied, open '/boot/loader/loader.conf')",
    );
    expect(r.get('loader-conf#default @saved')?.actual).toBe('file missing');
  });

  it('VER-S5: verification never writes', async () => {
    const h = harness(catalog, { files: MEDIATEK_DEVICE });
    const results = await h.reconciler.verify('all');
    expect(hasFailures(results)).toBe(true);
    expect(h.fs.writes).toEqual([]);
    expect(h.backups.prepared).toEqual([]);
  });
});

describe('Verifier — runtime pass', () => {
  it('VER-R1: kernel tokens are read from /proc/cmdline', async () => {
    const h = harness(catalog, { files: { '/proc/cmdline': 'initrd=\\initramfs-linux.img quiet nowatchdog\n' } });
    const r = byId(await h.reconciler.verify('runtime'));
    expect(r.get('cmdline-nowatchdog@runtime')).toEqual({
      subjectId: 'cmdline-nowatchdog@runtime',
      expected: 'nowatchdog on running kernel',
      actual: 'nowatchdog',
      status: VerificationStatus.Pass,
    });
  });

  it('VER-R2: a missing token fails when no reboot is pending', async () => {
    const h = harness(catalog, { files: { '/proc/cmdline': 'quiet\n' } });
    const r = byId(await h.reconciler.verify('runtime'));
    expect(r.get('cmdline-nowatchdog@runtime')?.status).toBe(VerificationStatus.Fail);
    expect(r.get('cmdline-nowatchdog@runtime')?.actual).toBe('absent');
  });

  it('VER-R3: a missing token reports Info while a reboot is pending', async () => {
    const reboot = new FakeRebootTracker('2026-03-01T12:00:00.000Z', '2026-02-27T08:00:00.000Z');
    const h = harness(catalog, { files: { '/proc/cmdline': 'quiet\n' }, reboot });
    const r = byId(await h.reconciler.verify('runtime'));
    expect(r.get('cmdline-nowatchdog@runtime')).toMatchObject({ status: VerificationStatus.Info, detail: 'pending reboot' });
  });

  it('VER-R4: a boot newer than the marker clears the pending state', async () => {
    const reboot = new FakeRebootTracker('2026-03-01T12:00:00.000Z', '2026-03-02T07:30:00.000Z');
    const h = harness(catalog, { files: { '/proc/cmdline': 'quiet\n' }, reboot });
    const r = byId(await h.reconciler.verify('runtime'));
    expect(r.get('cmdline-nowatchdog@runtime')?.status).toBe(VerificationStatus.Fail);
  });

  it('VER-R5: attribute checks compare the selected choice or the trimmed value', async () => {
    const h = harness(catalog, {
      files: {
        '/sys/block/nvme0n1/queue/scheduler': 'mq-deadline kyber [none]\n',
        '/proc/sys/vm/swappiness': '60\n',
      },
    });
    const r = byId(await h.reconciler.verify('runtime'));
    expect(r.get('nvme-scheduler')?.status).toBe(VerificationStatus.Pass);
    expect(r.get('swappiness')).toEqual({
      subjectId: 'swappiness',
      expected: '/proc/sys/vm/swappiness = 10',
      actual: '60',
      status: VerificationStatus.Fail,
    });
  });

  it('VER-R6: enabled units are expected to be active', async () => {
    const h = harness(catalog);
    h.services.active.set('fstrim.timer', 'active');
    const r = byId(await h.reconciler.verify('runtime'));
    expect(r.get('fstrim@runtime')).toEqual({
      subjectId: 'fstrim@runtime',
      expected: 'fstrim.timer active',
      actual: 'active',
      status: VerificationStatus.Pass,
    });
  });

  it('VER-R7: selectedChoice reads the bracketed item', () => {
    expect(selectedChoice('mq-deadline kyber [bfq] none')).toBe('bfq');
    expect(selectedChoice('none')).toBeNull();
  });
});
