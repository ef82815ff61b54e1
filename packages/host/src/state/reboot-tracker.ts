/**
 * tuneup host — Reboot Tracker
 *
 * Implements RebootTracker from @tuneup/core.
 *
 * When a run applies a change that only takes effect after a reboot, the
 * executor records a marker in `<home>/state/reboot-pending.json`. The
 * verifier compares the marker's timestamp with the current boot time
 * (`btime` in /proc/stat): a marker newer than the boot means the running
 * system has not picked the change up yet.
 */

import { readFile } from 'node:fs/promises';
import type { RebootTracker } from '@tuneup/core';
import type { StateIO } from './state-io.js';
import { isNodeError } from './state-io.js';

export const REBOOT_MARKER = 'reboot-pending.json';

export interface RebootMarker {
  readonly runId: string;
  readonly at: string;
}

function isRebootMarker(value: unknown): value is RebootMarker {
  return (
    typeof value === 'object' &&
    value !== null &&
    'runId' in value &&
    typeof value.runId === 'string' &&
    'at' in value &&
    typeof value.at === 'string' &&
    !Number.isNaN(Date.parse(value.at))
  );
}

/** Boot time from /proc/stat content, as an ISO timestamp. */
export function parseBootTime(procStat: string): string | null {
  const match = /^btime\s+(\d+)\s*$/m.exec(procStat);
  if (match === null || match[1] === undefined) return null;
  return new Date(Number(match[1]) * 1000).toISOString();
}

export class FileRebootTracker implements RebootTracker {
  constructor(
    private readonly stateIO: StateIO,
    private readonly procStatPath: string = '/proc/stat',
  ) {}

  markPending(runId: string, at: string): Promise<void> {
    const marker: RebootMarker = { runId, at };
    this.stateIO.writeJson(REBOOT_MARKER, marker);
    return Promise.resolve();
  }

  pendingSince(): Promise<string | null> {
    const raw = this.stateIO.readJson(REBOOT_MARKER);
    return Promise.resolve(isRebootMarker(raw) ? raw.at : null);
  }

  async bootedAt(): Promise<string | null> {
    try {
      return parseBootTime(await readFile(this.procStatPath, 'utf-8'));
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT') || isNodeError(err, 'EACCES')) return null;
      throw err;
    }
  }
}
