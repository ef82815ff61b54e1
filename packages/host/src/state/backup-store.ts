/**
 * tuneup host — Directory Backup Store
 *
 * Implements BackupStore from @tuneup/core. Each run owns
 * `<home>/backups/<runId>/`, under which a target is stored at its own
 * absolute path:
 *
 *   /etc/mkinitcpio.conf  →  <home>/backups/20260301T120000.123Z-5f0c9a1e/etc/mkinitcpio.conf
 *
 * Copies are created exclusively (flag 'wx'), so the first copy of a path in
 * a run is the one kept: it holds the state from before the run touched it.
 * Backups may contain configuration the operator considers private and are
 * written owner-only.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { ReconcileError, ReconcileErrorCode, errorMessage } from '@tuneup/core';
import type { BackupRecord, BackupStore } from '@tuneup/core';
import { isNodeError } from './state-io.js';

export class DirectoryBackupStore implements BackupStore {
  constructor(private readonly root: string) {}

  /** Creates the run's directory; a directory left by another run is never reused. */
  async prepare(runId: string): Promise<void> {
    const dir = join(this.root, runId);
    try {
      await mkdir(this.root, { recursive: true, mode: 0o700 });
      await mkdir(dir, { mode: 0o700 });
    } catch (err: unknown) {
      throw new ReconcileError(
        ReconcileErrorCode.BackupFailed,
        `cannot create backup directory ${dir}: ${errorMessage(err)}`,
      );
    }
  }

  pathFor(runId: string, originalPath: string): string {
    return join(this.root, runId, originalPath);
  }

  async save(runId: string, originalPath: string, content: Uint8Array): Promise<BackupRecord> {
    const backupPath = this.pathFor(runId, originalPath);
    try {
      await mkdir(dirname(backupPath), { recursive: true, mode: 0o700 });
      await writeFile(backupPath, content, { flag: 'wx', mode: 0o600 });
    } catch (err: unknown) {
      if (!isNodeError(err, 'EEXIST')) {
        throw new ReconcileError(
          ReconcileErrorCode.BackupFailed,
          `cannot back up ${originalPath} to ${backupPath}: ${errorMessage(err)}`,
        );
      }
    }
    return { originalPath, backupPath, runId };
  }
}
