/**
 * tuneup host — System Filesystem Adapter
 *
 * Implements SystemFs from @tuneup/core on node:fs/promises.
 *
 * Reads never need privileges beyond what the operator has; an unreadable
 * target surfaces as a thrown error so the inspector can record it as
 * unknown. Writes are attempted directly first. When that fails for lack of
 * permission and the caller asked for elevation, the content is piped to
 * `sudo install -D ... /dev/stdin <path>` through the CommandRunner, so the
 * only elevated operation is a single well-known command. An existing
 * file keeps its mode and owner; a new one is created 0644.
 */

import type { Stats } from 'node:fs';
import { access, mkdir, readdir, readFile, stat, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { ReconcileError, ReconcileErrorCode } from '@tuneup/core';
import type { CommandRunner, SystemFs } from '@tuneup/core';
import { isNodeError } from '../state/state-io.js';

export class NodeSystemFs implements SystemFs {
  constructor(private readonly runner: CommandRunner) {}

  async read(path: string): Promise<Uint8Array | null> {
    try {
      const buffer = await readFile(path);
      return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT') || isNodeError(err, 'ENOTDIR')) return null;
      throw err;
    }
  }

  async list(path: string): Promise<ReadonlyArray<string> | null> {
    try {
      const entries = await readdir(path);
      return entries.sort();
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT') || isNodeError(err, 'ENOTDIR')) return null;
      throw err;
    }
  }

  async exists(path: string): Promise<boolean> {
    try {
      await access(path);
      return true;
    } catch {
      return false;
    }
  }

  async write(path: string, content: Uint8Array, options: { readonly sudo?: boolean | undefined } = {}): Promise<void> {
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, content);
      return;
    } catch (err: unknown) {
      const denied = isNodeError(err, 'EACCES') || isNodeError(err, 'EPERM');
      if (!denied || options.sudo !== true) throw err;
    }

    let existing: Stats | null;
    try {
      existing = await stat(path);
    } catch (err: unknown) {
      if (!isNodeError(err, 'ENOENT') && !isNodeError(err, 'ENOTDIR')) throw err;
      existing = null;
    }

    const result = await this.runner.run('install', installArgs(path, existing), {
      input: content,
      sudo: true,
    });
    if (result.exitCode !== 0) {
      throw new ReconcileError(
        ReconcileErrorCode.MutationFailed,
        `${result.command} exited ${result.exitCode}: ${result.output.trim()}`,
      );
    }
  }
}

/** Arguments for `install` that write stdin to `path`, keeping an existing file's mode and owner. */
export function installArgs(path: string, existing: Pick<Stats, 'mode' | 'uid' | 'gid'> | null): string[] {
  if (existing === null) return ['-D', '-m', '0644', '/dev/stdin', path];
  const mode = (existing.mode & 0o7777).toString(8).padStart(4, '0');
  return ['-D', '-m', mode, '-o', String(existing.uid), '-g', String(existing.gid), '/dev/stdin', path];
}
