/**
 * tuneup host — Home and Catalog Directory Resolution
 *
 * The home directory holds everything the tool writes about itself:
 *
 *   <home>/
 *     logs/run-<runId>.jsonl
 *     backups/<runId>/<original absolute path>
 *     state/reboot-pending.json
 *
 * Precedence (highest to lowest):
 *   1. Explicit `home` option (the --home CLI flag)
 *   2. TUNEUP_HOME environment variable
 *   3. $XDG_STATE_HOME/tuneup
 *   4. Default: ~/.local/state/tuneup
 *
 * The catalog directory resolves the same way: --catalog, then
 * TUNEUP_CATALOG, then the catalog bundled with the CLI.
 */

import { mkdirSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';

export interface ResolveHomeOptions {
  readonly home?: string | undefined;
  readonly env?: NodeJS.ProcessEnv | undefined;
}

function nonEmpty(value: string | undefined): value is string {
  return typeof value === 'string' && value !== '';
}

/**
 * Resolve the home directory and create it if it does not exist.
 *
 * @returns absolute path of the resolved home
 */
export function resolveHome(opts: ResolveHomeOptions = {}): string {
  const env = opts.env ?? process.env;
  let home: string;

  if (nonEmpty(opts.home)) {
    home = opts.home;
  } else if (nonEmpty(env['TUNEUP_HOME'])) {
    home = env['TUNEUP_HOME'];
  } else if (nonEmpty(env['XDG_STATE_HOME'])) {
    home = join(env['XDG_STATE_HOME'], 'tuneup');
  } else {
    home = join(homedir(), '.local', 'state', 'tuneup');
  }

  home = resolve(home);
  mkdirSync(home, { recursive: true });
  return home;
}

export interface ResolveCatalogOptions {
  readonly catalog?: string | undefined;
  /** Directory of the catalog shipped with the CLI. */
  readonly bundled: string;
  readonly env?: NodeJS.ProcessEnv | undefined;
}

export function resolveCatalogDir(opts: ResolveCatalogOptions): string {
  const env = opts.env ?? process.env;
  if (nonEmpty(opts.catalog)) return resolve(opts.catalog);
  if (nonEmpty(env['TUNEUP_CATALOG'])) return resolve(env['TUNEUP_CATALOG']);
  return resolve(opts.bundled);
}

/** Per-run backup root inside a home directory. */
export function backupsDir(home: string): string {
  return join(home, 'backups');
}
