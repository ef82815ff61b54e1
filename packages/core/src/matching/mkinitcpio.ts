/**
 * mkinitcpio HOOKS=(...) predicates and /etc/crypttab parsing.
 */

import { joinLines, splitLines } from './key-value.js';

const HOOKS_LINE = /^\s*HOOKS=\((.*)\)\s*$/;

export type HooksLookup =
  | { readonly found: true; readonly index: number; readonly hooks: ReadonlyArray<string> }
  | { readonly found: false; readonly unsafe: string };

export function findHooks(text: string): HooksLookup {
  const lines = splitLines(text);
  const hits: Array<{ index: number; hooks: string[] }> = [];
  for (let i = 0; i < lines.length; i++) {
    const m = HOOKS_LINE.exec(lines[i] ?? '');
    if (m === null) continue;
    hits.push({ index: i, hooks: (m[1] ?? '').trim().split(/\s+/).filter((h) => h !== '') });
  }

  const hit = hits[0];
  if (hit === undefined) return { found: false, unsafe: 'no HOOKS=(...) line' };
  if (hits.length > 1) return { found: false, unsafe: `${hits.length} HOOKS=(...) lines` };
  return { found: true, index: hit.index, hooks: hit.hooks };
}

export function hooksWith(hooks: ReadonlyArray<string>, hook: string, before: string | undefined): string[] {
  if (hooks.includes(hook)) return [...hooks];
  const at = before === undefined ? -1 : hooks.indexOf(before);
  if (at === -1) return [...hooks, hook];
  return [...hooks.slice(0, at), hook, ...hooks.slice(at)];
}

/**
 * Why `hook` cannot join these HOOKS, or null. The `sd-*` hooks run only in
 * a systemd-based initramfs, and `sd-encrypt` must not sit beside the
 * busybox `encrypt` hook that already unlocks the root device.
 */
export function hookConflict(hooks: ReadonlyArray<string>, hook: string): string | null {
  if (hooks.includes(hook) || !hook.startsWith('sd-')) return null;
  if (hook === 'sd-encrypt' && hooks.includes('encrypt')) {
    return 'HOOKS already has the busybox encrypt hook';
  }
  if (!hooks.includes('systemd')) return `HOOKS is not systemd-based; ${hook} needs the systemd hook`;
  return null;
}

/** Insert `hook`; text is returned unchanged when HOOKS cannot be located or the hook conflicts. */
export function renderHook(text: string, hook: string, before: string | undefined): string {
  const lookup = findHooks(text);
  if (!lookup.found || hookConflict(lookup.hooks, hook) !== null) return text;
  const lines = splitLines(text);
  lines[lookup.index] = `HOOKS=(${hooksWith(lookup.hooks, hook, before).join(' ')})`;
  return joinLines(lines);
}

// ---------------------------------------------------------------------------
// crypttab
// ---------------------------------------------------------------------------

/** At least one non-blank, non-comment line. */
export function hasActiveCrypttabEntry(text: string): boolean {
  return splitLines(text).some((line) => {
    const trimmed = line.trim();
    return trimmed !== '' && !trimmed.startsWith('#');
  });
}
