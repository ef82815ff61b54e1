/**
 * fstab predicates.
 *
 * Editing is refused (reported as unsafe) whenever the entry for a mount
 * point cannot be identified without guessing:
 *   - more than one entry for the mount point
 *   - a line naming the mount point with fewer than 4 or more than 6 fields
 *   - octal escapes (\040) in the entry
 *
 * Lines other than the edited one are never rewritten, and the edited line
 * keeps its original whitespace.
 */

import { joinLines, splitLines } from './key-value.js';

export interface FstabEntry {
  readonly index: number;
  readonly spec: string;
  readonly mountPoint: string;
  readonly type: string;
  readonly options: ReadonlyArray<string>;
}

export type MountLookup =
  | { readonly found: true; readonly entry: FstabEntry }
  | { readonly found: false; readonly unsafe?: string | undefined };

/** Mount options that cannot coexist with the key. */
const CONFLICTING_OPTIONS: Readonly<Record<string, ReadonlyArray<string>>> = {
  noatime: ['atime', 'relatime', 'strictatime'],
  relatime: ['atime', 'noatime', 'strictatime'],
  strictatime: ['atime', 'noatime', 'relatime'],
};

function fieldsOf(line: string): string[] {
  return line.trim().split(/\s+/).filter((f) => f !== '');
}

function isEntryLine(line: string): boolean {
  const trimmed = line.trim();
  return trimmed !== '' && !trimmed.startsWith('#');
}

export function findMount(text: string, mountPoint: string): MountLookup {
  const lines = splitLines(text);
  const matches: FstabEntry[] = [];

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? '';
    if (!isEntryLine(line)) continue;
    const fields = fieldsOf(line);
    if (fields[1] !== mountPoint) continue;

    if (fields.length < 4 || fields.length > 6) {
      return { found: false, unsafe: `unexpected fstab syntax on line ${i + 1}` };
    }
    if (line.includes('\\')) {
      return { found: false, unsafe: `escaped characters in fstab entry on line ${i + 1}` };
    }
    matches.push({
      index: i,
      spec: fields[0] ?? '',
      mountPoint,
      type: fields[2] ?? '',
      options: (fields[3] ?? '').split(','),
    });
  }

  if (matches.length > 1) {
    return { found: false, unsafe: `${matches.length} fstab entries for ${mountPoint}` };
  }
  const entry = matches[0];
  return entry === undefined ? { found: false } : { found: true, entry };
}

/** The root entry mounts a btrfs subvolume (`subvol=` or `subvolid=`). */
export function isBtrfsSubvolumeRoot(text: string): boolean {
  const lookup = findMount(text, '/');
  if (!lookup.found) return false;
  return lookup.entry.options.some((o) => o.startsWith('subvol=') || o.startsWith('subvolid='));
}

export function optionsWith(options: ReadonlyArray<string>, option: string): string[] {
  const conflicts = new Set(CONFLICTING_OPTIONS[option] ?? []);
  const kept = options.filter((o) => o !== option && !conflicts.has(o));
  return [...kept, option];
}

/**
 * Add `option` to the mount point's entry. Returns the text unchanged when
 * the entry cannot be found or is unsafe to edit.
 */
export function renderMountOption(text: string, mountPoint: string, option: string): string {
  const lookup = findMount(text, mountPoint);
  if (!lookup.found) return text;

  const lines = splitLines(text);
  const line = lines[lookup.entry.index] ?? '';
  const options = optionsWith(lookup.entry.options, option).join(',');

  // Alternating field / whitespace parts; the 4th field is the options column.
  const parts = line.split(/(\s+)/);
  let field = 0;
  for (let i = 0; i < parts.length; i++) {
    const part = parts[i] ?? '';
    if (part === '' || /^\s+$/.test(part)) continue;
    if (field === 3) {
      parts[i] = options;
      break;
    }
    field++;
  }
  lines[lookup.entry.index] = parts.join('');
  return joinLines(lines);
}
