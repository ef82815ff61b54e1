/**
 * Line diff for operator display.
 *
 * Emits only changed lines: `-old` and `+new`, in file order. Unchanged
 * lines are omitted. Inputs past MAX_CELLS fall back to a whole-file
 * replacement to bound the LCS table.
 */

import { splitLines } from './key-value.js';

const MAX_CELLS = 4_000_000;

export function lineDiff(before: string | null, after: string): string {
  const a = splitLines(before ?? '');
  const b = splitLines(after);

  if (a.length * b.length > MAX_CELLS) {
    return [...a.map((l) => `-${l}`), ...b.map((l) => `+${l}`)].join('\n');
  }

  // lcs[i][j] = LCS length of a[i..] and b[j..]
  const lcs: number[][] = Array.from({ length: a.length + 1 }, () =>
    new Array<number>(b.length + 1).fill(0),
  );
  for (let i = a.length - 1; i >= 0; i--) {
    const row = lcs[i] ?? [];
    const next = lcs[i + 1] ?? [];
    for (let j = b.length - 1; j >= 0; j--) {
      row[j] = a[i] === b[j] ? (next[j + 1] ?? 0) + 1 : Math.max(next[j] ?? 0, row[j + 1] ?? 0);
    }
  }

  const out: string[] = [];
  let i = 0;
  let j = 0;
  while (i < a.length && j < b.length) {
    if (a[i] === b[j]) {
      i++;
      j++;
    } else if ((lcs[i + 1]?.[j] ?? 0) >= (lcs[i]?.[j + 1] ?? 0)) {
      out.push(`-${a[i] ?? ''}`);
      i++;
    } else {
      out.push(`+${b[j] ?? ''}`);
      j++;
    }
  }
  for (; i < a.length; i++) out.push(`-${a[i] ?? ''}`);
  for (; j < b.length; j++) out.push(`+${b[j] ?? ''}`);
  return out.join('\n');
}
