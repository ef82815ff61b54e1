/**
 * `KEY=value` line predicates, shared by TextPatch and EnvVar resources.
 *
 * Only the first line starting with `KEY=` (leading whitespace allowed)
 * counts. Commented lines never match. The value is compared exactly as
 * written after the first '=', quotes included.
 */

export interface KeyLine {
  readonly index: number;
  readonly line: string;
  readonly value: string;
}

export function findKeyLine(text: string, key: string): KeyLine | null {
  const lines = splitLines(text);
  const prefix = `${key}=`;
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? '';
    if (line.trimStart().startsWith(prefix)) {
      return { index: i, line, value: line.trimStart().slice(prefix.length) };
    }
  }
  return null;
}

/** Set `key` to `value`, replacing its first line or appending one. */
export function renderKeyValue(text: string | null, key: string, value: string): string {
  const desiredLine = `${key}=${value}`;
  if (text === null || text === '') return desiredLine + '\n';

  const found = findKeyLine(text, key);
  const lines = splitLines(text);
  if (found === null) {
    lines.push(desiredLine);
  } else {
    // leading whitespace, and a byte-order mark on the first line, stay in place
    lines[found.index] = found.line.slice(0, found.line.length - found.line.trimStart().length) + desiredLine;
  }
  return joinLines(lines);
}

// ---------------------------------------------------------------------------
// Line helpers (shared by the other matching modules)
// ---------------------------------------------------------------------------

/** Split into lines without the trailing empty element a final newline creates. */
export function splitLines(text: string): string[] {
  if (text === '') return [];
  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

/** Join lines with a terminating newline. */
export function joinLines(lines: ReadonlyArray<string>): string {
  return lines.length === 0 ? '' : lines.join('\n') + '\n';
}
