/**
 * Kernel command-line token predicates.
 *
 * The same predicate serves both sources of truth:
 *   - the configured option string (static), e.g. LINUX_OPTIONS in
 *     /etc/sdboot-manage.conf, or a whole /etc/kernel/cmdline file
 *   - the active command line (runtime), /proc/cmdline
 *
 * A token's key is the part before the first '='; `nowatchdog` is its own
 * key. A token is "present" when any token with its key is on the line and
 * "matches" when the exact token is.
 */

import { joinLines, splitLines } from './key-value.js';

export interface TokenState {
  readonly present: boolean;
  readonly matches: boolean;
  /** Tokens sharing the desired token's key, in order. */
  readonly current: ReadonlyArray<string>;
}

export function splitTokens(cmdline: string): string[] {
  return cmdline.trim().split(/\s+/).filter((t) => t !== '');
}

export function tokenKey(token: string): string {
  const eq = token.indexOf('=');
  return eq === -1 ? token : token.slice(0, eq);
}

export function tokenState(tokens: ReadonlyArray<string>, desired: string): TokenState {
  const key = tokenKey(desired);
  const current = tokens.filter((t) => tokenKey(t) === key);
  return {
    present: current.length > 0,
    matches: current.includes(desired),
    current,
  };
}

/** Replace every token sharing the key with `desired`, or append it. */
export function withToken(tokens: ReadonlyArray<string>, desired: string): string[] {
  const key = tokenKey(desired);
  const result: string[] = [];
  let placed = false;
  for (const token of tokens) {
    if (tokenKey(token) !== key) {
      result.push(token);
    } else if (!placed) {
      result.push(desired);
      placed = true;
    }
  }
  if (!placed) result.push(desired);
  return result;
}

// ---------------------------------------------------------------------------
// Configured option strings
// ---------------------------------------------------------------------------

export interface OptionString {
  readonly index: number;
  /** Leading whitespace and an optional `export `, kept on rewrite. */
  readonly prefix: string;
  readonly value: string;
  readonly quote: '"' | "'" | '';
  /** Whitespace and a trailing `# comment` after the value, kept on rewrite. */
  readonly suffix: string;
}

export type OptionLookup =
  | { readonly found: true; readonly option: OptionString }
  | { readonly found: false; readonly unsafe?: string | undefined };

const TRAILER = /^(\s+#.*|\s*)$/;
const EXPANSION = /[\\$`]/;

/**
 * Locate the uncommented `VARIABLE=...` line of a shell-style config file.
 *
 * Only a plain word, a single-quoted string, or a double-quoted string
 * without expansions is understood, optionally followed by a comment.
 * Anything else, and a variable assigned on more than one line, is unsafe.
 */
export function findOptionString(text: string, variable: string): OptionLookup {
  const lines = splitLines(text);
  const pattern = new RegExp(`^(\\s*(?:export\\s+)?)${escapeRegExp(variable)}=(.*)$`);
  const hits: Array<{ index: number; prefix: string; raw: string }> = [];
  for (let i = 0; i < lines.length; i++) {
    const m = pattern.exec(lines[i] ?? '');
    if (m !== null) hits.push({ index: i, prefix: m[1] ?? '', raw: m[2] ?? '' });
  }

  const hit = hits[0];
  if (hit === undefined) return { found: false };
  if (hits.length > 1) {
    return { found: false, unsafe: `${variable} is assigned on ${hits.length} lines` };
  }
  const parsed = parseShellValue(hit.raw);
  if (parsed === null) {
    return { found: false, unsafe: `cannot parse ${variable} on line ${hit.index + 1}` };
  }
  return { found: true, option: { index: hit.index, prefix: hit.prefix, ...parsed } };
}

function parseShellValue(raw: string): Pick<OptionString, 'value' | 'quote' | 'suffix'> | null {
  const first = raw.charAt(0);
  if (first === '"' || first === "'") {
    const close = raw.indexOf(first, 1);
    if (close === -1) return null;
    const value = raw.slice(1, close);
    if (first === '"' && EXPANSION.test(value)) return null;
    const suffix = raw.slice(close + 1);
    return TRAILER.test(suffix) ? { value, quote: first, suffix } : null;
  }
  const m = /^([^\s"'\\$`;#]*)(.*)$/.exec(raw);
  const value = m?.[1] ?? '';
  const suffix = m?.[2] ?? raw;
  return TRAILER.test(suffix) ? { value, quote: '', suffix } : null;
}

export type TokensLookup =
  | { readonly found: true; readonly tokens: string[] }
  | { readonly found: false; readonly unsafe?: string | undefined };

/**
 * The configured tokens of a file: the variable's value when one is named,
 * the whole content otherwise.
 */
export function configuredTokens(text: string, variable: string | undefined): TokensLookup {
  if (variable === undefined) return { found: true, tokens: splitTokens(text) };
  const lookup = findOptionString(text, variable);
  if (!lookup.found) return lookup;
  return { found: true, tokens: splitTokens(lookup.option.value) };
}

/**
 * Render the file with `desired` set in its configured command line. The
 * text is returned unchanged when the variable's line is unsafe to edit.
 */
export function renderKernelParam(
  text: string | null,
  desired: string,
  variable: string | undefined,
): string {
  if (variable === undefined) {
    return withToken(splitTokens(text ?? ''), desired).join(' ') + '\n';
  }

  const lines = splitLines(text ?? '');
  const lookup: OptionLookup = text === null ? { found: false } : findOptionString(text, variable);
  if (!lookup.found) {
    if (lookup.unsafe !== undefined) return text ?? '';
    lines.push(`${variable}="${desired}"`);
    return joinLines(lines);
  }

  const { option } = lookup;
  const quote = option.quote === '' ? '"' : option.quote;
  const value = withToken(splitTokens(option.value), desired).join(' ');
  lines[option.index] = `${option.prefix}${variable}=${quote}${value}${quote}${option.suffix}`;
  return joinLines(lines);
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
