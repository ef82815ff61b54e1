/**
 * tuneup host — Command Redaction
 *
 * Produces the display form of a command line for logs and console output.
 * Arguments that carry secrets are masked:
 *
 *   --password=hunter2      → --password=***
 *   --passphrase hunter2    → --passphrase ***
 *   token=abc               → token=***
 *
 * A name counts as sensitive when its last dash- or underscore-separated
 * segment is one of SENSITIVE_NAMES, so `--api-key` is masked and
 * `--keyring` is not.
 */

export const REDACTED = '***';

const SENSITIVE_NAMES: ReadonlySet<string> = new Set([
  'password',
  'passwd',
  'passphrase',
  'secret',
  'token',
  'key',
]);

function isSensitiveName(name: string): boolean {
  const last = name.replace(/^-+/, '').toLowerCase().split(/[-_]/).pop() ?? '';
  return SENSITIVE_NAMES.has(last);
}

export function redactArgs(args: ReadonlyArray<string>): string[] {
  const out: string[] = [];
  let maskNext = false;
  for (const arg of args) {
    if (maskNext) {
      out.push(REDACTED);
      maskNext = false;
      continue;
    }
    const eq = arg.indexOf('=');
    if (eq > 0 && isSensitiveName(arg.slice(0, eq))) {
      out.push(`${arg.slice(0, eq + 1)}${REDACTED}`);
    } else {
      out.push(arg);
      maskNext = arg.startsWith('-') && eq === -1 && isSensitiveName(arg);
    }
  }
  return out;
}

export function displayCommand(command: string, args: ReadonlyArray<string>): string {
  return [command, ...redactArgs(args)].join(' ');
}
