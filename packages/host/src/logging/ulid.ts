/**
 * tuneup host — ULID Generator
 *
 * 26-character Crockford Base32 identifiers: 10 characters of millisecond
 * timestamp followed by 16 characters of randomness. Used as `eventId` on
 * run log lines so entries sort by creation time.
 */

import { randomBytes } from 'node:crypto';

const ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

function encodeTime(ms: number): string {
  let out = '';
  let rest = ms;
  for (let i = 0; i < 10; i++) {
    out = (ALPHABET[rest % 32] ?? '0') + out;
    rest = Math.floor(rest / 32);
  }
  return out;
}

function encodeRandom(): string {
  // One byte per character; the top three bits of each byte are dropped.
  return [...randomBytes(16)].map((b) => ALPHABET[b & 31] ?? '0').join('');
}

export function ulid(now: number = Date.now()): string {
  return encodeTime(now) + encodeRandom();
}
