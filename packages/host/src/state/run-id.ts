import { randomBytes } from 'node:crypto';

/**
 * Run identifier: the UTC start time of the invocation in compact ISO 8601
 * basic format with milliseconds, plus a random suffix
 * (e.g. `20260301T120000.123Z-5f0c9a1e`). Names the run's log file and its
 * backup directory, and sorts chronologically as a string. Two invocations
 * started in the same millisecond still get distinct ids.
 */
export function newRunId(date: Date = new Date(), suffix: string = randomBytes(4).toString('hex')): string {
  return `${date.toISOString().replace(/[-:]/g, '')}-${suffix}`;
}
