/**
 * tuneup host — File-backed Run Log Sink
 *
 * Implements RunLogSink from @tuneup/core by appending one JSONL line per
 * entry to `<home>/logs/run-<runId>.jsonl` via the injected StateIO.
 *
 * Synchronous: the line is on disk before append() returns, so the log is
 * complete up to the last step even if the process is killed mid-run.
 */

import type { RunLogEntry, RunLogSink } from '@tuneup/core';
import type { StateIO } from '../state/state-io.js';
import { ulid } from './ulid.js';

export function runLogFilename(runId: string): string {
  return `run-${runId}.jsonl`;
}

export class FileRunLogSink implements RunLogSink {
  private readonly filename: string;

  constructor(
    private readonly stateIO: StateIO,
    runId: string,
  ) {
    this.filename = runLogFilename(runId);
  }

  append(entry: RunLogEntry): void {
    const line = JSON.stringify({
      eventId: ulid(),
      timestamp: entry.timestamp,
      runId: entry.runId,
      event: entry.event,
      tag: entry.tag,
      subject: entry.subject,
      message: entry.message,
      data: entry.data,
    });
    this.stateIO.appendLine(this.filename, line);
  }
}
