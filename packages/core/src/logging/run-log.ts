/**
 * tuneup core — Run Log
 *
 * The RunLog is the append-only record of every inspected, decided and
 * applied step of one invocation. It is a debugging artifact for the
 * operator and is never read back by the program.
 *
 * RunLogger fans each entry out to two places:
 *   - a RunLogSink (the JSONL file in @tuneup/host, or memory in tests)
 *   - a StatusReporter (the console in @tuneup/cli)
 *
 * Status lines go to both; step records (inspect/decide/command) only to
 * the sink, so the console stays at one line per resource outcome.
 */

import type { StatusTag } from '../types/run.js';
import type { CommandResult } from '../adapters/index.js';

export type RunLogEvent =
  | 'run-start'
  | 'facts'
  | 'inspect'
  | 'decide'
  | 'backup'
  | 'command'
  | 'status'
  | 'detail'
  | 'verify'
  | 'run-end';

export interface RunLogEntry {
  readonly timestamp: string;
  readonly runId: string;
  readonly event: RunLogEvent;
  readonly message: string;
  readonly tag?: StatusTag | undefined;
  readonly subject?: string | undefined;
  readonly data?: Readonly<Record<string, unknown>> | undefined;
}

/** Persists run log entries. Must not silently drop entries. */
export interface RunLogSink {
  append(entry: RunLogEntry): void;
}

/** Operator-facing output. */
export interface StatusReporter {
  status(tag: StatusTag, subject: string, message: string): void;
  /** Multi-line text shown inline: diffs, command output. */
  detail(text: string): void;
}

export type Clock = () => string;

export const systemClock: Clock = () => new Date().toISOString();

export class RunLogger {
  constructor(
    readonly runId: string,
    private readonly sink: RunLogSink,
    private readonly reporter: StatusReporter,
    private readonly clock: Clock = systemClock,
  ) {}

  /** One-line outcome: printed and logged. */
  status(tag: StatusTag, subject: string, message: string): void {
    this.reporter.status(tag, subject, message);
    this.write({ event: 'status', tag, subject, message });
  }

  /** Inline block (diff, command output): printed and logged. */
  detail(subject: string, text: string): void {
    if (text.trim() === '') return;
    this.reporter.detail(text);
    this.write({ event: 'detail', subject, message: text });
  }

  /** Log-only step record. */
  record(
    event: RunLogEvent,
    message: string,
    subject?: string,
    data?: Readonly<Record<string, unknown>>,
  ): void {
    this.write({ event, message, subject, data });
  }

  /** Log-only command record; the result arrives already redacted. */
  command(result: CommandResult): void {
    this.write({
      event: 'command',
      message: result.command,
      data: { exitCode: result.exitCode, output: result.output },
    });
  }

  private write(entry: Omit<RunLogEntry, 'timestamp' | 'runId'>): void {
    this.sink.append({ timestamp: this.clock(), runId: this.runId, ...entry });
  }
}

/** Sink that keeps entries in memory. */
export class MemoryRunLogSink implements RunLogSink {
  readonly entries: RunLogEntry[] = [];

  append(entry: RunLogEntry): void {
    this.entries.push(entry);
  }
}

/** Reporter that prints nothing. */
export const silentReporter: StatusReporter = {
  status: () => undefined,
  detail: () => undefined,
};
