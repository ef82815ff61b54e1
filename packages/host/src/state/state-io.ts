/**
 * tuneup host — StateIO
 *
 * Home-scoped I/O for the tool's own files: JSON state under
 * `<home>/state/` and JSONL logs under `<home>/logs/`. Everything the tool
 * persists about itself goes through a StateIO; system targets go through
 * SystemFs instead.
 *
 * Two implementations:
 *   - FileStateIO   — durable file I/O under the home directory
 *   - MemoryStateIO — in-memory, for tests
 */

import { appendFileSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

export interface StateIO {
  /**
   * Parsed JSON content of a state file.
   * Returns undefined when the file does not exist or is not valid JSON;
   * callers validate the shape.
   */
  readJson(filename: string): unknown;

  /** Serialize and write a state file, creating `state/` on demand. */
  writeJson(filename: string, value: unknown): void;

  /** Append one line to a log file, creating `logs/` on demand. */
  appendLine(logfilename: string, line: string): void;
}

// ---------------------------------------------------------------------------
// FileStateIO
// ---------------------------------------------------------------------------

/**
 * ENOENT and SyntaxError are recoverable (undefined). Other I/O errors are
 * rethrown; the operator must address them.
 */
export class FileStateIO implements StateIO {
  constructor(private readonly homeDir: string) {}

  readJson(filename: string): unknown {
    const filePath = join(this.homeDir, 'state', filename);
    try {
      return JSON.parse(readFileSync(filePath, 'utf-8'));
    } catch (err: unknown) {
      if (err instanceof SyntaxError || isNodeError(err, 'ENOENT')) return undefined;
      throw err;
    }
  }

  writeJson(filename: string, value: unknown): void {
    const stateDir = join(this.homeDir, 'state');
    mkdirSync(stateDir, { recursive: true });
    writeFileSync(join(stateDir, filename), JSON.stringify(value, null, 2) + '\n', 'utf-8');
  }

  appendLine(logfilename: string, line: string): void {
    const logsDir = join(this.homeDir, 'logs');
    mkdirSync(logsDir, { recursive: true });
    appendFileSync(join(logsDir, logfilename), line + '\n', 'utf-8');
  }
}

// ---------------------------------------------------------------------------
// MemoryStateIO
// ---------------------------------------------------------------------------

/** readJson round-trips through JSON to match FileStateIO serialization. */
export class MemoryStateIO implements StateIO {
  private readonly store = new Map<string, string>();
  private readonly logs = new Map<string, string[]>();

  readJson(filename: string): unknown {
    const raw = this.store.get(filename);
    return raw === undefined ? undefined : JSON.parse(raw);
  }

  writeJson(filename: string, value: unknown): void {
    this.store.set(filename, JSON.stringify(value));
  }

  appendLine(logfilename: string, line: string): void {
    const lines = this.logs.get(logfilename) ?? [];
    lines.push(line);
    this.logs.set(logfilename, lines);
  }

  /** Lines appended to a log file. Test helper; not part of StateIO. */
  readLines(logfilename: string): ReadonlyArray<string> {
    return this.logs.get(logfilename) ?? [];
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Narrow an unknown error to a Node.js errno exception with a specific code. */
export function isNodeError(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}
