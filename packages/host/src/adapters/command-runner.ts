/**
 * tuneup host — Command Runner
 *
 * Implements CommandRunner from @tuneup/core on node:child_process.spawn.
 * The single boundary every external command crosses:
 *
 *   - stdout and stderr are captured into one combined output, in arrival order
 *   - the result is structured; the runner never rejects
 *   - a binary that cannot be spawned yields exitCode 127 (126 for other
 *     spawn errors) with the error text as output
 *   - the display command is redacted before it leaves this module
 *   - `sudo: true` prefixes `sudo` unless already running as root
 */

import { spawn } from 'node:child_process';
import type { CommandOptions, CommandResult, CommandRunner } from '@tuneup/core';
import { displayCommand } from './redact.js';
import { isNodeError } from '../state/state-io.js';

export interface NodeCommandRunnerOptions {
  /** Defaults to the effective uid being 0. */
  readonly isRoot?: boolean | undefined;
  readonly env?: NodeJS.ProcessEnv | undefined;
}

export function runningAsRoot(): boolean {
  return typeof process.geteuid === 'function' && process.geteuid() === 0;
}

export class NodeCommandRunner implements CommandRunner {
  private readonly isRoot: boolean;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: NodeCommandRunnerOptions = {}) {
    this.isRoot = options.isRoot ?? runningAsRoot();
    this.env = options.env ?? process.env;
  }

  run(command: string, args: ReadonlyArray<string>, options: CommandOptions = {}): Promise<CommandResult> {
    const elevate = options.sudo === true && !this.isRoot;
    const file = elevate ? 'sudo' : command;
    const argv = elevate ? [command, ...args] : [...args];
    const display = displayCommand(file, argv);

    return new Promise((resolve) => {
      let settled = false;
      const finish = (result: CommandResult): void => {
        if (settled) return;
        settled = true;
        resolve(result);
      };

      const child = spawn(file, argv, {
        env: this.env,
        stdio: [options.input === undefined ? 'ignore' : 'pipe', 'pipe', 'pipe'],
      });

      const chunks: Buffer[] = [];
      child.stdout?.on('data', (chunk: Buffer) => { chunks.push(chunk); });
      child.stderr?.on('data', (chunk: Buffer) => { chunks.push(chunk); });

      child.on('error', (err: Error) => {
        finish({
          command: display,
          exitCode: isNodeError(err, 'ENOENT') ? 127 : 126,
          output: err.message,
        });
      });

      child.on('close', (exitCode: number | null, signal: NodeJS.Signals | null) => {
        const output = Buffer.concat(chunks).toString('utf-8');
        finish({
          command: display,
          exitCode: exitCode ?? 1,
          output: signal === null ? output : `${output}killed by ${signal}\n`,
        });
      });

      if (options.input !== undefined && child.stdin !== null) {
        child.stdin.on('error', (err: Error) => {
          // The child exited before reading all input; its exit status reports the failure.
          chunks.push(Buffer.from(`stdin: ${err.message}\n`));
        });
        child.stdin.end(options.input);
      }
    });
  }
}
