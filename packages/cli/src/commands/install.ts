/**
 * tuneup install — reconcile the system with the catalog (default command)
 *
 * Plans every resource, then applies the changes one at a time with backups.
 * Resources that carry a confirmation ask first unless --all is given.
 *
 *   --dry-run   plan, diff and report what would run; change nothing
 *   --all       accept every confirmation
 *
 * Exit codes: 0 all OK, 1 any FAIL, 2 the run was stopped (declined LUKS
 * hook, backup directory not writable) or the catalog is unusable.
 */

import { Command } from 'commander'
import { countFailures, type ExecutionReport } from '@tuneup/core'
import { withRuntime, EXIT_UNUSABLE, type GlobalOptions, type Runtime, type RuntimeOverrides } from '../runtime.js'
import { countTags, summarizeExecution } from '../output/report.js'
import { t } from '../output/theme.js'

export interface InstallOptions {
  readonly all?: boolean | undefined
  readonly dryRun?: boolean | undefined
}

export function installExitCode(report: ExecutionReport): number {
  if (report.halted !== undefined) return EXIT_UNUSABLE
  return countFailures(report) > 0 ? 1 : 0
}

export async function runInstall(rt: Runtime, options: InstallOptions): Promise<number> {
  const dryRun = options.dryRun === true
  rt.log.record('run-start', dryRun ? 'install (dry run)' : 'install', undefined, {
    home: rt.home,
    catalog: rt.catalogDir,
    all: options.all === true,
  })

  const report = await rt.reconciler.install({ dryRun })
  const lines = summarizeExecution(report)
  const color = report.halted !== undefined || countFailures(report) > 0 ? t.red : t.green

  rt.write('')
  lines.forEach((line, i) => rt.write(i === 0 ? color(line) : line))

  const exitCode = installExitCode(report)
  rt.log.record('run-end', lines.join('\n'), undefined, { ...countTags(report), exitCode })
  return exitCode
}

export async function install(
  global: GlobalOptions,
  options: InstallOptions,
  overrides: RuntimeOverrides = {},
): Promise<number> {
  return withRuntime(global, { autoAccept: options.all }, overrides, (rt) => runInstall(rt, options))
}

export const installCommand = new Command('install')
  .description('Reconcile the system with the catalog, backing up every file it changes')
  .option('--all', 'Accept every confirmation prompt')
  .option('--dry-run', 'Show what would change without changing anything')
  .action(async (_options: InstallOptions, command: Command) => {
    const opts = command.optsWithGlobals<GlobalOptions & InstallOptions>()
    process.exitCode = await install(opts, opts)
  })
