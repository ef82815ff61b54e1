/**
 * tuneup diff — show what install would change
 *
 * Plans without executing and prints every Create, Update and Remove with
 * its line diff. Informational: exits 0 whatever it finds.
 */

import { Command } from 'commander'
import { withRuntime, type GlobalOptions, type Runtime, type RuntimeOverrides } from '../runtime.js'
import { printDiff, summarizeDiff } from '../output/report.js'
import { t } from '../output/theme.js'

export async function runDiff(rt: Runtime): Promise<number> {
  rt.log.record('run-start', 'diff', undefined, { home: rt.home, catalog: rt.catalogDir })
  const diff = await rt.reconciler.diff()

  printDiff(diff, rt.write)
  const summary = summarizeDiff(diff)
  rt.write('')
  rt.write(diff.changes.length === 0 ? t.green(summary) : t.amber(summary))

  rt.log.record('run-end', summary, undefined, {
    changes: diff.changes.map((a) => ({ resourceId: a.resourceId, type: a.type, reason: a.reason })),
  })
  return 0
}

export function diff(global: GlobalOptions, overrides: RuntimeOverrides = {}): Promise<number> {
  return withRuntime(global, {}, overrides, runDiff)
}

export const diffCommand = new Command('diff')
  .description('Show the changes install would make, without making them')
  .action(async (_options: unknown, command: Command) => {
    process.exitCode = await diff(command.optsWithGlobals<GlobalOptions>())
  })
