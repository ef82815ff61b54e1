/**
 * tuneup verify / verify-static / verify-runtime
 *
 *   verify-static    the catalog's configured truth (files, units, packages)
 *   verify-runtime   the running system (kernel command line, unit activity,
 *                    sysfs attributes)
 *   verify           both
 *
 * Read-only. Exits 1 when any check fails unless --report-only is given.
 */

import { Command } from 'commander'
import { hasFailures, type VerifyPass } from '@tuneup/core'
import { withRuntime, type GlobalOptions, type Runtime, type RuntimeOverrides } from '../runtime.js'
import { colorVerificationSummary, countStatuses, summarizeVerification } from '../output/report.js'

export interface VerifyOptions {
  readonly reportOnly?: boolean | undefined
}

export async function runVerify(rt: Runtime, pass: VerifyPass, options: VerifyOptions): Promise<number> {
  rt.log.record('run-start', `verify (${pass})`, undefined, { home: rt.home, catalog: rt.catalogDir })
  const results = await rt.reconciler.verify(pass)

  const summary = summarizeVerification(pass, results)
  rt.write('')
  rt.write(colorVerificationSummary(results, summary))

  const exitCode = hasFailures(results) && options.reportOnly !== true ? 1 : 0
  rt.log.record('run-end', summary, undefined, { ...countStatuses(results), exitCode })
  return exitCode
}

export function verify(
  global: GlobalOptions,
  pass: VerifyPass,
  options: VerifyOptions,
  overrides: RuntimeOverrides = {},
): Promise<number> {
  return withRuntime(global, {}, overrides, (rt) => runVerify(rt, pass, options))
}

function verifyCommandFor(name: string, pass: VerifyPass, description: string): Command {
  return new Command(name)
    .description(description)
    .option('--report-only', 'Report failures without a non-zero exit status')
    .action(async (_options: VerifyOptions, command: Command) => {
      const opts = command.optsWithGlobals<GlobalOptions & VerifyOptions>()
      process.exitCode = await verify(opts, pass, opts)
    })
}

export const verifyCommand = verifyCommandFor('verify', 'all', 'Verify configured and running state')
export const verifyStaticCommand = verifyCommandFor(
  'verify-static',
  'static',
  'Verify files, units and packages match the catalog',
)
export const verifyRuntimeCommand = verifyCommandFor(
  'verify-runtime',
  'runtime',
  'Verify the running kernel, units and device attributes',
)
