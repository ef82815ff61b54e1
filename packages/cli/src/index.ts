/**
 * @tuneup/cli — programmatic entry.
 *
 * The `tuneup` executable lives in src/bin/tuneup.ts; this module exposes
 * the same commands as functions for embedding and tests.
 */

export { program } from './commands/index.js'
export { install, installExitCode, runInstall } from './commands/install.js'
export type { InstallOptions } from './commands/install.js'
export { diff, runDiff } from './commands/diff.js'
export { verify, runVerify } from './commands/verify.js'
export type { VerifyOptions } from './commands/verify.js'
export { BUNDLED_CATALOG, EXIT_UNUSABLE, buildRuntime, guard, withRuntime } from './runtime.js'
export type { GlobalOptions, Runtime, RuntimeOptions, RuntimeOverrides } from './runtime.js'
export { ConsoleReporter, consoleWriter } from './output/report.js'
export type { Writer } from './output/report.js'
export { AutoAcceptPrompter, ReadlinePrompter } from './prompt.js'
