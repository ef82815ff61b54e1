/**
 * runtime.ts — wires one invocation together.
 *
 * Resolves the home and catalog directories, loads the catalog, allocates
 * the run id and run log, and builds a Reconciler over the host adapters.
 * Tests replace any adapter through RuntimeOverrides; nothing else in the
 * CLI constructs an adapter.
 */

import { fileURLToPath } from 'node:url'
import {
  Reconciler,
  ReconcileError,
  RunLogger,
  systemClock,
  type Clock,
  type Collaborators,
  type CommandRunner,
  type Prompter,
  type RebootTracker,
  type StatusReporter,
  type SystemFs,
  type BackupStore,
} from '@tuneup/core'
import {
  CatalogInvalidError,
  DirectoryBackupStore,
  FileRebootTracker,
  FileRunLogSink,
  FileStateIO,
  NodeCommandRunner,
  NodeSystemFs,
  backupsDir,
  createCollaborators,
  loadCatalog,
  newRunId,
  resolveCatalogDir,
  resolveHome,
} from '@tuneup/host'
import { ConsoleReporter, consoleWriter, type Writer } from './output/report.js'
import { t } from './output/theme.js'
import { AutoAcceptPrompter, ReadlinePrompter } from './prompt.js'

export const BUNDLED_CATALOG = fileURLToPath(new URL('../catalog', import.meta.url))

/** Options every subcommand inherits from the program. */
export interface GlobalOptions {
  readonly home?: string | undefined
  readonly catalog?: string | undefined
}

export interface RuntimeOverrides {
  readonly env?: NodeJS.ProcessEnv | undefined
  readonly runId?: string | undefined
  readonly clock?: Clock | undefined
  readonly write?: Writer | undefined
  readonly runner?: CommandRunner | undefined
  readonly fs?: SystemFs | undefined
  readonly collaborators?: Collaborators | undefined
  readonly backups?: BackupStore | undefined
  readonly reboot?: RebootTracker | undefined
  readonly prompter?: Prompter | undefined
  readonly reporter?: StatusReporter | undefined
}

export interface Runtime {
  readonly runId: string
  readonly home: string
  readonly catalogDir: string
  readonly log: RunLogger
  readonly reconciler: Reconciler
  readonly write: Writer
}

export interface RuntimeOptions {
  /** Accept every confirmation (--all). */
  readonly autoAccept?: boolean | undefined
}

export function buildRuntime(
  global: GlobalOptions,
  options: RuntimeOptions = {},
  overrides: RuntimeOverrides = {},
): Runtime {
  const env = overrides.env ?? process.env
  const write = overrides.write ?? consoleWriter
  const home = resolveHome({ home: global.home, env })
  const catalogDir = resolveCatalogDir({ catalog: global.catalog, bundled: BUNDLED_CATALOG, env })
  const catalog = loadCatalog(catalogDir)

  const runId = overrides.runId ?? newRunId()
  const stateIO = new FileStateIO(home)
  const clock = overrides.clock ?? systemClock
  const log = new RunLogger(
    runId,
    new FileRunLogSink(stateIO, runId),
    overrides.reporter ?? new ConsoleReporter(write),
    clock,
  )

  const runner = overrides.runner ?? new NodeCommandRunner({ env })
  const prompter =
    overrides.prompter ?? (options.autoAccept === true ? new AutoAcceptPrompter(log) : new ReadlinePrompter())

  const reconciler = new Reconciler({
    catalog,
    fs: overrides.fs ?? new NodeSystemFs(runner),
    runner,
    collaborators: overrides.collaborators ?? createCollaborators(runner),
    backups: overrides.backups ?? new DirectoryBackupStore(backupsDir(home)),
    reboot: overrides.reboot ?? new FileRebootTracker(stateIO),
    prompter,
    log,
    clock,
  })

  return { runId, home, catalogDir, log, reconciler, write }
}

/** Exit code for a run that could not start. */
export const EXIT_UNUSABLE = 2

/**
 * Run a command body, turning the errors that mean "nothing could run"
 * (unusable catalog, unreadable home) into exit code 2 with a message.
 */
export async function guard(write: Writer, body: () => Promise<number>): Promise<number> {
  try {
    return await body()
  } catch (err: unknown) {
    if (err instanceof CatalogInvalidError) {
      write(t.red(`error: ${err.message}`))
      for (const e of err.errors) write(`  ${e.context === undefined ? '' : `${e.context}: `}${e.message}`)
      return EXIT_UNUSABLE
    }
    if (err instanceof ReconcileError) {
      write(t.red(`error: ${err.message}`))
      return EXIT_UNUSABLE
    }
    throw err
  }
}

/** Build the runtime and run `body` under guard(). */
export function withRuntime(
  global: GlobalOptions,
  options: RuntimeOptions,
  overrides: RuntimeOverrides,
  body: (rt: Runtime) => Promise<number>,
): Promise<number> {
  return guard(overrides.write ?? consoleWriter, () => body(buildRuntime(global, options, overrides)))
}
