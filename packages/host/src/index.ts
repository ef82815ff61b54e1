/**
 * @tuneup/host
 *
 * Side-effectful implementations of the @tuneup/core adapter interfaces:
 * the command runner, the system filesystem, the package/service/rebuild
 * collaborators, run log and backup persistence, and home and catalog
 * resolution. Nothing in @tuneup/core imports from this package.
 */

// Adapters
export { NodeCommandRunner, runningAsRoot } from './adapters/command-runner.js';
export type { NodeCommandRunnerOptions } from './adapters/command-runner.js';
export { REDACTED, displayCommand, redactArgs } from './adapters/redact.js';
export { NodeSystemFs } from './adapters/system-fs.js';
export {
  CommandRebuilder,
  PacmanPackageManager,
  SystemctlServiceManager,
  UdevadmControl,
  createCollaborators,
  parseActiveState,
  parseEnablement,
} from './adapters/collaborators.js';

// Logging
export { FileRunLogSink, runLogFilename } from './logging/file-run-log-sink.js';
export { ulid } from './logging/ulid.js';

// State
export type { StateIO } from './state/state-io.js';
export { FileStateIO, MemoryStateIO, isNodeError } from './state/state-io.js';
export { DirectoryBackupStore } from './state/backup-store.js';
export type { RebootMarker } from './state/reboot-tracker.js';
export { FileRebootTracker, REBOOT_MARKER, parseBootTime } from './state/reboot-tracker.js';
export { newRunId } from './state/run-id.js';

// Configuration
export type { ResolveCatalogOptions, ResolveHomeOptions } from './home.js';
export { backupsDir, resolveCatalogDir, resolveHome } from './home.js';
export { CATALOG_FILE, CatalogInvalidError, SOURCES_DIR, directorySourceLoader, loadCatalog } from './catalog-loader.js';
