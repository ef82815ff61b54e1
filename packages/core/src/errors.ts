/**
 * tuneup core — Error Taxonomy
 *
 * Resource-local failures are carried as outcomes, not thrown past the
 * Executor loop. ReconcileError is thrown only by adapters and by the
 * catalog loader; the Executor converts it into an outcome or, for the two
 * hard-stop codes, into a halted report.
 */

export enum ReconcileErrorCode {
  /** A precondition does not hold; the resource is skipped. */
  PreconditionUnmet = 'PreconditionUnmet',
  /** The desired-state input itself is absent from the catalog. */
  SourceMissing = 'SourceMissing',
  /** A backup could not be taken. Fatal when it is the run's backup directory. */
  BackupFailed = 'BackupFailed',
  /** The external mutation failed. */
  MutationFailed = 'MutationFailed',
  /** Verification found a value other than the expected one. */
  VerificationMismatch = 'VerificationMismatch',
  /** Automatic mutation would be unsafe; the operator must act. */
  UnsafeSystemState = 'UnsafeSystemState',
  /** The current state could not be read; nothing is changed. */
  StateUnknown = 'StateUnknown',
}

export class ReconcileError extends Error {
  readonly code: ReconcileErrorCode;
  readonly resourceId: string | undefined;

  constructor(code: ReconcileErrorCode, message: string, resourceId?: string) {
    super(message);
    this.name = 'ReconcileError';
    this.code = code;
    this.resourceId = resourceId;
  }
}

/** Render any thrown value as a one-line message. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
