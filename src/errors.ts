/**
 * Error taxonomy for the intake pipeline.
 *
 * Integration errors are caught at each collaborator boundary and turned into
 * a state-machine outcome or a retry. Only ConfigurationError is fatal.
 */

export class IntakeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Mail, storage, directory or database temporarily unreachable. Retryable. */
export class TransientIntegrationError extends IntakeError {
  readonly collaborator: string;

  constructor(collaborator: string, message: string, options?: { cause?: unknown }) {
    super(`${collaborator}: ${message}`, options);
    this.collaborator = collaborator;
  }
}

/** The assessment collaborator did not answer in time. */
export class AssessmentTimeoutError extends IntakeError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Assessment did not answer within ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

/** The assessment collaborator answered with something that is not a verdict. */
export class MalformedVerdictError extends IntakeError {}

/** An archival upload failed; `uploaded` artifacts made it before the failure. */
export class PartialUploadFailure extends IntakeError {
  readonly uploaded: number;
  readonly total: number;

  constructor(uploaded: number, total: number, options?: { cause?: unknown }) {
    super(`Upload failed after ${uploaded} of ${total} artifacts`, options);
    this.uploaded = uploaded;
    this.total = total;
  }
}

/** Invalid configuration or an unreachable dependency at startup. */
export class ConfigurationError extends IntakeError {}

/**
 * Wrap a collaborator failure as transient unless it already belongs to
 * the taxonomy.
 */
export function toTransient(collaborator: string, err: unknown): IntakeError {
  if (err instanceof IntakeError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new TransientIntegrationError(collaborator, message, { cause: err });
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
