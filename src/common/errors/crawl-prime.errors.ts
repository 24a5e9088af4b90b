/**
 * CrawlPrime error taxonomy.
 * Partial failures are not exceptions: they travel as SubResourceFailure values
 * inside reports and job records.
 */

export class CrawlPrimeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
  ) {
    super(message);
    this.name = 'CrawlPrimeError';
    Object.setPrototypeOf(this, CrawlPrimeError.prototype);
  }
}

/**
 * Malformed input (unparseable URL, empty query). Raised before any
 * collaborator is invoked.
 */
export class ValidationError extends CrawlPrimeError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * A required pipeline stage could not be reached or failed outright.
 * `failed` holds the sub-resource failures collected before the stage gave up.
 */
export class CollaboratorUnavailableError extends CrawlPrimeError {
  constructor(
    public readonly stage: string,
    public readonly reason: string,
    public readonly originalError?: Error,
    public readonly failed: readonly string[] = [],
  ) {
    super(
      `${stage} collaborator unavailable: ${reason}`,
      'COLLABORATOR_UNAVAILABLE',
      503,
    );
    this.name = 'CollaboratorUnavailableError';
    Object.setPrototypeOf(this, CollaboratorUnavailableError.prototype);
  }

  withFailures(failed: readonly string[]): CollaboratorUnavailableError {
    return new CollaboratorUnavailableError(
      this.stage,
      this.reason,
      this.originalError,
      failed,
    );
  }
}

export class JobNotFoundError extends CrawlPrimeError {
  constructor(jobId: string) {
    super(`Job '${jobId}' not found`, 'JOB_NOT_FOUND', 404);
    this.name = 'JobNotFoundError';
    Object.setPrototypeOf(this, JobNotFoundError.prototype);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wraps anything a required stage throws. Errors that already belong to the
 * taxonomy pass through unchanged.
 */
export function toCollaboratorError(
  stage: string,
  error: unknown,
): CrawlPrimeError {
  if (error instanceof CrawlPrimeError) {
    return error;
  }
  return new CollaboratorUnavailableError(
    stage,
    errorMessage(error),
    error instanceof Error ? error : undefined,
  );
}
