/**
 * Caller errors
 *
 * Raised for requests that cannot be recorded at all (unknown ids, rejected
 * uploads). Failures of an accepted query never surface as exceptions; they
 * are persisted as error exchanges instead.
 */

export class SessionNotFoundError extends Error {
  constructor(public readonly sessionId: string) {
    super(`Session not found: ${sessionId}`);
    this.name = 'SessionNotFoundError';
  }
}

export class DatasetNotFoundError extends Error {
  constructor(public readonly datasetId: string) {
    super(`Dataset not found: ${datasetId}`);
    this.name = 'DatasetNotFoundError';
  }
}

/**
 * Upload refused before anything was stored
 */
export class UploadRejectedError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Upload rejected: ${issues.join(' ')}`);
    this.name = 'UploadRejectedError';
  }
}

/**
 * A ready dataset is immutable; re-uploads create a new dataset
 */
export class DatasetImmutableError extends Error {
  constructor(public readonly datasetId: string) {
    super(`Dataset ${datasetId} is ready and can no longer change`);
    this.name = 'DatasetImmutableError';
  }
}

/**
 * Prompt rejected before a query was started (empty or too long)
 */
export class InvalidPromptError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidPromptError';
  }
}
