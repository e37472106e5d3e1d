// Sync Errors
// Error taxonomy for the fetch → reconcile → apply pipeline

export type SyncStep = 'credential' | 'request' | 'response' | 'csv' | 'batch';

export class SyncError extends Error {
  readonly step: SyncStep;

  constructor(step: SyncStep, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.step = step;
  }
}

/** Raised at client construction when the API key is missing or blank. */
export class InvalidCredentialError extends SyncError {
  constructor(message = 'API key is required') {
    super('credential', message);
  }
}

/**
 * A remote call failed for good: either every retry was used up or the
 * failure was not transient (4xx).
 */
export class RequestFailedError extends SyncError {
  readonly status?: number;
  readonly attempts: number;

  constructor(message: string, options: { cause?: unknown; status?: number; attempts?: number } = {}) {
    super('request', message, { cause: options.cause });
    this.status = options.status;
    this.attempts = options.attempts ?? 1;
  }
}

export class MalformedResponseError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('response', message, options);
  }
}

export class MissingColumnError extends SyncError {
  readonly expected: string[];

  constructor(expected: string[]) {
    super('csv', `No email column found in CSV. Expected columns: ${expected.join(', ')}`);
    this.expected = expected;
  }
}

export class CsvParseError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('csv', `Failed to process CSV: ${message}`, options);
  }
}

export class BatchFailureError extends SyncError {
  readonly batchNumber: number;

  constructor(batchNumber: number, message: string) {
    super('batch', `Batch ${batchNumber} failed: ${message}`);
    this.batchNumber = batchNumber;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
