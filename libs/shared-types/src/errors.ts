/**
 * Base class for application-specific errors
 * Provides a consistent error hierarchy for the feedback analysis system
 */
export abstract class AppError extends Error {
  constructor(
    message: string,
    public readonly originalError?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Transient errors indicate temporary failures that should be retried.
 *
 * Use this for:
 * - Storage backend I/O failures
 * - LLM backend timeouts and unavailability
 * - Connection errors
 *
 * Message queue consumers should requeue messages that fail with TransientError.
 */
export class TransientError extends AppError {
  constructor(message: string, originalError?: Error) {
    super(message, originalError);
  }
}

/**
 * Permanent errors indicate failures that will not succeed on retry.
 *
 * Use this for:
 * - Malformed uploads (CSV structure, encoding)
 * - Resource not found
 * - Duplicate natural keys
 *
 * Message queue consumers should NOT requeue messages that fail with PermanentError.
 */
export class PermanentError extends AppError {
  constructor(message: string, originalError?: Error) {
    super(message, originalError);
  }
}

/**
 * Raised when an uploaded survey file fails structural validation.
 */
export class CsvValidationError extends PermanentError {}

/**
 * Raised when a batch with the same natural key already exists.
 */
export class DuplicateBatchError extends PermanentError {
  constructor(
    public readonly existingId: string,
    originalError?: Error,
  ) {
    super(
      `Survey batch already exists for this lecture (id: ${existingId})`,
      originalError,
    );
  }
}

export class BatchNotFoundError extends PermanentError {
  constructor(public readonly batchId: string) {
    super(`Survey batch with ID ${batchId} not found`);
  }
}

/**
 * Raised by the storage collaborator on an I/O failure.
 */
export class StorageError extends TransientError {}

/**
 * Raised for a storage URI of a foreign scheme or one that escapes the
 * upload directory; loading it again cannot succeed.
 */
export class InvalidStorageUriError extends PermanentError {}

/**
 * Type guard to check if an error is a TransientError
 */
export function isTransientError(error: unknown): error is TransientError {
  return error instanceof TransientError;
}

/**
 * Type guard to check if an error is a PermanentError
 */
export function isPermanentError(error: unknown): error is PermanentError {
  return error instanceof PermanentError;
}

/**
 * Extract a message from anything thrown
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Raised by the job runner after the batch has been marked FAILED.
 * The failure is already recorded, so consumers acknowledge the message.
 */
export class JobFailedError extends PermanentError {
  constructor(
    public readonly batchId: string,
    message: string,
    originalError?: Error,
  ) {
    super(`Job for batch ${batchId} failed: ${message}`, originalError);
  }
}
