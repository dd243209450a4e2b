/**
 * Error codes understood by bookmark sync clients.
 */
export type SyncErrorCode =
  | 'MissingParameter'
  | 'InvalidArgument'
  | 'NotAllowed'
  | 'InternalError'
  | 'RequestEntityTooLarge'
  | 'NotFound';

/**
 * Base class for failures raised by the sync core and the API layer.
 */
export class SyncError extends Error {
  /**
   * @param code - Wire error code sent back to the client.
   * @param statusCode - HTTP status used when the error reaches a response.
   * @param originalError - Underlying error, if any.
   */
  constructor(
    message: string,
    public readonly code: SyncErrorCode,
    public readonly statusCode: number = 409,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = 'SyncError';
  }
}

/**
 * Missing or malformed request body.
 */
export class ValidationError extends SyncError {
  constructor(message: string, originalError?: unknown) {
    super(message, 'MissingParameter', 409, originalError);
    this.name = 'ValidationError';
  }
}

/**
 * The requested sync identifier has no complete record.
 */
export class NotFoundError extends SyncError {
  constructor(public readonly syncId: string) {
    super('Invalid ID', 'InvalidArgument', 409);
    this.name = 'NotFoundError';
  }
}

/**
 * Identifier generation kept colliding with stored identifiers.
 * Points at a broken random source or store, never at the client.
 */
export class AllocationError extends SyncError {
  constructor(public readonly attempts: number) {
    super(`Unable to allocate a unique sync ID after ${attempts} attempts`, 'InternalError', 409);
    this.name = 'AllocationError';
  }
}

/**
 * The storage engine failed to complete a transaction.
 */
export class StorageError extends SyncError {
  constructor(message: string, originalError?: unknown) {
    super(message, 'InternalError', 409, originalError);
    this.name = 'StorageError';
  }
}

/**
 * New sync registrations are currently switched off.
 */
export class NotAcceptingError extends SyncError {
  constructor() {
    super('Not accepting new sync users', 'NotAllowed', 409);
    this.name = 'NotAcceptingError';
  }
}
