/**
 * Base class for domain errors
 */
export abstract class DomainError extends Error {
  constructor(
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = this.constructor.name;
    // restore the prototype chain broken by extending Error
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Not found
 */
export class VideoNotFoundError extends DomainError {
  constructor(message: string) {
    super(message, 'VIDEO_NOT_FOUND');
  }
}

export class MediaRecordNotFoundError extends DomainError {
  constructor(message: string) {
    super(message, 'MEDIA_RECORD_NOT_FOUND');
  }
}

export class UploadNotStartedError extends DomainError {
  constructor(message: string) {
    super(message, 'UPLOAD_NOT_STARTED');
  }
}

/**
 * Status transitions
 */
export class InvalidStatusTransitionError extends DomainError {
  constructor(message: string) {
    super(message, 'INVALID_STATUS_TRANSITION');
  }
}

export class UploadInProgressConflictError extends DomainError {
  constructor(message: string) {
    super(message, 'UPLOAD_IN_PROGRESS_CONFLICT');
  }
}

/**
 * Validation
 */
export class InvalidOperationError extends DomainError {
  constructor(message: string) {
    super(message, 'INVALID_OPERATION');
  }
}

export class InvalidChunkError extends DomainError {
  constructor(message: string) {
    super(message, 'INVALID_CHUNK');
  }
}

export class ChunkTooLargeError extends DomainError {
  constructor(
    message: string,
    public readonly maxBytes: number
  ) {
    super(message, 'CHUNK_TOO_LARGE');
  }
}

export class IncompleteChunkSetError extends DomainError {
  constructor(
    message: string,
    public readonly missingIndexes: number[]
  ) {
    super(message, 'INCOMPLETE_CHUNK_SET');
  }
}

/**
 * Storage
 */
export class StorageAccessError extends DomainError {
  constructor(message: string) {
    super(message, 'STORAGE_ACCESS_ERROR');
  }
}
