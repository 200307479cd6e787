/**
 * Error thrown when caller input is rejected before anything is persisted
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown for archive uploads with an extension we cannot open
 */
export class UnsupportedArchiveError extends ValidationError {
  constructor(public readonly filename: string) {
    super('Unsupported archive format. Use .zip, .tar, .tar.gz or .tgz');
    this.name = 'UnsupportedArchiveError';
  }
}

/**
 * Error thrown when the images in an archive add up to more than the allowed size
 */
export class ArchiveLimitError extends ValidationError {
  constructor(
    message: string,
    public readonly limitBytes: number
  ) {
    super(message);
    this.name = 'ArchiveLimitError';
  }
}

export class NotFoundError extends Error {
  constructor(
    public readonly entity: 'gallery' | 'album' | 'picture' | 'object',
    public readonly id: string
  ) {
    super(`${entity} ${id} not found`);
    this.name = 'NotFoundError';
  }
}

/**
 * Error thrown when the acting user may not perform an operation on a container
 */
export class PermissionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PermissionError';
  }
}

/**
 * Error thrown when a tag name has no usable characters left after normalization
 */
export class TagNameError extends Error {
  constructor(public readonly rawName: string) {
    super(`Tag name "${rawName}" is empty after normalization`);
    this.name = 'TagNameError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Error thrown when the object storage backend fails a read or write
 */
export class StorageError extends Error {
  constructor(
    message: string,
    public readonly key: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'StorageError';
  }
}
