export type AffirmationErrorCode =
  | 'STORAGE'
  | 'EMPTY_COLLECTION'
  | 'COLLECTION_NOT_FOUND'
  | 'EMPTY_INPUT'
  | 'INVALID_ID'
  | 'INVALID_KIND'
  | 'IMPORT_FILE';

/**
 * Base class for every failure the CLI reports to the user.
 */
export class AffirmationError extends Error {
  constructor(
    message: string,
    public readonly code: AffirmationErrorCode,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = 'AffirmationError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * The data file exists but cannot be read or does not hold a storage document.
 */
export class StorageError extends AffirmationError {
  constructor(message: string, originalError?: unknown) {
    super(message, 'STORAGE', originalError);
    this.name = 'StorageError';
  }
}

export class EmptyCollectionError extends AffirmationError {
  constructor(public readonly collectionId: string) {
    super(`Collection "${collectionId}" has no lines`, 'EMPTY_COLLECTION');
    this.name = 'EmptyCollectionError';
  }
}

export class CollectionNotFoundError extends AffirmationError {
  constructor(public readonly collectionId: string | null) {
    super(
      collectionId === null ? 'No collections available' : `Unknown collection "${collectionId}"`,
      'COLLECTION_NOT_FOUND'
    );
    this.name = 'CollectionNotFoundError';
  }
}

export class EmptyInputError extends AffirmationError {
  constructor() {
    super('No lines found in the imported text', 'EMPTY_INPUT');
    this.name = 'EmptyInputError';
  }
}

export class InvalidIdError extends AffirmationError {
  constructor(public readonly collectionId: string) {
    super(
      collectionId.length === 0
        ? 'Collection id must not be empty'
        : `Collection id "${collectionId}" must not contain whitespace`,
      'INVALID_ID'
    );
    this.name = 'InvalidIdError';
  }
}

export class InvalidKindError extends AffirmationError {
  constructor(public readonly kind: string) {
    super(`Unknown collection kind "${kind}" (expected affirmations, song_lyrics or poem)`, 'INVALID_KIND');
    this.name = 'InvalidKindError';
  }
}

export class ImportFileError extends AffirmationError {
  constructor(public readonly filePath: string, originalError?: unknown) {
    super(`Cannot read import file ${filePath}`, 'IMPORT_FILE', originalError);
    this.name = 'ImportFileError';
  }
}

export function getErrorMessage(error: unknown, fallback: string): string {
  if (error instanceof Error && error.message.trim()) {
    return error.message;
  }
  return fallback;
}
