export class InvalidInputError extends Error {
  override readonly name = 'InvalidInputError';

  constructor(message: string, readonly detail: Record<string, unknown> = {}) {
    super(message);
  }
}

/** Raised when an engine or tracker is used after it has been finalized. */
export class InvalidStateError extends Error {
  override readonly name = 'InvalidStateError';
}

export class ImageProcessingError extends Error {
  override readonly name = 'ImageProcessingError';

  constructor(message: string, cause: unknown) {
    super(message, { cause });
  }
}
