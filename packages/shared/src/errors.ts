/**
 * Raised when the caller hands the core something it cannot interpret:
 * a bundle of the wrong shape, an entry with no identifier, or a
 * non-Encounter resource where an encounter is required.
 */
export class MalformedInputError extends Error {
  constructor(
    message: string,
    public resourceType?: string,
    public resourceId?: string,
  ) {
    super(message);
    this.name = 'MalformedInputError';
  }
}

/**
 * Raised when the note generation service fails (transport, auth, quota,
 * or a response without text).
 */
export class ServiceError extends Error {
  constructor(
    message: string,
    public status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ServiceError';
  }
}
