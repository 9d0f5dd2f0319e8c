/**
 * Base class for every error raised while configuring or resolving a request.
 */
export class RequestDescriptorError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RequestDescriptorError';
  }
}

/**
 * The caller supplied a value that violates a descriptor contract
 * (empty URI, missing `baseurl`, empty body values, ...).
 */
export class InvalidArgumentError extends RequestDescriptorError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'InvalidArgumentError';
  }
}

export class UriResolutionError extends RequestDescriptorError {
  readonly template: string;

  constructor(message: string, template: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'UriResolutionError';
    this.template = template;
  }
}

/**
 * Wraps any failure raised while acquiring a serialization writer or writing
 * the payload. The original error is available as `cause`.
 */
export class SerializationError extends RequestDescriptorError {
  readonly contentType: string;

  constructor(contentType: string, cause: unknown) {
    super(`Could not serialize payload as ${contentType}: ${describeCause(cause)}`, { cause });
    this.name = 'SerializationError';
    this.contentType = contentType;
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
