/**
 * Error hierarchy shared by every zentity package.
 *
 * Each concrete error carries a stable `code`, an optional structured
 * context (entity type, key, statement kind...) and an optional cause.
 */

export interface DomainErrorOptions {
  context?: Record<string, unknown> | undefined;
  cause?: unknown;
}

/**
 * Base class for typed zentity errors
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;

  readonly timestamp: string;
  readonly context?: Record<string, unknown> | undefined;

  constructor(message: string, options?: DomainErrorOptions) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.timestamp = new Date().toISOString();
    this.context = options?.context;
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      code: this.code,
      context: this.context,
      message: this.message,
      name: this.name,
      timestamp: this.timestamp,
    };
  }
}

/**
 * Raised when input fails validation before it reaches storage
 */
export class ValidationError extends DomainError {
  readonly code = 'VALIDATION_ERROR';

  constructor(
    message: string,
    public readonly violations: readonly string[],
    options?: DomainErrorOptions
  ) {
    super(message, options);
  }
}
