/**
 * Error types raised by the recommender core
 */

/**
 * Base error, carries a stable machine-readable code
 */
export class RecommenderError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'RecommenderError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): { error: string; message: string; details?: unknown } {
    return {
      error: this.code,
      message: this.message,
      ...(this.details !== undefined && { details: this.details }),
    };
  }
}

/**
 * Text-to-vector conversion failed while building a store
 */
export class EncodingError extends RecommenderError {
  constructor(
    message: string,
    public readonly itemId?: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'ENCODING_ERROR', itemId !== undefined ? { itemId } : undefined);
    this.name = 'EncodingError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class NotFoundError extends RecommenderError {
  constructor(resource: string, identifier?: string | number) {
    const message =
      identifier !== undefined
        ? `${resource} with identifier '${identifier}' not found`
        : `${resource} not found`;
    super(message, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

/**
 * Two vectors of different length were compared or stored together.
 * Usually means the catalog was encoded with a different model.
 */
export class DimensionMismatchError extends RecommenderError {
  constructor(
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(`Vector dimension mismatch: ${expected} vs ${actual}`, 'DIMENSION_MISMATCH', {
      expected,
      actual,
    });
    this.name = 'DimensionMismatchError';
  }
}

export class ValidationError extends RecommenderError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class ConfigurationError extends RecommenderError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}
