/**
 * Pipeline Errors
 *
 * Fatal errors end a document run; non-fatal ones are recorded on the stage
 * result and the run continues.
 */

export abstract class PipelineError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly fatal: boolean,
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Bad input file: unsupported type, too large, missing identifiers.
 */
export class ValidationError extends PipelineError {
  constructor(message: string) {
    super(message, 'VALIDATION_FAILED', true);
  }
}

/**
 * The document could not be opened or read at all.
 */
export class ExtractionError extends PipelineError {
  constructor(
    message: string,
    public readonly originalError?: Error,
  ) {
    super(message, 'EXTRACTION_FAILED', true);
  }
}

export class EmbeddingProviderError extends PipelineError {
  constructor(
    message: string,
    public readonly originalError?: Error,
  ) {
    super(message, 'EMBEDDING_PROVIDER_FAILED', false);
  }
}

export class StorageBackendError extends PipelineError {
  constructor(
    public readonly backend: string,
    message: string,
    public readonly originalError?: Error,
  ) {
    super(`${backend} store failed: ${message}`, 'STORAGE_BACKEND_FAILED', false);
  }
}

export class IdentityError extends PipelineError {
  constructor(message: string) {
    super(message, 'IDENTITY_INVALID', true);
  }
}

export class StageTimeoutError extends PipelineError {
  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`, 'STAGE_TIMEOUT', false);
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
