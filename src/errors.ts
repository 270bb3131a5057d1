/**
 * Error taxonomy for the job match service.
 *
 * Corpus errors are fatal at startup. IndexLoadError is recovered by the
 * index itself (it rebuilds) and never reaches a caller. The HTTP layer maps
 * `code` to a status.
 */
export class JobMatchError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'JobMatchError';
    this.code = code;
  }
}

export class CorpusReadError extends JobMatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CORPUS_READ_ERROR', message, options);
    this.name = 'CorpusReadError';
  }
}

export class CorpusFormatError extends JobMatchError {
  constructor(message: string) {
    super('CORPUS_FORMAT_ERROR', message);
    this.name = 'CorpusFormatError';
  }
}

export class IndexNotReadyError extends JobMatchError {
  constructor(message = 'Job index is not ready; call initialize() first') {
    super('INDEX_NOT_READY', message);
    this.name = 'IndexNotReadyError';
  }
}

export class IndexLoadError extends JobMatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INDEX_LOAD_ERROR', message, options);
    this.name = 'IndexLoadError';
  }
}

export class EmbeddingProviderError extends JobMatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('EMBEDDING_PROVIDER_ERROR', message, options);
    this.name = 'EmbeddingProviderError';
  }
}

export class NotFoundError extends JobMatchError {
  constructor(message: string) {
    super('NOT_FOUND', message);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends JobMatchError {
  readonly details?: string[];

  constructor(message: string, details?: string[]) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.details = details;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
