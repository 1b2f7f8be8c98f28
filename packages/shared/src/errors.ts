/**
 * Pipeline Error Classification
 *
 * Separates failures the caller must see (bad input, unconvertible upload)
 * from failures the extraction path absorbs (upstream capability outages,
 * corrupt cache entries).
 */

export type PipelineErrorCode =
  | 'invalid_input'
  | 'document_conversion_failed'
  | 'upstream_unavailable'
  | 'cache_corruption';

/**
 * Base class for all pipeline errors
 */
export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;
  abstract readonly httpStatus: number;

  constructor(message: string, public readonly originalError?: unknown) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Malformed parameter list or unreadable upload. Surfaced to the caller, never retried.
 */
export class InvalidInputError extends PipelineError {
  readonly code = 'invalid_input';
  readonly httpStatus = 400;

  constructor(message: string, public readonly details: string[] = [], originalError?: unknown) {
    super(`Invalid input: ${message}`, originalError);
  }
}

/**
 * The document conversion capability could not turn bytes into a parsed document.
 * Without a parsed document the pipeline has no input, so this is a hard error.
 */
export class DocumentConversionError extends PipelineError {
  readonly code = 'document_conversion_failed';
  readonly httpStatus = 502;

  constructor(message: string, originalError?: unknown) {
    super(`Document conversion failed: ${message}`, originalError);
  }
}

/**
 * An embedding or LLM call failed. Degrades only the affected parameter.
 */
export class UpstreamUnavailableError extends PipelineError {
  readonly code = 'upstream_unavailable';
  readonly httpStatus = 503;

  constructor(
    public readonly capability: 'embedding' | 'llm' | 'document_conversion',
    message: string,
    originalError?: unknown
  ) {
    super(`${capability} unavailable: ${message}`, originalError);
  }
}

/**
 * A stored parse-cache entry could not be trusted. The cache invalidates the entry itself.
 */
export class CacheCorruptionError extends PipelineError {
  readonly code = 'cache_corruption';
  readonly httpStatus = 500;

  constructor(public readonly fileHash: string, message: string, originalError?: unknown) {
    super(`Cache entry ${fileHash.slice(0, 8)} corrupt: ${message}`, originalError);
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
