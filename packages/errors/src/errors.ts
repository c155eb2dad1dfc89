import { AppError } from "./app-error.js";

interface DomainErrorOptions {
  requestId?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class ValidationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(message = "Validation error", fields: Record<string, string>, options?: DomainErrorOptions) {
    super({
      message,
      statusCode: 400,
      code: "VALIDATION_ERROR",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
    this.fields = fields;
  }
}

export class ExternalServiceError extends AppError {
  public readonly service: string;

  constructor(message = "External service error", service: string, options?: DomainErrorOptions) {
    super({
      message,
      statusCode: 502,
      code: "EXTERNAL_SERVICE_ERROR",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
    this.service = service;
  }
}

/**
 * A document could not be searched, fetched, downloaded or text-extracted.
 */
export class SourceUnavailableError extends AppError {
  public readonly documentId?: string;

  constructor(message = "Source unavailable", documentId?: string, options?: DomainErrorOptions) {
    super({
      message,
      statusCode: 502,
      code: "SOURCE_UNAVAILABLE",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
    this.documentId = documentId;
  }
}

/**
 * Ingestion finished without a single usable chunk.
 */
export class EmptyCorpusError extends AppError {
  constructor(message = "Ingestion produced no usable chunks", options?: DomainErrorOptions) {
    super({
      message,
      statusCode: 422,
      code: "EMPTY_CORPUS",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
  }
}

/**
 * A question was asked with no built index, or an index without chunks.
 */
export class RetrievalEmptyError extends AppError {
  constructor(message = "No documents have been indexed yet", options?: DomainErrorOptions) {
    super({
      message,
      statusCode: 409,
      code: "RETRIEVAL_EMPTY",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
  }
}

export class GenerationFailureError extends AppError {
  public readonly model: string;

  constructor(message = "Generation failed", model: string, options?: DomainErrorOptions) {
    super({
      message,
      statusCode: 502,
      code: "GENERATION_FAILURE",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
    this.model = model;
  }
}

export class TimeoutError extends AppError {
  public readonly operation: string;
  public readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number, options?: DomainErrorOptions) {
    super({
      message: `${operation} timed out after ${String(timeoutMs)}ms`,
      statusCode: 504,
      code: "TIMEOUT",
      requestId: options?.requestId,
      details: options?.details,
      cause: options?.cause,
    });
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Render any thrown value as a single-line reason for logs and reports.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
