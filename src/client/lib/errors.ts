import { JsonValue } from './json';

/**
 * Base class for every error raised by the Solr client
 */
export class SolrError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SolrError';
    Object.setPrototypeOf(this, SolrError.prototype);
  }
}

/**
 * No response was received: connection refused, DNS failure, timeout or abort.
 * The server may or may not have applied the request.
 */
export class TransportError extends SolrError {
  readonly code?: string;
  readonly cause?: unknown;

  constructor(message: string, code?: string, cause?: unknown) {
    super(message);
    this.name = 'TransportError';
    this.code = code;
    this.cause = cause;
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

/**
 * The response body is not JSON or lacks a section the caller depends on.
 */
export class DecodeError extends SolrError {
  readonly body?: string;

  constructor(message: string, body?: string) {
    super(message);
    this.name = 'DecodeError';
    this.body = body;
    Object.setPrototypeOf(this, DecodeError.prototype);
  }
}

/**
 * The response envelope reported a failure. `message` and `code` are the server's own.
 */
export class ServerError extends SolrError {
  readonly code: number;
  readonly httpStatus: number;
  readonly details?: JsonValue;

  constructor(message: string, code: number, httpStatus: number, details?: JsonValue) {
    super(message);
    this.name = 'ServerError';
    this.code = code;
    this.httpStatus = httpStatus;
    this.details = details;
    Object.setPrototypeOf(this, ServerError.prototype);
  }
}

/**
 * One entry of a rejected schema batch
 */
export interface SchemaOperationFailure {
  /** Position of the matching operation in the submitted batch, when it could be identified */
  index?: number;
  operation?: JsonValue;
  errorMessages: string[];
}

export class SchemaUpdateError extends ServerError {
  readonly failures: SchemaOperationFailure[];

  constructor(source: ServerError, failures: SchemaOperationFailure[]) {
    super(source.message, source.code, source.httpStatus, source.details);
    this.name = 'SchemaUpdateError';
    this.failures = failures;
    Object.setPrototypeOf(this, SchemaUpdateError.prototype);
  }
}

/**
 * Programmer error detected before any request is sent
 */
export class UsageError extends SolrError {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
    Object.setPrototypeOf(this, UsageError.prototype);
  }
}

/**
 * Type guard to check if a value is a SolrError.
 */
export function isSolrError(value: unknown): value is SolrError {
  return value instanceof SolrError;
}
