/**
 * Custom error classes and error handling utilities
 */

import { randomUUID } from 'node:crypto';

/**
 * Base error class for all custom errors
 */
export class BaseError extends Error {
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;
  public readonly id: string;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context;
    this.id = randomUUID();
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends BaseError {
  constructor(
    message: string,
    public readonly missingFields?: string[]
  ) {
    super(`Configuration error: ${message}`, {
      missingFields
    });
  }
}

/**
 * Error thrown when an upstream HTTP call answers with a non-2xx status
 */
export class HttpRequestError extends BaseError {
  constructor(
    public readonly url: string,
    public readonly status: number,
    public readonly statusText: string,
    public readonly method: string,
    public readonly body?: string
  ) {
    super(`HTTP ${method} ${url} failed with ${status} ${statusText}`.trim(), {
      url,
      status,
      statusText,
      method,
      body
    });
  }
}

/**
 * Error thrown when the uploads playlist cannot be fully paged
 */
export class EnumerationError extends BaseError {
  constructor(
    message: string,
    public readonly playlistId: string,
    public readonly originalError?: unknown
  ) {
    super(`Enumeration of ${playlistId} failed: ${message}`, {
      playlistId,
      cause: describeError(originalError)
    });
  }
}

/**
 * Error thrown when a detail batch cannot be resolved
 */
export class DetailFetchError extends BaseError {
  constructor(
    message: string,
    public readonly batchIndex: number,
    public readonly originalError?: unknown
  ) {
    super(`Detail fetch failed for batch ${batchIndex}: ${message}`, {
      batchIndex,
      cause: describeError(originalError)
    });
  }
}

/**
 * Error thrown when a duration token does not match P[nD][T[nH][nM][nS]]
 */
export class MalformedDurationError extends BaseError {
  constructor(public readonly token: string) {
    super(`Malformed duration token: ${JSON.stringify(token)}`, { token });
  }
}

/**
 * Error thrown by the analytics (metrics) API client
 */
export class AnalyticsError extends BaseError {
  constructor(
    message: string,
    public readonly originalError?: unknown
  ) {
    super(`Analytics error: ${message}`, { cause: describeError(originalError) });
  }
}

/**
 * Error thrown when a partition replace fails inside the store
 */
export class TableWriteError extends BaseError {
  constructor(
    public readonly table: string,
    public readonly snapshotDate: string,
    public readonly originalError?: unknown
  ) {
    super(`Failed to replace ${table} partition ${snapshotDate}: ${describeError(originalError)}`, {
      table,
      snapshotDate
    });
  }
}

/**
 * Fatal error raised by the orchestrator, tagged with the stage that failed
 */
export class PipelineStageError extends BaseError {
  constructor(
    public readonly stage: string,
    public readonly originalError: unknown
  ) {
    super(`Stage ${stage} failed: ${describeError(originalError)}`, { stage });
  }
}

/**
 * Aggregate multiple errors
 */
export class AggregateError extends BaseError {
  constructor(
    message: string,
    public readonly errors: Error[]
  ) {
    super(message, {
      errorCount: errors.length,
      errors: errors.map((e) => ({
        name: e.name,
        message: e.message
      }))
    });
  }
}

/**
 * Normalize anything thrown into an Error instance
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === 'string' ? value : JSON.stringify(value));
}

/**
 * One-line reason for an error, suitable for `{ id, reason }` entries
 */
export function describeError(value: unknown): string {
  if (value === undefined || value === null) {
    return 'unknown error';
  }
  if (value instanceof Error) {
    return value.message;
  }
  if (typeof value === 'string') {
    return value;
  }
  return JSON.stringify(value);
}
