// src/services/errors.ts
// Error types raised by the intake report pipeline

/**
 * Base class. `statusCode` is the HTTP status the global error handler answers with.
 */
export class IntakeReportError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500
  ) {
    super(message);
    this.name = 'IntakeReportError';
  }
}

/**
 * Malformed identity, query parameter or record. Client-side error.
 */
export class ValidationError extends IntakeReportError {
  constructor(
    message: string,
    public readonly details: string[] = []
  ) {
    super(message, 400);
    this.name = 'ValidationError';
  }
}

/**
 * Nothing to draw. Raised only where an empty chart would be meaningless
 * (growth charts); intake windows render zero-filled buckets instead.
 */
export class DataUnavailable extends IntakeReportError {
  constructor(message: string) {
    super(message, 404);
    this.name = 'DataUnavailable';
  }
}

/**
 * Chart or document engine is missing or threw while rendering.
 */
export class RenderingFailure extends IntakeReportError {
  constructor(
    message: string,
    public readonly originalError?: unknown
  ) {
    super(message, 503);
    this.name = 'RenderingFailure';
  }
}

/**
 * Writing an artifact to the export directory failed.
 */
export class ExportFailure extends IntakeReportError {
  constructor(
    message: string,
    public readonly originalError?: unknown
  ) {
    super(message, 500);
    this.name = 'ExportFailure';
  }
}

export function errMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
