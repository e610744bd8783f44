/**
 * Storage error types
 */

export class ValidationError extends Error {
  public readonly issues: unknown[];

  constructor(message: string, issues: unknown[] = []) {
    super(message);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export class DatabaseTamperError extends Error {
  public readonly code = 'DATABASE_TAMPERED';

  constructor(message = 'Database file has an unexpected application_id; it may belong to another program.') {
    super(message);
    this.name = 'DatabaseTamperError';
    Error.captureStackTrace?.(this, this.constructor);
  }
}

export class TrafficLogError extends Error {
  public readonly code = 'TRAFFIC_LOG_FAILED';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TrafficLogError';
    Error.captureStackTrace?.(this, this.constructor);
  }
}
