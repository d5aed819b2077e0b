/**
 * Custom Error Types for Plan Locator
 */

export class PlanLocatorError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'PlanLocatorError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends PlanLocatorError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class CalibrationError extends PlanLocatorError {
  constructor(message: string, details?: unknown) {
    super(message, 'CALIBRATION_ERROR', details);
    this.name = 'CalibrationError';
  }
}

export class ProjectionError extends PlanLocatorError {
  constructor(message: string, details?: unknown) {
    super(message, 'PROJECTION_ERROR', details);
    this.name = 'ProjectionError';
  }
}

export class PersistenceError extends PlanLocatorError {
  constructor(message: string, details?: unknown) {
    super(message, 'PERSISTENCE_ERROR', details);
    this.name = 'PersistenceError';
  }
}
