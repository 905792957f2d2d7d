/**
 * Typed error classes for the activity registry
 *
 * Every error carries a stable `code` so the HTTP layer can map it to a
 * status without matching on message text. Messages are user-facing and
 * end up verbatim in the `detail` field of API error bodies.
 *
 * @module errors
 */

export interface ErrorDetails {
  [key: string]: unknown;
}

export interface ErrorJSON {
  name: string;
  code: string;
  message: string;
  details: ErrorDetails;
  timestamp: string;
  stack?: string;
}

/**
 * Base error class for all registry errors
 */
export class RegistryError extends Error {
  code: string;
  details: ErrorDetails;
  timestamp: string;

  constructor(message: string, code = 'REGISTRY_ERROR', details: ErrorDetails = {}) {
    super(message);
    this.name = 'RegistryError';
    this.code = code;
    this.details = details;
    this.timestamp = new Date().toISOString();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert to JSON for logging
   */
  toJSON(): ErrorJSON {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Thrown when an activity name is not a key in the registry
 */
export class ActivityNotFoundError extends RegistryError {
  activity: string;

  constructor(activity: string) {
    super('Activity not found', ErrorCodes.ACTIVITY_NOT_FOUND, { activity });
    this.name = 'ActivityNotFoundError';
    this.activity = activity;
  }
}

/**
 * Thrown when the email is already in the activity's participant list
 */
export class AlreadySignedUpError extends RegistryError {
  constructor(activity: string, email: string) {
    super('Student is already signed up', ErrorCodes.ALREADY_SIGNED_UP, { activity, email });
    this.name = 'AlreadySignedUpError';
  }
}

/**
 * Thrown on unregister when the email is not in the participant list
 */
export class NotSignedUpError extends RegistryError {
  constructor(activity: string, email: string) {
    super('Student is not signed up for this activity', ErrorCodes.NOT_SIGNED_UP, {
      activity,
      email,
    });
    this.name = 'NotSignedUpError';
  }
}

/**
 * Thrown on signup when capacity is enforced and the activity is full
 */
export class ActivityFullError extends RegistryError {
  maxParticipants: number;

  constructor(activity: string, maxParticipants: number) {
    super('Activity is full', ErrorCodes.ACTIVITY_FULL, { activity, maxParticipants });
    this.name = 'ActivityFullError';
    this.maxParticipants = maxParticipants;
  }
}

/**
 * Thrown when request input validation fails
 */
export class ValidationError extends RegistryError {
  field: string;

  constructor(field: string, message: string, received?: unknown, details: ErrorDetails = {}) {
    super(`Validation failed for '${field}': ${message}`, ErrorCodes.INVALID_INPUT, {
      field,
      received: received !== undefined ? String(received).substring(0, 100) : undefined,
      ...details,
    });
    this.name = 'ValidationError';
    this.field = field;
  }
}

/**
 * Thrown when the seed catalog file is malformed
 */
export class SeedValidationError extends RegistryError {
  constructor(source: string, message: string, details: ErrorDetails = {}) {
    super(`Invalid seed catalog ${source}: ${message}`, ErrorCodes.INVALID_SEED, {
      source,
      ...details,
    });
    this.name = 'SeedValidationError';
  }
}

/**
 * Thrown when configuration is invalid
 */
export class ConfigurationError extends RegistryError {
  configKey: string;

  constructor(configKey: string, message: string, details: ErrorDetails = {}) {
    super(`Configuration error for '${configKey}': ${message}`, ErrorCodes.CONFIG_ERROR, {
      configKey,
      ...details,
    });
    this.name = 'ConfigurationError';
    this.configKey = configKey;
  }
}

export const ErrorCodes = {
  ACTIVITY_NOT_FOUND: 'ACTIVITY_NOT_FOUND',
  ALREADY_SIGNED_UP: 'ALREADY_SIGNED_UP',
  NOT_SIGNED_UP: 'NOT_SIGNED_UP',
  ACTIVITY_FULL: 'ACTIVITY_FULL',
  INVALID_INPUT: 'INVALID_INPUT',
  INVALID_SEED: 'INVALID_SEED',
  CONFIG_ERROR: 'CONFIG_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Helper function to wrap unknown errors
 */
export function wrapError(error: unknown, context = 'Unknown operation'): RegistryError {
  if (error instanceof RegistryError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new RegistryError(`${context}: ${message}`, ErrorCodes.INTERNAL_ERROR, {
    originalError: message,
    originalStack: stack,
  });
}

export function isRegistryError(error: unknown): error is RegistryError {
  return error instanceof RegistryError;
}
