/**
 * Custom error classes for structured error handling
 * Provides consistent error responses across API endpoints
 */

interface ErrorDetails {
  [key: string]: unknown;
}

interface ErrorJSON {
  error: string;
  code: number;
  type: string;
  details: ErrorDetails;
  timestamp: string;
}

/**
 * Base error class for forwarding-session errors
 */
class ForwardingError extends Error {
  code: number;
  details: ErrorDetails;

  constructor(message: string, code = 500, details: ErrorDetails = {}) {
    super(message);
    this.name = 'ForwardingError';
    this.code = code;
    this.details = details;
  }

  toJSON(): ErrorJSON {
    return {
      error: this.message,
      code: this.code,
      type: this.name,
      details: this.details,
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * Validation errors (400 Bad Request)
 */
class ValidationError extends ForwardingError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, 400, details);
    this.name = 'ValidationError';
  }
}

/**
 * Port pool exhausted (503 Service Unavailable)
 */
class ResourceExhaustedError extends ForwardingError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, 503, details);
    this.name = 'ResourceExhaustedError';
  }
}

/**
 * Rule installation failed; rollback was attempted and the port released (500)
 */
class ProvisioningError extends ForwardingError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, 500, details);
    this.name = 'ProvisioningError';
  }
}

/**
 * Rule removal failed during close; the session was still reclaimed (500)
 */
class TeardownError extends ForwardingError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, 500, details);
    this.name = 'TeardownError';
  }
}

/**
 * Not found errors (404 Not Found)
 */
class NotFoundError extends ForwardingError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, 404, details);
    this.name = 'NotFoundError';
  }
}

/**
 * Packet-filter provider unreachable or misconfigured (503)
 */
class ProviderUnavailableError extends ForwardingError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, 503, details);
    this.name = 'ProviderUnavailableError';
  }
}

/**
 * Extract safe log details from an unknown catch value.
 * Use in log.error/log.warn calls: log.error('msg', errorDetails(err))
 */
function errorDetails(err: unknown): { error: string; stack?: string } | { detail: string } {
  return err instanceof Error
    ? { error: err.message, stack: err.stack }
    : { detail: String(err) };
}

/**
 * Extract a plain error message string from an unknown catch value.
 * Use when a string is needed (e.g. API responses, results arrays).
 */
function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export type { ErrorDetails, ErrorJSON };

export {
  ForwardingError,
  ValidationError,
  ResourceExhaustedError,
  ProvisioningError,
  TeardownError,
  NotFoundError,
  ProviderUnavailableError,
  errorDetails,
  errorMessage,
};
