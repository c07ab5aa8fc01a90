/**
 * Error taxonomy for the is-it-spam client.
 *
 * Every error thrown by this package extends {@link IsItSpamError}, so callers
 * can catch the whole family with a single `instanceof` check.
 */

export interface ErrorResponseDetails {
  /** HTTP status code, when the error came from a response */
  statusCode?: number;
  /** Raw response body, when the error came from a response */
  responseBody?: string;
}

export class IsItSpamError extends Error {
  public readonly statusCode: number | undefined;
  public readonly responseBody: string | undefined;

  constructor(message: string, details: ErrorResponseDetails = {}) {
    super(message);
    this.name = 'IsItSpamError';
    this.statusCode = details.statusCode;
    this.responseBody = details.responseBody;
  }
}

/** Missing or empty API credentials. Raised before any request is made. */
export class ConfigurationError extends IsItSpamError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** Non-2xx response, transport failure or unreadable success body. */
export class ApiError extends IsItSpamError {
  constructor(message: string, details: ErrorResponseDetails = {}) {
    super(message, details);
    this.name = 'ApiError';
  }
}

/** Field-level validation failure, either local or a 422 from the API. */
export class ValidationError extends IsItSpamError {
  public readonly errors: Readonly<Record<string, readonly string[]>>;

  constructor(message: string, errors: Record<string, string[]> = {}, details: ErrorResponseDetails = {}) {
    super(message, details);
    this.name = 'ValidationError';
    this.errors = errors;
  }
}

/** 429 from the API. */
export class RateLimitError extends IsItSpamError {
  constructor(message: string, details: ErrorResponseDetails = {}) {
    super(message, details);
    this.name = 'RateLimitError';
  }
}
