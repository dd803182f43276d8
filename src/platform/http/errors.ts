/**
 * Platform HTTP Layer - Error Definitions
 *
 * Two failure channels share one base class:
 * - ApiError: the server answered and rejected the request (error envelope)
 * - TransportError: the server could not be reached or its answer could not be read
 */

export class GrustnogramError extends Error {
  public readonly code: string;
  public readonly status?: number;
  public readonly details?: unknown;

  constructor(message: string, code: string, status?: number, details?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.status = status;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
  }

  public toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      status: this.status,
      details: this.details,
    };
  }
}

// ============================================================================
// Server-reported errors
// ============================================================================

export class ApiError extends GrustnogramError {
  /** Codes from the envelope's `err` list */
  public readonly errorCodes: readonly number[];

  constructor(
    message: string,
    code: string,
    errorCodes: readonly number[],
    status?: number,
    details?: unknown
  ) {
    super(message, code, status, details);
    this.errorCodes = errorCodes;
  }
}

/**
 * 100: email already registered
 */
export class EmailExistsError extends ApiError {
  constructor(errorCodes: readonly number[], status?: number, details?: unknown) {
    super('Specified email already exists', 'EMAIL_EXISTS', errorCodes, status, details);
  }
}

/**
 * 101: nickname already taken
 */
export class LoginExistsError extends ApiError {
  constructor(errorCodes: readonly number[], status?: number, details?: unknown) {
    super('Specified login already exists', 'LOGIN_EXISTS', errorCodes, status, details);
  }
}

/**
 * 102
 */
export class UserNotFoundError extends ApiError {
  constructor(errorCodes: readonly number[], status?: number, details?: unknown) {
    super('Specified user not found', 'USER_NOT_FOUND', errorCodes, status, details);
  }
}

/**
 * 103: wrong password
 */
export class BadCredentialsError extends ApiError {
  constructor(errorCodes: readonly number[], status?: number, details?: unknown) {
    super('Specified password is invalid', 'BAD_CREDENTIALS', errorCodes, status, details);
  }
}

/**
 * Any error code without a dedicated class. The message is the pretty-printed
 * envelope and `envelope` keeps the raw payload.
 */
export class UnknownApiError extends ApiError {
  public readonly envelope: unknown;

  constructor(envelope: unknown, errorCodes: readonly number[], status?: number) {
    super(JSON.stringify(envelope, null, 4), 'UNKNOWN_ERROR', errorCodes, status, envelope);
    this.envelope = envelope;
  }
}

// ============================================================================
// Transport errors
// ============================================================================

export class TransportError extends GrustnogramError {}

/**
 * Network connectivity errors (DNS, connection refused, TLS, etc.)
 */
export class NetworkError extends TransportError {
  constructor(message: string = 'Network connection failed', details?: unknown) {
    super(message, 'NETWORK_ERROR', undefined, details);
  }
}

export class TimeoutError extends TransportError {
  constructor(message: string = 'Request timeout', details?: unknown) {
    super(message, 'TIMEOUT_ERROR', undefined, details);
  }
}

/**
 * The response body is not the JSON envelope or its payload has an unexpected shape
 */
export class ResponseFormatError extends TransportError {
  constructor(message: string, status?: number, details?: unknown) {
    super(message, 'RESPONSE_FORMAT_ERROR', status, details);
  }
}
