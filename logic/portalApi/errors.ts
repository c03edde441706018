/**
 * Portal API Errors
 */

/**
 * Base error for portal failures, with the HTTP status and body when known
 */
export class PortalApiError extends Error {
  readonly statusCode?: number;
  readonly body?: string;

  constructor(message: string, statusCode?: number, body?: string) {
    super(message);
    this.name = 'PortalApiError';
    this.statusCode = statusCode;
    this.body = body;
  }
}

/**
 * Login rejected, or the session lacks the anti-forgery token
 */
export class AuthenticationError extends PortalApiError {
  constructor(message: string, statusCode?: number, body?: string) {
    super(message, statusCode, body);
    this.name = 'AuthenticationError';
  }
}

/**
 * Data endpoint failed or returned something we cannot read
 */
export class FetchError extends PortalApiError {
  constructor(message: string, statusCode?: number, body?: string) {
    super(message, statusCode, body);
    this.name = 'FetchError';
  }
}
