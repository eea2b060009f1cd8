/**
 * Base application error class with status code support.
 *
 * `message` is for the server log; `clientMessage` is the only text that
 * may reach the HTTP client.
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly code: string;
  public readonly clientMessage: string;

  constructor(
    message: string,
    statusCode = 500,
    code = 'INTERNAL_ERROR',
    clientMessage = 'internal server error',
    isOperational = true,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.statusCode = statusCode;
    this.code = code;
    this.clientMessage = clientMessage;
    this.isOperational = isOperational;
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * URL validation error (400)
 */
export class UrlValidationError extends AppError {
  public readonly url: string;

  constructor(message: string, url: string) {
    super(message, 400, 'INVALID_URL', 'Invalid URL provided');
    this.url = url;
  }
}

/**
 * Unrecognized output format (400)
 */
export class InvalidFormatError extends AppError {
  public readonly format: string;

  constructor(format: string) {
    super(`invalid format: ${format}`, 400, 'INVALID_FORMAT', 'invalid format');
    this.format = format;
  }
}

export type TransportErrorKind =
  | 'blocked-address'
  | 'too-many-redirects'
  | 'invalid-redirect'
  | 'timeout'
  | 'aborted'
  | 'network';

/**
 * Outbound fetch failure. Every kind maps to the same client message so the
 * SSRF guard cannot be mapped from outside.
 */
export class TransportError extends AppError {
  public readonly url: string;
  public readonly kind: TransportErrorKind;

  constructor(
    message: string,
    url: string,
    kind: TransportErrorKind,
    options?: ErrorOptions
  ) {
    super(message, 422, 'FETCH_ERROR', 'Failed to process URL', true, options);
    this.url = url;
    this.kind = kind;
  }
}

/**
 * Content extraction error
 */
export class ExtractionError extends AppError {
  public readonly url: string;

  constructor(message: string, url: string, options?: ErrorOptions) {
    super(
      message,
      422,
      'EXTRACTION_ERROR',
      'Failed to process URL',
      true,
      options
    );
    this.url = url;
  }
}

/**
 * Failure while serializing an article, before any byte was written.
 */
export class RenderError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super(
      message,
      500,
      'RENDER_ERROR',
      'failed to render article content',
      true,
      options
    );
  }
}

/**
 * Not found error (404)
 */
export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(`${resource} not found`, 404, 'NOT_FOUND', 'not found');
  }
}

/**
 * Method not allowed (405)
 */
export class MethodNotAllowedError extends AppError {
  constructor(method: string) {
    super(
      `${method} is not allowed`,
      405,
      'METHOD_NOT_ALLOWED',
      'method not allowed'
    );
  }
}
