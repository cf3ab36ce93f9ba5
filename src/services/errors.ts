/**
 * Error types
 * Every failure the client raises derives from TargetClientError.
 */

export class TargetClientError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TargetClientError';
  }
}

/**
 * Missing or invalid client configuration
 */
export class ConfigError extends TargetClientError {
  public readonly code = 'CONFIG_INVALID';

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * The endpoint could not be reached (DNS, refused connection, timeout, abort).
 * Potentially transient.
 */
export class NetworkError extends TargetClientError {
  public readonly code = 'NETWORK_ERROR';
  public readonly url: string;

  constructor(url: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Request to ${url} failed: ${reason}`, { cause });
    this.name = 'NetworkError';
    this.url = url;
  }
}

/**
 * A success response whose body does not have the expected shape
 */
export class MalformedResponseError extends TargetClientError {
  public readonly code = 'MALFORMED_RESPONSE';
  public readonly body: unknown;

  constructor(message: string, body: unknown) {
    super(message);
    this.name = 'MalformedResponseError';
    this.body = body;
  }
}

/**
 * The API answered with a non-success status
 */
export class TargetApiError extends TargetClientError {
  public readonly httpStatus: number;
  public readonly body: unknown;

  constructor(message: string, httpStatus: number, body?: unknown) {
    super(`${message} (http status ${httpStatus})`);
    this.name = 'TargetApiError';
    this.httpStatus = httpStatus;
    this.body = body;
  }
}

/**
 * Credentials or the token request were rejected. Not retryable as is.
 */
export class AuthError extends TargetApiError {
  /** WWW-Authenticate header, when the server sent one */
  public readonly oauthMessage: string | null;

  constructor(message: string, httpStatus: number, body?: unknown, oauthMessage: string | null = null) {
    super(message, httpStatus, body);
    this.name = 'AuthError';
    this.oauthMessage = oauthMessage;
    if (oauthMessage) {
      this.message = `${this.message} ${oauthMessage}`;
    }
  }
}

export class ValidationError extends TargetApiError {
  public readonly fields: Record<string, string>;

  constructor(fields: Record<string, string>, body?: unknown) {
    super('Validation failed', 400, body);
    this.name = 'ValidationError';
    this.fields = fields;
    const lines = Object.entries(fields).map(([field, reason]) => `#${field}: ${reason}`);
    if (lines.length > 0) {
      this.message = `Validation failed on:\n  ${lines.join('\n  ')}`;
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Extracts a readable message from an error body.
 * Handles `{ error: { message } }`, `{ error, error_description }` and plain strings.
 */
export function describeErrorBody(body: unknown, fallback: string): string {
  if (typeof body === 'string' && body.length > 0) {
    return body;
  }
  if (!isRecord(body)) {
    return fallback;
  }
  const { error } = body;
  if (isRecord(error) && typeof error.message === 'string') {
    return error.message;
  }
  if (typeof body.error_description === 'string') {
    return body.error_description;
  }
  if (typeof error === 'string') {
    return error;
  }
  return fallback;
}

/**
 * Flattens a 400 body into `field -> message`
 * Nested field errors become dotted paths (`banner.url`).
 */
export function extractFieldErrors(body: unknown, prefix = ''): Record<string, string> {
  const fields: Record<string, string> = {};
  if (!isRecord(body)) {
    return fields;
  }
  for (const [key, value] of Object.entries(body)) {
    const path = prefix ? `${prefix}.${key}` : key;
    if (isRecord(value)) {
      if (typeof value.message === 'string') {
        fields[path] = value.message;
      } else {
        Object.assign(fields, extractFieldErrors(value, path));
      }
    } else if (typeof value === 'string') {
      fields[path] = value;
    }
  }
  return fields;
}

/**
 * Maps a non-success resource response to an error
 */
export function toApiError(status: number, body: unknown, wwwAuthenticate: string | null): TargetApiError {
  if (status === 400) {
    return new ValidationError(extractFieldErrors(body), body);
  }
  if (status === 401 || status === 403) {
    return new AuthError(describeErrorBody(body, 'Unauthorized'), status, body, wwwAuthenticate);
  }
  return new TargetApiError(describeErrorBody(body, 'Request failed'), status, body);
}
