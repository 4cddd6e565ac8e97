import type { ContentfulStatusCode } from 'hono/utils/http-status';

export type ErrorKind =
  | 'validation_error'
  | 'authentication_error'
  | 'conflict_error'
  | 'not_found_error'
  | 'upstream_error'
  | 'integrity_error'
  | 'storage_unavailable_error';

/**
 * Base class for every error the service raises on purpose. `kind` is the
 * stable code sent to clients, `status` the HTTP status it renders as.
 */
export class AppError extends Error {
  constructor(
    readonly kind: ErrorKind,
    readonly status: ContentfulStatusCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, status: ContentfulStatusCode = 400) {
    super('validation_error', status, message);
  }
}

export class WeakPasswordError extends ValidationError {
  constructor(minLength: number) {
    super(`Password must be at least ${minLength} characters`);
  }
}

export class AuthenticationError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('authentication_error', 401, message, options);
  }
}

export class MissingCredentialError extends AuthenticationError {
  constructor() {
    super('Missing access token');
  }
}

// Covers bad signatures, malformed tokens and expiry alike.
export class InvalidTokenError extends AuthenticationError {
  constructor(options?: { cause?: unknown }) {
    super('Invalid or expired token', options);
  }
}

export class InvalidCredentialsError extends AuthenticationError {
  constructor() {
    super('Invalid credentials');
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super('conflict_error', 409, message);
  }
}

export class PrincipalNotFoundError extends AppError {
  constructor() {
    super('not_found_error', 401, 'User not found');
  }
}

export class UpstreamError extends AppError {
  constructor(
    status: ContentfulStatusCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super('upstream_error', status, message, options);
  }
}

export class UpstreamTimeoutError extends UpstreamError {
  constructor(operation: string, options?: { cause?: unknown }) {
    super(504, `${operation} timed out.`, options);
  }
}

export class UpstreamAuthError extends UpstreamError {
  constructor(options?: { cause?: unknown }) {
    super(502, 'Upstream provider rejected the configured API key.', options);
  }
}

export class UpstreamUnavailableError extends UpstreamError {
  constructor(operation: string, options?: { cause?: unknown }) {
    super(502, `${operation} service unavailable.`, options);
  }
}

export class UpstreamEmptyResultError extends UpstreamError {
  constructor(message: string) {
    super(422, message);
  }
}

export class ProviderNotConfiguredError extends UpstreamError {
  constructor() {
    super(503, 'LLM_API_KEY is missing or invalid.');
  }
}

export class IntegrityError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('integrity_error', 500, message, options);
  }
}

export class StorageUnavailableError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('storage_unavailable_error', 503, message, options);
  }
}
