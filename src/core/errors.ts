export type ErrorKind =
  | 'AuthenticationError' // every credential source exhausted
  | 'Unauthenticated'     // session missing or expired, retryable once per call
  | 'Forbidden'           // ACL denies the operation
  | 'NotFound'            // page, media file or revision does not exist
  | 'Conflict'            // wiki moved on since the last fetch
  | 'RemoteProtocolError' // unexpected or malformed response
  | 'TransportError'      // network failure, timeout, 5xx
  | 'AmbiguousMapping'    // wiki ids and file paths do not map one-to-one
  | 'ConfigurationError'; // unusable configuration

export interface ErrorDetails {
  method?: string;
  status?: number;
  code?: number;
  path?: string;
  wikiId?: string;
  cause?: unknown;
}

/**
 * Base class of every classified failure. `kind` is the only thing callers
 * branch on; `details` carries context for diagnostics.
 */
export abstract class WikiError extends Error {
  abstract readonly kind: ErrorKind;
  readonly details: ErrorDetails;

  constructor(message: string, details: ErrorDetails = {}) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }

  /** Fatal errors end the helper process instead of a single ref. */
  get fatal(): boolean {
    return this.kind === 'AuthenticationError' || this.kind === 'ConfigurationError';
  }
}

export class AuthenticationError extends WikiError {
  readonly kind = 'AuthenticationError';
}

export class UnauthenticatedError extends WikiError {
  readonly kind = 'Unauthenticated';
}

export class ForbiddenError extends WikiError {
  readonly kind = 'Forbidden';
}

export class NotFoundError extends WikiError {
  readonly kind = 'NotFound';
}

export class ConflictError extends WikiError {
  readonly kind = 'Conflict';
}

export class RemoteProtocolError extends WikiError {
  readonly kind = 'RemoteProtocolError';
}

export class TransportError extends WikiError {
  readonly kind = 'TransportError';
}

export class AmbiguousMappingError extends WikiError {
  readonly kind = 'AmbiguousMapping';
}

export class ConfigurationError extends WikiError {
  readonly kind = 'ConfigurationError';
}

export function isWikiError(value: unknown): value is WikiError {
  return value instanceof WikiError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
