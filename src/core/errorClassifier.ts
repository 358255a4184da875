import { logger } from '../util/logger.js';
import {
  ForbiddenError,
  NotFoundError,
  RemoteProtocolError,
  TransportError,
  UnauthenticatedError,
  type ErrorDetails,
  type ErrorKind,
  type WikiError
} from './errors.js';

/**
 * Everything the transport knows about a failed call, before classification.
 */
export interface RawFailure {
  method: string;
  message: string;
  status?: number;      // HTTP status, when a response arrived
  rpcCode?: number;     // JSON-RPC error code
  networkCode?: string; // Node/axios error code (ECONNRESET, ECONNABORTED...)
  cause?: unknown;
}

export interface ErrorPattern {
  kind: ErrorKind;
  description: string;
  matches: (failure: RawFailure) => boolean;
}

const NETWORK_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ETIMEDOUT',
  'EPIPE',
  'EHOSTUNREACH',
  'ERR_NETWORK',
  'ERR_SOCKET_CONNECTION_TIMEOUT'
]);

// DokuWiki remote API codes: 1xx pages, 2xx media.
const FORBIDDEN_CODES = new Set([111, 112, 114, 211, 212, 215, 216]);
const NOT_FOUND_CODES = new Set([121, 221]);
// Raised for any method that needs a login when the session has none.
const UNAUTHORIZED_CALL_CODE = -32604;

export const DEFAULT_PATTERNS: ErrorPattern[] = [
  {
    kind: 'TransportError',
    description: 'Network connectivity issue',
    matches: (f) =>
      (f.networkCode !== undefined && NETWORK_CODES.has(f.networkCode)) ||
      (f.status === undefined && /timeout|socket hang up|network error/i.test(f.message))
  },
  {
    kind: 'Unauthenticated',
    description: 'Session missing or expired',
    matches: (f) =>
      f.status === 401 ||
      f.rpcCode === UNAUTHORIZED_CALL_CODE ||
      /not logged in|login required|unauthori[sz]ed/i.test(f.message)
  },
  {
    kind: 'Forbidden',
    description: 'Access denied by the wiki ACL',
    matches: (f) =>
      f.status === 403 ||
      (f.rpcCode !== undefined && FORBIDDEN_CODES.has(f.rpcCode)) ||
      /not allowed|forbidden|access denied|not authorized/i.test(f.message)
  },
  {
    kind: 'NotFound',
    description: 'Requested page or media does not exist',
    matches: (f) =>
      f.status === 404 ||
      (f.rpcCode !== undefined && NOT_FOUND_CODES.has(f.rpcCode))
  },
  {
    kind: 'TransportError',
    description: 'Server unavailable',
    matches: (f) => f.status === 429 || (f.status !== undefined && f.status >= 500)
  }
];

/**
 * Maps raw transport failures onto the error taxonomy. Every failure lands in
 * exactly one kind; anything unrecognised is a protocol error.
 */
export class ErrorClassifier {
  private readonly patterns: ErrorPattern[];
  private readonly counts = new Map<ErrorKind, number>();

  constructor(patterns: ErrorPattern[] = DEFAULT_PATTERNS) {
    this.patterns = [...patterns];
  }

  /**
   * Register a pattern ahead of the defaults.
   */
  addPattern(pattern: ErrorPattern): void {
    this.patterns.unshift(pattern);
  }

  kindOf(failure: RawFailure): ErrorKind {
    const match = this.patterns.find((pattern) => pattern.matches(failure));
    return match ? match.kind : 'RemoteProtocolError';
  }

  classify(failure: RawFailure): WikiError {
    const kind = this.kindOf(failure);
    const details: ErrorDetails = {
      method: failure.method,
      status: failure.status,
      code: failure.rpcCode,
      cause: failure.cause
    };
    const message = `${failure.method}: ${failure.message}`;
    this.counts.set(kind, (this.counts.get(kind) ?? 0) + 1);

    logger.debug('Classified remote failure', {
      method: failure.method,
      kind,
      status: failure.status,
      code: failure.rpcCode,
      networkCode: failure.networkCode
    });

    switch (kind) {
      case 'TransportError':
        return new TransportError(message, details);
      case 'Unauthenticated':
        return new UnauthenticatedError(message, details);
      case 'Forbidden':
        return new ForbiddenError(message, details);
      case 'NotFound':
        return new NotFoundError(message, details);
      default:
        return new RemoteProtocolError(message, details);
    }
  }

  getStats(): Partial<Record<ErrorKind, number>> {
    const stats: Partial<Record<ErrorKind, number>> = {};
    for (const [kind, count] of this.counts) {
      stats[kind] = count;
    }
    return stats;
  }
}
