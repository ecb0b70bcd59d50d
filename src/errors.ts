import type { Location } from './types.js';

export type ErrorCode =
  | 'NOT_FOUND'
  | 'ENGINE_NOT_FOUND'
  | 'BOTH_MISSING'
  | 'UNAUTHENTICATED'
  | 'TRANSPORT_FAILURE'
  | 'INCOMPATIBLE_FORMAT'
  | 'NO_OP_COPY'
  | 'TARGET_ALREADY_EXISTS'
  | 'NO_SENSITIVE_KEYS_CONFIGURED'
  | 'NO_SENSITIVE_KEYS_MATCHED'
  | 'EMPTY_DOCUMENT'
  | 'PARTIAL_FAILURE'
  | 'INVALID_CONFIG'
  | 'INVALID_LOCATION';

export interface ErrorDetails {
  operation?: string;
  location?: Location;
  cause?: unknown;
}

export function describeLocation(location: Location): string {
  const engine = location.engine ? `${location.engine}/` : '';
  return `${location.environment}:${engine}${location.path}`;
}

/**
 * Every failure the core raises. Messages name operations and locations only,
 * never values.
 */
export class PromoterError extends Error {
  readonly code: ErrorCode;
  readonly operation?: string;
  readonly location?: Location;

  constructor(code: ErrorCode, message: string, details: ErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'PromoterError';
    this.code = code;
    this.operation = details.operation;
    this.location = details.location;
  }
}

/**
 * Split wrote the sensitive keys to the target but could not rewrite the source.
 * The target now holds data the source still has; an operator must reconcile.
 */
export class PartialFailureError extends PromoterError {
  readonly movedKeys: string[];
  readonly target: Location;

  constructor(source: Location, target: Location, movedKeys: string[], cause: unknown) {
    super(
      'PARTIAL_FAILURE',
      `Sensitive keys were written to ${describeLocation(target)} but ${describeLocation(source)} was not updated; ` +
        `both locations now hold: ${movedKeys.join(', ')}`,
      { operation: 'split', location: source, cause },
    );
    this.name = 'PartialFailureError';
    this.movedKeys = movedKeys;
    this.target = target;
  }
}

export function isPromoterError(error: unknown, code?: ErrorCode): error is PromoterError {
  if (!(error instanceof PromoterError)) return false;
  return code === undefined || error.code === code;
}

/** Re-raise with the operation and location attached, keeping the original code. */
export function withContext(error: unknown, operation: string, location: Location): PromoterError {
  if (error instanceof PromoterError) {
    if (error.operation !== undefined) return error;
    return new PromoterError(error.code, `${operation} ${describeLocation(location)}: ${error.message}`, {
      operation,
      location,
      cause: error,
    });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new PromoterError('TRANSPORT_FAILURE', `${operation} ${describeLocation(location)}: ${message}`, {
    operation,
    location,
    cause: error,
  });
}
