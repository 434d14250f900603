import { ErrorBody } from '../types/domain';

export type ServiceErrorKind =
  | 'Unauthorized'
  | 'InsufficientParameters'
  | 'AddressNotResolved'
  | 'TooManyRequests'
  | 'InternalFault';

// Base for every failure the endpoint reports to its callers.
// Anything else thrown inside a request is treated as a bug and becomes a generic 500.
export abstract class ServiceError extends Error {
  abstract readonly kind: ServiceErrorKind;
  abstract readonly statusCode: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }

  headers(): Record<string, string> {
    return {};
  }

  toBody(): ErrorBody {
    return { error: this.message };
  }
}

export class UnauthorizedError extends ServiceError {
  readonly kind = 'Unauthorized' as const;
  readonly statusCode = 401;

  constructor() {
    super('Unauthorized');
  }

  // Same challenge for a missing header and for wrong credentials
  headers(): Record<string, string> {
    return { 'WWW-Authenticate': 'Basic realm="property-details"' };
  }
}

export class InsufficientParametersError extends ServiceError {
  readonly kind = 'InsufficientParameters' as const;
  readonly statusCode = 422;

  constructor(readonly details: string[]) {
    super('Insufficient parameters');
  }

  toBody(): ErrorBody {
    return { error: this.message, details: this.details };
  }
}

export class AddressNotResolvedError extends ServiceError {
  readonly kind = 'AddressNotResolved' as const;
  readonly statusCode = 404;

  constructor() {
    super('could not resolve address using given parameters');
  }
}

export class TooManyRequestsError extends ServiceError {
  readonly kind = 'TooManyRequests' as const;
  readonly statusCode = 429;

  constructor(readonly retryAfterSeconds: number) {
    super('Too many requests');
  }

  headers(): Record<string, string> {
    return { 'Retry-After': String(this.retryAfterSeconds) };
  }
}

// The upstream code stays on the error for logging and is never put in the body
export class InternalFaultError extends ServiceError {
  readonly kind = 'InternalFault' as const;
  readonly statusCode = 500;

  constructor(readonly upstreamCode: number) {
    super('an error occurred while looking up property details, see server logs for more info');
  }
}
