import {
  AddressNotResolvedError,
  InternalFaultError,
  ServiceError,
  TooManyRequestsError
} from '../errors/ServiceError';
import { PropertyDetails, UpstreamOutcome } from '../types/domain';

export type ServiceResponse =
  | { ok: true; statusCode: 200; body: PropertyDetails }
  | { ok: false; error: ServiceError };

// Maps what the provider told us onto what our callers see.
// Closed over the four outcome kinds; adding a kind is a compile error here.
export function translateOutcome(outcome: UpstreamOutcome): ServiceResponse {
  switch (outcome.kind) {
    case 'Resolved':
      return { ok: true, statusCode: 200, body: { has_septic_system: outcome.hasSeptic } };
    case 'NotFound':
      return { ok: false, error: new AddressNotResolvedError() };
    case 'RateLimited':
      return { ok: false, error: new TooManyRequestsError(outcome.retryAfterSeconds) };
    case 'UpstreamFault':
      return { ok: false, error: new InternalFaultError(outcome.rawCode) };
    default: {
      const unreachable: never = outcome;
      return unreachable;
    }
  }
}

export function errorResponse(error: ServiceError): ServiceResponse {
  return { ok: false, error };
}
