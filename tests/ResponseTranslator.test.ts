import { translateOutcome } from '../src/utils/ResponseTranslator';
import {
  AddressNotResolvedError,
  InternalFaultError,
  TooManyRequestsError
} from '../src/errors/ServiceError';

describe('translateOutcome', () => {
  test('should return the septic flag for a resolved property', () => {
    expect(translateOutcome({ kind: 'Resolved', hasSeptic: true })).toEqual({
      ok: true,
      statusCode: 200,
      body: { has_septic_system: true }
    });
    expect(translateOutcome({ kind: 'Resolved', hasSeptic: false })).toEqual({
      ok: true,
      statusCode: 200,
      body: { has_septic_system: false }
    });
  });

  test('should map an unresolved address to a 404', () => {
    const response = translateOutcome({ kind: 'NotFound' });

    if (response.ok) throw new Error('expected a failure');
    expect(response.error).toBeInstanceOf(AddressNotResolvedError);
    expect(response.error.statusCode).toBe(404);
    expect(response.error.toBody()).toEqual({
      error: 'could not resolve address using given parameters'
    });
  });

  test('should pass the retry hint through on rate limiting', () => {
    const response = translateOutcome({ kind: 'RateLimited', retryAfterSeconds: 30 });

    if (response.ok) throw new Error('expected a failure');
    expect(response.error).toBeInstanceOf(TooManyRequestsError);
    expect(response.error.statusCode).toBe(429);
    expect(response.error.headers()).toEqual({ 'Retry-After': '30' });
  });

  test('should hide upstream faults behind an opaque 500', () => {
    const response = translateOutcome({ kind: 'UpstreamFault', rawCode: 401, detail: 'HTTP 401' });

    if (response.ok) throw new Error('expected a failure');
    expect(response.error).toBeInstanceOf(InternalFaultError);
    expect(response.error.statusCode).toBe(500);
    expect(response.error.headers()).toEqual({});
    expect(response.error.toBody()).toEqual({
      error: 'an error occurred while looking up property details, see server logs for more info'
    });
  });

  test('should be deterministic for the same outcome', () => {
    const outcome = { kind: 'RateLimited', retryAfterSeconds: 12 } as const;
    const first = translateOutcome(outcome);
    const second = translateOutcome(outcome);

    if (first.ok || second.ok) throw new Error('expected failures');
    expect(first.error.statusCode).toBe(second.error.statusCode);
    expect(first.error.headers()).toEqual(second.error.headers());
    expect(first.error.toBody()).toEqual(second.error.toBody());
  });
});
