import axios, { AxiosInstance, AxiosResponse } from 'axios';
import _ from 'lodash';
import { ILogger, IPropertyDetailsClient } from '../interfaces/services';
import {
  AddressQuery,
  Credentials,
  LookupContext,
  UpstreamClientOptions,
  UpstreamOutcome
} from '../types/domain';

export const PROPERTY_DETAILS_PATH = '/v2/property/details';

// Synthetic status for calls that never got an HTTP response
export const TRANSPORT_FAILURE_CODE = 0;

export type UpstreamHttp = Pick<AxiosInstance, 'get'>;

// Status handling happens in the client, so axios must not throw on non-2xx
export function createUpstreamHttp(baseURL: string): AxiosInstance {
  return axios.create({
    baseURL,
    validateStatus: () => true
  });
}

// Our parameter names differ from the provider's
export function toUpstreamParams(address: AddressQuery): Record<string, string> {
  const params: Record<string, string | undefined> = {
    address: address.street,
    unit: address.unit,
    city: address.city,
    state: address.state,
    zipcode: address.zip
  };
  return _.pickBy(params, (value): value is string => typeof value === 'string' && value !== '');
}

// Upper bound on the wait we pass on to callers (one day)
export const MAX_RETRY_AFTER_SECONDS = 86400;

// e.g. "Sun, 06 Nov 1994 08:49:37 GMT"
const IMF_FIXDATE = /^(Mon|Tue|Wed|Thu|Fri|Sat|Sun), \d{2} (Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec) \d{4} \d{2}:\d{2}:\d{2} GMT$/;

// Keeps the header we send back a plain non-negative integer
function clampRetryAfter(seconds: number): number {
  if (!Number.isFinite(seconds) || seconds > MAX_RETRY_AFTER_SECONDS) return MAX_RETRY_AFTER_SECONDS;
  return Math.max(Math.floor(seconds), 0);
}

function currentEpochSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

function readHeader(headers: AxiosResponse['headers'], name: string): string | undefined {
  const value: unknown = headers[name];
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number') return String(value);
  return undefined;
}

export class PropertyDetailsClient implements IPropertyDetailsClient {
  private readonly now: () => number;

  constructor(
    private readonly http: UpstreamHttp,
    private readonly credentials: Pick<Credentials, 'upstreamKey' | 'upstreamSecret'>,
    private readonly logger: ILogger,
    private readonly options: UpstreamClientOptions
  ) {
    this.now = options.now ?? currentEpochSeconds;
  }

  // One call, no retries
  async lookup(address: AddressQuery, context: LookupContext): Promise<UpstreamOutcome> {
    const { requestId, signal } = context;
    let response: AxiosResponse<unknown>;

    try {
      this.logger.debug('Requesting property details', { requestId });
      response = await this.http.get<unknown>(PROPERTY_DETAILS_PATH, {
        params: toUpstreamParams(address),
        auth: {
          username: this.credentials.upstreamKey,
          password: this.credentials.upstreamSecret
        },
        headers: { 'X-Request-ID': requestId },
        timeout: this.options.timeoutMs,
        signal
      });
    } catch (error) {
      let detail = 'Unknown transport error';
      if (axios.isAxiosError(error)) {
        detail = error.code ? `${error.code}: ${error.message}` : error.message;
      } else if (error instanceof Error) {
        detail = error.message;
      }

      this.logger.error('Request to property data provider failed before a response', { requestId, detail });
      return { kind: 'UpstreamFault', rawCode: TRANSPORT_FAILURE_CODE, detail };
    }

    this.logger.info('Property data provider responded', { requestId, status: response.status });

    if (response.status === 429) {
      const retryAfterSeconds = this.retryAfterSeconds(response.headers);
      this.logger.warn('Property data provider is rate limiting us', { requestId, retryAfterSeconds });
      return { kind: 'RateLimited', retryAfterSeconds };
    }

    if (response.status !== 200) {
      // Anything else means we sent a malformed or mis-authenticated request
      this.logger.error('Request to property data provider failed', {
        requestId,
        status: response.status,
        body: response.data
      });
      return { kind: 'UpstreamFault', rawCode: response.status, detail: `HTTP ${response.status}` };
    }

    return this.interpretDetails(response.data, requestId);
  }

  private interpretDetails(body: unknown, requestId: string): UpstreamOutcome {
    const match: unknown = _.get(body, ['address_info', 'status', 'match']);
    if (match === undefined || match === null) {
      this.logger.error('Property data provider returned an unexpected payload', { requestId, body });
      return { kind: 'UpstreamFault', rawCode: 200, detail: 'missing address_info.status.match' };
    }

    if (!match) {
      return { kind: 'NotFound' };
    }

    const property: unknown = _.get(body, ['property/details', 'result', 'property']);
    if (!_.isPlainObject(property)) {
      this.logger.info('Address matched but no property record was returned', { requestId });
      return { kind: 'NotFound' };
    }

    const sewer: unknown = _.get(property, ['sewer']);
    const hasSeptic = typeof sewer === 'string' && sewer.trim().toLowerCase() === 'septic';
    return { kind: 'Resolved', hasSeptic };
  }

  // Prefers Retry-After, then the provider's X-RateLimit-Reset epoch, then the configured default
  private retryAfterSeconds(headers: AxiosResponse['headers']): number {
    const retryAfter = readHeader(headers, 'retry-after');
    if (retryAfter) {
      if (/^\d+$/.test(retryAfter)) {
        return clampRetryAfter(Number(retryAfter));
      }
      // Only the IMF-fixdate form; Date.parse would happily read things like "1, 2"
      if (IMF_FIXDATE.test(retryAfter)) {
        return clampRetryAfter(Math.ceil(Date.parse(retryAfter) / 1000) - this.now());
      }
    }

    const reset = readHeader(headers, 'x-ratelimit-reset');
    if (reset && /^\d+$/.test(reset)) {
      return clampRetryAfter(Number(reset) - this.now());
    }

    return this.options.defaultRetryAfterSeconds;
  }
}
