// Core domain interfaces and types

// Address fields a caller supplies; frozen once validated
export interface AddressQuery {
  readonly street: string;
  readonly unit?: string;
  readonly city?: string;
  readonly state?: string;
  readonly zip?: string;
}

// Process-wide secrets, loaded once at startup and never logged
export type Credentials = Readonly<{
  upstreamKey: string;
  upstreamSecret: string;
  localUsername: string;
  localPassword: string;
}>;

// What a single call to the property data provider came back with
export type UpstreamOutcome =
  | { kind: 'Resolved'; hasSeptic: boolean }
  | { kind: 'NotFound' }
  | { kind: 'RateLimited'; retryAfterSeconds: number }
  | { kind: 'UpstreamFault'; rawCode: number; detail: string };

export interface PropertyDetails {
  has_septic_system: boolean;
}

export interface ErrorBody {
  error: string;
  details?: string[];
}

export interface UpstreamClientOptions {
  timeoutMs: number;
  defaultRetryAfterSeconds: number;
  // Current UTC epoch in seconds
  now?: () => number;
}

export interface LookupContext {
  requestId: string;
  signal?: AbortSignal;
}
