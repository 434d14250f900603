import { AddressQuery, LookupContext, UpstreamOutcome } from '../types/domain';
import { ServiceResponse } from '../utils/ResponseTranslator';

// Inbound credential check
export interface IAuthGate {
  authorize(authorizationHeader: string | undefined): void;
}

// Query parameter validation
export interface IAddressValidator {
  validate(params: Record<string, unknown>): Promise<AddressQuery>;
}

// Property data provider communication interface
export interface IPropertyDetailsClient {
  lookup(address: AddressQuery, context: LookupContext): Promise<UpstreamOutcome>;
}

export interface PropertyDetailsRequest {
  requestId: string;
  authorization?: string;
  query: Record<string, unknown>;
  signal?: AbortSignal;
}

export interface IPropertyDetailsHandler {
  handle(request: PropertyDetailsRequest): Promise<ServiceResponse>;
}

// Logging interface
export interface ILogger {
  info(message: string, meta?: Record<string, unknown>): void;
  error(message: string, error?: unknown): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

// Configuration interface
export interface IConfiguration {
  get(key: string): string | undefined;
  getNumber(key: string, defaultValue?: number): number;
  getPort(): number;
  getNodeEnv(): string;
}

// What the HTTP server pulls out of the container
export interface IServiceProvider {
  getConfiguration(): IConfiguration;
  getLogger(): ILogger;
  getPropertyDetailsHandler(): IPropertyDetailsHandler;
  shutdown(): Promise<void>;
}
