import { AxiosInstance } from 'axios';
import { Configuration } from '../services/Configuration';
import { Logger } from '../services/Logger';
import { BasicAuthGate } from '../services/BasicAuthGate';
import { createUpstreamHttp, PropertyDetailsClient } from '../services/PropertyDetailsClient';
import { AddressQueryValidator } from '../validators/AddressQueryValidator';
import { PropertyDetailsHandler } from '../handlers/PropertyDetailsHandler';
import { Credentials } from '../types/domain';
import {
  IAddressValidator,
  IAuthGate,
  ILogger,
  IPropertyDetailsClient,
  IPropertyDetailsHandler,
  IServiceProvider
} from '../interfaces/services';

// Dependency Injection Container - lazily-built singletons keyed by name
// The registry type means container.get('logger') comes back as an ILogger, no casting
export class DIContainer<TServices> {
  private factories: { [K in keyof TServices]?: () => TServices[K] } = {};
  private singletons: { [K in keyof TServices]?: TServices[K] } = {};

  register<K extends keyof TServices>(name: K, factory: () => TServices[K]): void {
    this.factories[name] = factory;
    delete this.singletons[name];  // Re-registering replaces whatever was built before
  }

  get<K extends keyof TServices>(name: K): TServices[K] {
    // Already built? Hand back the same instance
    const existing = this.singletons[name];
    if (existing !== undefined) {
      return existing;
    }

    const factory = this.factories[name];
    if (!factory) {
      throw new Error(`Service ${String(name)} not registered`);
    }

    // First request builds it, everyone after that shares it
    const instance = factory();
    this.singletons[name] = instance;
    return instance;
  }
}

export interface ApplicationServices {
  config: Configuration;
  logger: ILogger;
  credentials: Credentials;
  upstreamHttp: AxiosInstance;
  authGate: IAuthGate;
  addressValidator: IAddressValidator;
  propertyDetailsClient: IPropertyDetailsClient;
  propertyDetailsHandler: IPropertyDetailsHandler;
}

export class ApplicationContainer implements IServiceProvider {
  private container: DIContainer<ApplicationServices>;

  constructor(private readonly configuration: Configuration = new Configuration()) {
    this.container = new DIContainer<ApplicationServices>();
  }

  initialize(): void {
    // Register basic services first - config, logger, secrets
    this.registerBasicServices();

    // Then the pieces of the lookup pipeline
    this.registerBusinessServices();

    // Secrets are read now so a missing one stops startup instead of the first request
    this.container.get('credentials');
    this.getLogger().info('Application container initialized', {
      upstreamBaseUrl: this.configuration.getHouseCanaryBaseUrl()
    });
  }

  private registerBasicServices(): void {
    // Configuration
    this.container.register('config', () => this.configuration);

    // Logger
    this.container.register('logger', () =>
      Logger.create('septic-lookup', this.configuration.getLogLevel())
    );

    // Credentials - read once, frozen, never logged
    this.container.register('credentials', () => this.configuration.getCredentials());
  }

  private registerBusinessServices(): void {
    // Basic-auth gate only needs the local username/password pair
    this.container.register('authGate', () =>
      new BasicAuthGate(this.container.get('credentials'))
    );

    // Validator is stateless, one instance is plenty
    this.container.register('addressValidator', () => new AddressQueryValidator());

    // One axios instance per process so keep-alive connections get reused
    this.container.register('upstreamHttp', () =>
      createUpstreamHttp(this.configuration.getHouseCanaryBaseUrl())
    );

    // HouseCanary client - gets the upstream key/secret, the HTTP instance and the timeout
    this.container.register('propertyDetailsClient', () =>
      new PropertyDetailsClient(
        this.container.get('upstreamHttp'),
        this.container.get('credentials'),
        this.container.get('logger'),
        {
          timeoutMs: this.configuration.getUpstreamTimeoutMs(),
          defaultRetryAfterSeconds: this.configuration.getDefaultRetryAfterSeconds()
        }
      )
    );

    // The endpoint handler just strings the four pieces above together
    this.container.register('propertyDetailsHandler', () =>
      new PropertyDetailsHandler(
        this.container.get('authGate'),
        this.container.get('addressValidator'),
        this.container.get('propertyDetailsClient'),
        this.container.get('logger')
      )
    );
  }

  // Get container for direct lookups (tests use this)
  getContainer(): DIContainer<ApplicationServices> {
    return this.container;
  }

  // Get specific services (convenience methods)
  getConfiguration(): Configuration {
    return this.container.get('config');
  }

  getLogger(): ILogger {
    return this.container.get('logger');
  }

  getPropertyDetailsHandler(): IPropertyDetailsHandler {
    return this.container.get('propertyDetailsHandler');
  }

  // Nothing pooled to close; kept so the server has one shutdown path
  async shutdown(): Promise<void> {
    this.getLogger().info('Application shutdown completed');
  }
}
