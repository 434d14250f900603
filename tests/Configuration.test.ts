import { Configuration, ConfigurationError } from '../src/services/Configuration';

const secrets = {
  HOUSE_CANARY_API_KEY: 'test-key',
  HOUSE_CANARY_API_SECRET: 'test-secret',
  API_USERNAME: 'svc-user',
  API_PASSWORD: 'test-password'
};

describe('Configuration', () => {
  describe('Credentials', () => {
    test('should load all four secrets into a frozen object', () => {
      const credentials = new Configuration({ ...secrets }).getCredentials();

      expect(credentials).toEqual({
        upstreamKey: 'test-key',
        upstreamSecret: 'test-secret',
        localUsername: 'svc-user',
        localPassword: 'test-password'
      });
      expect(Object.isFrozen(credentials)).toBe(true);
    });

    test('should name every missing secret without leaking values', () => {
      const config = new Configuration({ HOUSE_CANARY_API_KEY: 'test-key', API_USERNAME: '  ' });

      let caught: unknown;
      try {
        config.getCredentials();
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConfigurationError);
      if (!(caught instanceof ConfigurationError)) return;
      expect(caught.missingKeys).toEqual(['HOUSE_CANARY_API_SECRET', 'API_USERNAME', 'API_PASSWORD']);
      expect(caught.message).toBe(
        'Missing required configuration: HOUSE_CANARY_API_SECRET, API_USERNAME, API_PASSWORD'
      );
      expect(caught.message).not.toContain('test-key');
    });
  });

  describe('Defaults', () => {
    test('should fall back to defaults for optional settings', () => {
      const config = new Configuration({});

      expect(config.getHouseCanaryBaseUrl()).toBe('https://api.housecanary.com');
      expect(config.getUpstreamTimeoutMs()).toBe(10000);
      expect(config.getDefaultRetryAfterSeconds()).toBe(60);
      expect(config.getPort()).toBe(3000);
      expect(config.getNodeEnv()).toBe('development');
      expect(config.getLogLevel()).toBe('info');
    });

    test('should read overrides from the environment', () => {
      const config = new Configuration({
        HOUSE_CANARY_API_BASE_URL: 'http://base.url',
        UPSTREAM_TIMEOUT_MS: '2500',
        UPSTREAM_DEFAULT_RETRY_AFTER_SECONDS: '15',
        PORT: '8080',
        NODE_ENV: 'production'
      });

      expect(config.getHouseCanaryBaseUrl()).toBe('http://base.url');
      expect(config.getUpstreamTimeoutMs()).toBe(2500);
      expect(config.getDefaultRetryAfterSeconds()).toBe(15);
      expect(config.getPort()).toBe(8080);
      expect(config.getNodeEnv()).toBe('production');
    });

    test('should ignore numbers that do not parse', () => {
      const config = new Configuration({ PORT: 'not-a-port' });

      expect(config.getPort()).toBe(3000);
    });

    test.each(['0', '-5'])('should keep the upstream timeout finite when set to %p', (raw) => {
      const config = new Configuration({ UPSTREAM_TIMEOUT_MS: raw });

      expect(config.getUpstreamTimeoutMs()).toBe(10000);
    });

    test.each(['0', '-30'])('should keep the default retry hint positive when set to %p', (raw) => {
      const config = new Configuration({ UPSTREAM_DEFAULT_RETRY_AFTER_SECONDS: raw });

      expect(config.getDefaultRetryAfterSeconds()).toBe(60);
    });
  });
});
