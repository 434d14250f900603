import { IConfiguration } from "../interfaces/services";
import { Credentials } from "../types/domain";
import dotenv from "dotenv";

const REQUIRED_SECRETS = [
  "HOUSE_CANARY_API_KEY",
  "HOUSE_CANARY_API_SECRET",
  "API_USERNAME",
  "API_PASSWORD",
] as const;

export class ConfigurationError extends Error {
  constructor(readonly missingKeys: string[]) {
    // Only the variable names, never values
    super(`Missing required configuration: ${missingKeys.join(", ")}`);
    this.name = "ConfigurationError";
  }
}

// Configuration service - keeps all env vars in one place
// Everything goes through here so there's exactly one spot that touches process.env
export class Configuration implements IConfiguration {
  // Tests hand in their own env object; the real app just uses process.env
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {
    dotenv.config();  // Load .env file
  }

  get(key: string): string | undefined {
    return this.env[key];
  }

  // Integer parsing with a default for anything missing or garbled
  getNumber(key: string, defaultValue: number = 0): number {
    const value = this.get(key);
    if (!value) return defaultValue;
    const parsed = parseInt(value, 10);
    return isNaN(parsed) ? defaultValue : parsed;  // Don't crash on bad input
  }

  // Same as getNumber, but zero and negatives also fall back to the default
  getPositiveNumber(key: string, defaultValue: number): number {
    const parsed = this.getNumber(key, defaultValue);
    return parsed > 0 ? parsed : defaultValue;
  }

  // Reads all four secrets at once so startup reports every missing one,
  // instead of making you fix them one restart at a time
  getCredentials(): Credentials {
    const missing = REQUIRED_SECRETS.filter((key) => !this.get(key)?.trim());
    if (missing.length > 0) {
      throw new ConfigurationError([...missing]);
    }

    return Object.freeze({
      upstreamKey: this.read("HOUSE_CANARY_API_KEY"),
      upstreamSecret: this.read("HOUSE_CANARY_API_SECRET"),
      localUsername: this.read("API_USERNAME"),
      localPassword: this.read("API_PASSWORD"),
    });
  }

  // Specific getters with defaults for local development
  getHouseCanaryBaseUrl(): string {
    return this.get("HOUSE_CANARY_API_BASE_URL") || "https://api.housecanary.com";
  }

  // axios reads 0 as "wait forever", so the timeout has to stay positive
  getUpstreamTimeoutMs(): number {
    return this.getPositiveNumber("UPSTREAM_TIMEOUT_MS", 10000);
  }

  // Used when a 429 carries neither Retry-After nor X-RateLimit-Reset
  getDefaultRetryAfterSeconds(): number {
    return this.getPositiveNumber("UPSTREAM_DEFAULT_RETRY_AFTER_SECONDS", 60);
  }

  getPort(): number {
    return this.getNumber("PORT", 3000);  // 3000 is the usual Node dev port
  }

  getNodeEnv(): string {
    return this.get("NODE_ENV") || "development";  // Assume dev unless told otherwise
  }

  getLogLevel(): string {
    return this.get("LOG_LEVEL") || "info";
  }

  private read(key: string): string {
    return this.get(key) ?? "";
  }
}
