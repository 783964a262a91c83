import { afterEach, describe, expect, it } from "vitest";
import { AppError } from "../src/infra/app-error.js";
import { loadRuntimeConfig } from "../src/infra/config.js";

const originalEnv = { ...process.env };

const CONFIG_ENV_NAMES = [
  "HOST",
  "PORT",
  "NODE_ENV",
  "PRC_API_KEY",
  "PRC_API_KEYS",
  "PRC_LOG_LEVEL",
  "PRC_METRICS_ENABLED",
  "PRC_NEW_ORDER_STATUS",
  "PRC_VAULT_ENABLED",
  "PRC_CC_VAULT_CODE",
  "PRC_RECURRING_PROCESSING_MODEL",
  "PRC_STATE_DATA_TTL_SECONDS",
  "PRC_ORDER_BACKEND",
  "PRC_STATE_DATA_BACKEND",
  "PRC_POSTGRES_URL",
  "PRC_REDIS_URL",
  "PRC_REDIS_STATE_PREFIX",
];

function resetEnv(): void {
  process.env = { ...originalEnv };
  for (const name of CONFIG_ENV_NAMES) {
    delete process.env[name];
  }
}

afterEach(() => {
  process.env = { ...originalEnv };
});

describe("Runtime config", () => {
  it("loads defaults", () => {
    resetEnv();

    const config = loadRuntimeConfig();
    expect(config).toEqual({
      host: "0.0.0.0",
      port: 8080,
      apiKey: "dev_prc_key",
      apiKeys: ["dev_prc_key"],
      logLevel: "info",
      metricsEnabled: true,
      newOrderStatus: "pending",
      vaultEnabled: true,
      ccVaultCode: "cc_vault",
      defaultRecurringProcessingModel: "CardOnFile",
      stateDataTtlSeconds: 86400,
      orderBackend: "memory",
      stateDataBackend: "memory",
      redisStatePrefix: "prc:state",
    });
  });

  it("parses overrides", () => {
    resetEnv();
    process.env.PORT = "9090";
    process.env.PRC_API_KEYS = "rotated_key_0001, rotated_key_0002,rotated_key_0001";
    process.env.PRC_LOG_LEVEL = "warn";
    process.env.PRC_METRICS_ENABLED = "0";
    process.env.PRC_VAULT_ENABLED = "false";
    process.env.PRC_RECURRING_PROCESSING_MODEL = "Subscription";
    process.env.PRC_STATE_DATA_BACKEND = "redis";
    process.env.PRC_REDIS_URL = "redis://localhost:6379";

    const config = loadRuntimeConfig();
    expect(config.port).toBe(9090);
    expect(config.apiKeys).toEqual(["rotated_key_0001", "rotated_key_0002"]);
    expect(config.apiKey).toBe("rotated_key_0001");
    expect(config.logLevel).toBe("warn");
    expect(config.metricsEnabled).toBe(false);
    expect(config.vaultEnabled).toBe(false);
    expect(config.defaultRecurringProcessingModel).toBe("Subscription");
    expect(config.stateDataBackend).toBe("redis");
    expect(config.redisUrl).toBe("redis://localhost:6379");
  });

  it("rejects invalid values", () => {
    resetEnv();
    process.env.PORT = "eighty";
    expect(() => loadRuntimeConfig()).toThrowError(AppError);

    resetEnv();
    process.env.PRC_LOG_LEVEL = "verbose";
    expect(() => loadRuntimeConfig()).toThrowError("Environment variable 'PRC_LOG_LEVEL' must be one of: fatal, error, warn, info, debug, trace, silent.");

    resetEnv();
    process.env.PRC_RECURRING_PROCESSING_MODEL = "OneClick";
    expect(() => loadRuntimeConfig()).toThrowError(AppError);
  });

  it("requires connection urls for external backends", () => {
    resetEnv();
    process.env.PRC_ORDER_BACKEND = "postgres";
    expect(() => loadRuntimeConfig()).toThrowError(
      "Environment variable 'PRC_POSTGRES_URL' is required when the postgres order backend is enabled.",
    );

    resetEnv();
    process.env.PRC_STATE_DATA_BACKEND = "redis";
    expect(() => loadRuntimeConfig()).toThrowError(
      "Environment variable 'PRC_REDIS_URL' is required when the redis state data backend is enabled.",
    );
  });

  it("rejects the default api key in production", () => {
    resetEnv();
    process.env.NODE_ENV = "production";
    expect(() => loadRuntimeConfig()).toThrowError(
      "Environment variable 'PRC_API_KEY' must not include default key value in production.",
    );
  });
});
