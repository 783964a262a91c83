import { AppError } from "./app-error.js";
import { LOG_LEVELS, type LogLevel } from "./logger.js";
import type { RecurringProcessingModel } from "../domain/types.js";

function invalidConfig(name: string, expectation: string): AppError {
  return new AppError(
    500,
    "invalid_runtime_config",
    `Environment variable '${name}' ${expectation}.`,
  );
}

function parseIntegerEnv(name: string, defaultValue: number, min: number, max: number): number {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw invalidConfig(name, "must be an integer");
  }
  if (parsed < min || parsed > max) {
    throw invalidConfig(name, `must be between ${min} and ${max}`);
  }
  return parsed;
}

function parseStringEnv(name: string, defaultValue: string, minLength: number): string {
  const raw = process.env[name] ?? defaultValue;
  const value = raw.trim();
  if (value.length < minLength) {
    throw invalidConfig(name, `must contain at least ${minLength} characters`);
  }
  return value;
}

function parseStringListEnv(name: string, minItemLength: number, maxItems: number): string[] | undefined {
  const raw = process.env[name];
  if (raw === undefined) {
    return undefined;
  }

  const items = raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

  if (items.length === 0) {
    throw invalidConfig(name, "must contain at least one non-empty comma-separated value");
  }
  if (items.length > maxItems) {
    throw invalidConfig(name, `must contain at most ${maxItems} values`);
  }
  for (const item of items) {
    if (item.length < minItemLength) {
      throw invalidConfig(name, `items must contain at least ${minItemLength} characters`);
    }
  }

  return [...new Set(items)];
}

function parseBooleanEnv(name: string, defaultValue: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const normalized = raw.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") {
    return true;
  }
  if (normalized === "false" || normalized === "0") {
    return false;
  }
  throw invalidConfig(name, "must be a boolean (true/false/1/0)");
}

function parseOptionalStringEnv(name: string, minLength: number): string | undefined {
  const raw = process.env[name];
  if (raw === undefined) {
    return undefined;
  }
  const value = raw.trim();
  if (value.length < minLength) {
    throw invalidConfig(name, `must contain at least ${minLength} characters`);
  }
  return value;
}

function isAllowedValue<TValue extends string>(
  allowedValues: readonly TValue[],
  value: string,
): value is TValue {
  return allowedValues.some((allowed) => allowed === value);
}

function parseEnumEnv<TValue extends string>(
  name: string,
  allowedValues: readonly TValue[],
  defaultValue: TValue,
): TValue {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const normalized = raw.trim();
  if (!isAllowedValue(allowedValues, normalized)) {
    throw invalidConfig(name, `must be one of: ${allowedValues.join(", ")}`);
  }
  return normalized;
}

const RECURRING_PROCESSING_MODELS = ["CardOnFile", "Subscription", "UnscheduledCardOnFile"] as const satisfies readonly RecurringProcessingModel[];

export interface RuntimeConfig {
  host: string;
  port: number;
  apiKey: string;
  apiKeys: string[];
  logLevel: LogLevel;
  metricsEnabled: boolean;
  newOrderStatus: string;
  vaultEnabled: boolean;
  ccVaultCode: string;
  defaultRecurringProcessingModel: RecurringProcessingModel;
  stateDataTtlSeconds: number;
  orderBackend?: "memory" | "postgres";
  stateDataBackend?: "memory" | "redis";
  postgresUrl?: string;
  redisUrl?: string;
  redisStatePrefix?: string;
}

export function loadRuntimeConfig(): RuntimeConfig {
  const host = parseStringEnv("HOST", "0.0.0.0", 1);
  const port = parseIntegerEnv("PORT", 8080, 1, 65535);
  const configuredApiKeys = parseStringListEnv("PRC_API_KEYS", 8, 100);
  const fallbackApiKey = parseStringEnv("PRC_API_KEY", "dev_prc_key", 8);
  const apiKeys = configuredApiKeys ?? [fallbackApiKey];
  const apiKey = apiKeys[0] ?? fallbackApiKey;
  const logLevel = parseEnumEnv("PRC_LOG_LEVEL", LOG_LEVELS, "info");
  const metricsEnabled = parseBooleanEnv("PRC_METRICS_ENABLED", true);
  const newOrderStatus = parseStringEnv("PRC_NEW_ORDER_STATUS", "pending", 3);
  const vaultEnabled = parseBooleanEnv("PRC_VAULT_ENABLED", true);
  const ccVaultCode = parseStringEnv("PRC_CC_VAULT_CODE", "cc_vault", 3);
  const defaultRecurringProcessingModel = parseEnumEnv(
    "PRC_RECURRING_PROCESSING_MODEL",
    RECURRING_PROCESSING_MODELS,
    "CardOnFile",
  );
  const stateDataTtlSeconds = parseIntegerEnv("PRC_STATE_DATA_TTL_SECONDS", 86400, 60, 2_592_000);
  const orderBackend = parseEnumEnv(
    "PRC_ORDER_BACKEND",
    ["memory", "postgres"] as const,
    "memory",
  );
  const stateDataBackend = parseEnumEnv(
    "PRC_STATE_DATA_BACKEND",
    ["memory", "redis"] as const,
    "memory",
  );
  const postgresUrl = parseOptionalStringEnv("PRC_POSTGRES_URL", 12);
  const redisUrl = parseOptionalStringEnv("PRC_REDIS_URL", 8);
  const redisStatePrefix = parseStringEnv("PRC_REDIS_STATE_PREFIX", "prc:state", 3);

  if (process.env.NODE_ENV === "production" && apiKeys.includes("dev_prc_key")) {
    throw invalidConfig(
      configuredApiKeys ? "PRC_API_KEYS" : "PRC_API_KEY",
      "must not include default key value in production",
    );
  }
  if (orderBackend === "postgres" && !postgresUrl) {
    throw invalidConfig("PRC_POSTGRES_URL", "is required when the postgres order backend is enabled");
  }
  if (stateDataBackend === "redis" && !redisUrl) {
    throw invalidConfig("PRC_REDIS_URL", "is required when the redis state data backend is enabled");
  }

  return {
    host,
    port,
    apiKey,
    apiKeys,
    logLevel,
    metricsEnabled,
    newOrderStatus,
    vaultEnabled,
    ccVaultCode,
    defaultRecurringProcessingModel,
    stateDataTtlSeconds,
    orderBackend,
    stateDataBackend,
    redisStatePrefix,
    ...(postgresUrl ? { postgresUrl } : {}),
    ...(redisUrl ? { redisUrl } : {}),
  };
}
