import type { Redis } from "ioredis";
import { shouldCleanStateData } from "../../domain/result-codes.js";
import { AppError } from "../../infra/app-error.js";
import type { CheckoutStateData, TransientStateStorePort } from "../../ports/transient-state-store.js";

interface RedisTransientStateStoreOptions {
  keyPrefix: string;
  ttlSeconds: number;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

export class RedisTransientStateStore implements TransientStateStorePort {
  constructor(
    private readonly redis: Redis,
    private readonly options: RedisTransientStateStoreOptions,
  ) {}

  async getStateData(quoteId: string): Promise<CheckoutStateData> {
    const raw = await this.redis.get(this.key(quoteId));
    if (raw === null) {
      return {};
    }
    const parsed: unknown = JSON.parse(raw);
    if (!isObject(parsed)) {
      throw new AppError(500, "invalid_state_data", `State data for quote '${quoteId}' is not an object.`);
    }
    return parsed;
  }

  async setStateData(quoteId: string, data: CheckoutStateData): Promise<void> {
    await this.redis.set(this.key(quoteId), JSON.stringify(data), "EX", this.options.ttlSeconds);
  }

  async clear(quoteId: string, authResult: string): Promise<void> {
    if (!shouldCleanStateData(authResult)) {
      return;
    }
    await this.redis.del(this.key(quoteId));
  }

  private key(quoteId: string): string {
    return `${this.options.keyPrefix}:${quoteId}`;
  }
}
