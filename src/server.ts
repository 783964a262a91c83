import Fastify, { type FastifyInstance, type FastifyRequest } from "fastify";
import { Redis } from "ioredis";
import { Pool } from "pg";
import { PaymentResultProcessor } from "./application/payment-result-processor.js";
import { RecurringVaultRequestBuilder } from "./application/recurring-vault-request-builder.js";
import { InMemoryHistoryLog } from "./adapters/inmemory/history-log.js";
import { InMemoryOrderLifecycle } from "./adapters/inmemory/order-lifecycle.js";
import { InMemoryOrderRepository } from "./adapters/inmemory/order-repository.js";
import { InMemoryQuoteService } from "./adapters/inmemory/quote-service.js";
import { InMemoryRecurringSettings } from "./adapters/inmemory/recurring-settings.js";
import { InMemoryTransientStateStore } from "./adapters/inmemory/transient-state-store.js";
import { InMemoryVaultRecorder } from "./adapters/inmemory/vault-recorder.js";
import { PostgresHistoryLog } from "./adapters/postgres/history-log.js";
import { PostgresOrderRepository } from "./adapters/postgres/order-repository.js";
import { RedisTransientStateStore } from "./adapters/redis/transient-state-store.js";
import { formatPaymentResponse } from "./domain/result-codes.js";
import type { OrderRecord } from "./domain/types.js";
import { AppError } from "./infra/app-error.js";
import { SystemClock, type ClockPort } from "./infra/clock.js";
import { loadRuntimeConfig, type RuntimeConfig } from "./infra/config.js";
import { PrcMetricsRegistry } from "./infra/metrics.js";
import type { HistoryLogPort } from "./ports/history-log.js";
import type { OrderLifecyclePort } from "./ports/order-lifecycle.js";
import type { OrderRepositoryPort } from "./ports/order-repository.js";
import type { QuoteServicePort } from "./ports/quote-service.js";
import type { RecurringSettingsPort } from "./ports/recurring-settings.js";
import type { TransientStateStorePort } from "./ports/transient-state-store.js";
import type { VaultRecorderPort } from "./ports/vault-recorder.js";
import {
  assertFormatPaymentResponseInput,
  assertGatewayResponse,
  assertRecurringPaymentRequestInput,
  normalizeResourceId,
} from "./api/validators.js";

export interface AppDependencies {
  clock: ClockPort;
  orderRepository: OrderRepositoryPort;
  orderLifecycle: OrderLifecyclePort;
  historyLog: HistoryLogPort;
  vaultRecorder: VaultRecorderPort;
  stateStore: TransientStateStorePort;
  quoteService: QuoteServicePort;
  recurringSettings: RecurringSettingsPort;
}

interface OrderParams {
  id: string;
}

function requireBearerApiKey(headers: Record<string, unknown>, validApiKeys: ReadonlySet<string>): string {
  const authorization = headers.authorization;
  if (typeof authorization !== "string" || !authorization.startsWith("Bearer ")) {
    throw new AppError(401, "missing_api_key", "Authorization header with Bearer API key is required.");
  }

  const token = authorization.slice("Bearer ".length).trim();
  if (!token || !validApiKeys.has(token)) {
    throw new AppError(401, "invalid_api_key", "Invalid API key.");
  }

  return token;
}

export function buildApp(
  config: RuntimeConfig = loadRuntimeConfig(),
  overrides: Partial<AppDependencies> = {},
): FastifyInstance {
  const app = Fastify({ logger: config.logLevel === "silent" ? false : { level: config.logLevel } });
  const metrics = new PrcMetricsRegistry();
  const validApiKeys = new Set<string>(config.apiKeys.length > 0 ? config.apiKeys : [config.apiKey]);
  const requestStartNs = new WeakMap<FastifyRequest, bigint>();
  const closeActions: Array<() => Promise<void>> = [];

  const clock = overrides.clock ?? new SystemClock();
  const postgresPool =
    config.postgresUrl && config.orderBackend === "postgres" && (!overrides.orderRepository || !overrides.historyLog)
      ? new Pool({ connectionString: config.postgresUrl })
      : null;
  if (postgresPool) {
    closeActions.push(async () => {
      await postgresPool.end();
    });
  }

  const redisClient =
    config.redisUrl && config.stateDataBackend === "redis" && !overrides.stateStore
      ? new Redis(config.redisUrl, {
        lazyConnect: false,
        maxRetriesPerRequest: 1,
      })
      : null;
  if (redisClient) {
    closeActions.push(async () => {
      await redisClient.quit();
    });
  }

  const orderRepository =
    overrides.orderRepository
    ?? (postgresPool ? new PostgresOrderRepository(postgresPool) : new InMemoryOrderRepository());
  const historyLog =
    overrides.historyLog
    ?? (postgresPool ? new PostgresHistoryLog(postgresPool) : new InMemoryHistoryLog());

  let stateStore: TransientStateStorePort;
  if (overrides.stateStore) {
    stateStore = overrides.stateStore;
  } else if (config.stateDataBackend === "redis") {
    if (!redisClient) {
      throw new AppError(500, "invalid_runtime_config", "Redis state data requested without Redis client.");
    }
    stateStore = new RedisTransientStateStore(redisClient, {
      keyPrefix: config.redisStatePrefix ?? "prc:state",
      ttlSeconds: config.stateDataTtlSeconds,
    });
  } else {
    stateStore = new InMemoryTransientStateStore();
  }

  const orderLifecycle =
    overrides.orderLifecycle ?? new InMemoryOrderLifecycle({ newOrderStatus: config.newOrderStatus, clock });
  const vaultRecorder = overrides.vaultRecorder ?? new InMemoryVaultRecorder({ enabled: config.vaultEnabled, clock });
  const quoteService = overrides.quoteService ?? new InMemoryQuoteService();
  const recurringSettings =
    overrides.recurringSettings
    ?? new InMemoryRecurringSettings({ defaultModel: config.defaultRecurringProcessingModel });

  const processor = new PaymentResultProcessor(
    orderLifecycle,
    orderRepository,
    historyLog,
    vaultRecorder,
    stateStore,
    quoteService,
    { logger: app.log, clock },
  );
  const recurringRequestBuilder = new RecurringVaultRequestBuilder(stateStore, recurringSettings, {
    ccVaultCode: config.ccVaultCode,
  });

  async function requireOrder(orderId: string): Promise<OrderRecord> {
    const order = await orderRepository.getById(orderId);
    if (!order) {
      throw new AppError(404, "resource_not_found", `Order '${orderId}' not found.`);
    }
    return order;
  }

  app.get("/health/live", async (_, reply) => {
    return reply.status(200).send({ status: "ok" });
  });

  app.get("/health/ready", async (_, reply) => {
    return reply.status(200).send({ status: "ready" });
  });

  app.addHook("onRequest", async (request, reply) => {
    requestStartNs.set(request, process.hrtime.bigint());
    if (request.url.startsWith("/health/")) {
      return;
    }
    if (config.metricsEnabled && request.url === "/metrics") {
      return;
    }
    requireBearerApiKey(request.headers, validApiKeys);
    reply.header("X-Request-Id", request.id);
  });

  app.addHook("onResponse", async (request, reply) => {
    if (!config.metricsEnabled) {
      return;
    }
    const startNs = requestStartNs.get(request);
    if (!startNs) {
      return;
    }
    const endNs = process.hrtime.bigint();
    const durationSeconds = Number(endNs - startNs) / 1_000_000_000;
    const route = request.routeOptions.url ?? request.url.split("?")[0] ?? "unmatched";
    metrics.recordHttpRequest(request.method, route, reply.statusCode, durationSeconds);
  });

  app.post("/v1/payment-responses/format", async (request, reply) => {
    assertFormatPaymentResponseInput(request.body);
    const normalized = formatPaymentResponse(
      request.body.resultCode,
      request.body.action,
      request.body.additionalData,
    );
    metrics.recordNormalizedResponse(normalized.resultCode);
    return reply.status(200).send(normalized);
  });

  app.get<{ Params: OrderParams }>("/v1/orders/:id", async (request, reply) => {
    const orderId = normalizeResourceId(request.params.id, "order_id");
    const order = await requireOrder(orderId);
    return reply.status(200).send(order);
  });

  app.get<{ Params: OrderParams }>("/v1/orders/:id/history", async (request, reply) => {
    const orderId = normalizeResourceId(request.params.id, "order_id");
    await requireOrder(orderId);
    const entries = await historyLog.listByOrder(orderId);
    return reply.status(200).send({ data: entries });
  });

  app.post<{ Params: OrderParams }>("/v1/orders/:id/payment-details", async (request, reply) => {
    const orderId = normalizeResourceId(request.params.id, "order_id");
    assertGatewayResponse(request.body);
    const response = request.body;
    const order = await requireOrder(orderId);

    const success = await processor.process(response, order);
    metrics.recordPaymentResult(response.resultCode, success);

    const normalized = formatPaymentResponse(response.resultCode ?? "", response.action, response.additionalData);
    const updated = (await orderRepository.getById(orderId)) ?? order;
    return reply.status(200).send({
      order_id: updated.id,
      success,
      state: updated.state,
      status: updated.status,
      response: normalized,
    });
  });

  app.post<{ Params: OrderParams }>("/v1/orders/:id/recurring-payment-request", async (request, reply) => {
    const orderId = normalizeResourceId(request.params.id, "order_id");
    assertRecurringPaymentRequestInput(request.body);
    const input = request.body;
    const order = await requireOrder(orderId);

    const built = await recurringRequestBuilder.build({
      payment: {
        method_code: input.payment_method_code,
        provider_code: input.provider_code,
        token: {
          gateway_token: input.gateway_token,
          token_details: input.token_details,
        },
      },
      order,
    });
    return reply.status(200).send(built);
  });

  if (config.metricsEnabled) {
    app.get("/metrics", async (_request, reply) => {
      const payload = metrics.renderPrometheus();
      return reply
        .header("Content-Type", "text/plain; version=0.0.4; charset=utf-8")
        .status(200)
        .send(payload);
    });
  }

  app.setNotFoundHandler(async (_, reply) => {
    return reply.status(404).send({
      error: {
        code: "resource_not_found",
        message: "Route not found.",
      },
    });
  });

  app.setErrorHandler(async (error, request, reply) => {
    if (error instanceof AppError) {
      return reply.status(error.statusCode).send({
        error: {
          code: error.code,
          message: error.message,
          request_id: request.id,
        },
      });
    }
    request.log.error({ err: error }, "Unhandled error");
    return reply.status(500).send({
      error: {
        code: "internal_server_error",
        message: "Unexpected error.",
        request_id: request.id,
      },
    });
  });

  app.addHook("onClose", async () => {
    for (const closeAction of [...closeActions].reverse()) {
      await closeAction();
    }
  });

  return app;
}
