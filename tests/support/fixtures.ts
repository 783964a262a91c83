import { InMemoryHistoryLog } from "../../src/adapters/inmemory/history-log.js";
import { InMemoryOrderLifecycle } from "../../src/adapters/inmemory/order-lifecycle.js";
import { InMemoryOrderRepository } from "../../src/adapters/inmemory/order-repository.js";
import { InMemoryQuoteService } from "../../src/adapters/inmemory/quote-service.js";
import { InMemoryTransientStateStore } from "../../src/adapters/inmemory/transient-state-store.js";
import { InMemoryVaultRecorder } from "../../src/adapters/inmemory/vault-recorder.js";
import { PaymentResultProcessor } from "../../src/application/payment-result-processor.js";
import type { OrderRecord } from "../../src/domain/types.js";
import type { ClockPort } from "../../src/infra/clock.js";
import { createLogger } from "../../src/infra/logger.js";

export const PINO_LEVELS = { debug: 20, info: 30, warn: 40, error: 50 } as const;

export interface LogLine {
  level: number;
  msg: string;
  [key: string]: unknown;
}

export class FixedClock implements ClockPort {
  constructor(private now: string) {}

  nowIso(): string {
    return this.now;
  }

  setNow(nextNow: string): void {
    this.now = nextNow;
  }
}

export function createRecordingLogger() {
  const lines: LogLine[] = [];
  const logger = createLogger({
    level: "debug",
    name: "test",
    destination: {
      write(chunk: string) {
        lines.push(JSON.parse(chunk));
      },
    },
  });
  return { logger, lines };
}

export function buildOrder(overrides: Partial<OrderRecord> = {}): OrderRecord {
  return {
    id: "ord_1001",
    increment_id: "000001001",
    quote_id: "quote_1001",
    store_id: "1",
    state: "pending_payment",
    status: "pending_payment",
    payment: {
      method: "cc",
      additional_information: {},
      cc_trans_id: null,
      last_trans_id: null,
      transaction_id: null,
    },
    action_flags: {},
    result_event_code: null,
    created_at: "2026-03-01T09:00:00.000Z",
    updated_at: "2026-03-01T09:00:00.000Z",
    ...overrides,
  };
}

export function createProcessorHarness() {
  const clock = new FixedClock("2026-03-01T10:00:00.000Z");
  const orderRepository = new InMemoryOrderRepository();
  const orderLifecycle = new InMemoryOrderLifecycle({ newOrderStatus: "pending", clock });
  const historyLog = new InMemoryHistoryLog();
  const vaultRecorder = new InMemoryVaultRecorder({ enabled: true, clock });
  const stateStore = new InMemoryTransientStateStore();
  const quoteService = new InMemoryQuoteService();
  const { logger, lines } = createRecordingLogger();

  const processor = new PaymentResultProcessor(
    orderLifecycle,
    orderRepository,
    historyLog,
    vaultRecorder,
    stateStore,
    quoteService,
    { logger, clock },
  );

  return {
    clock,
    orderRepository,
    orderLifecycle,
    historyLog,
    vaultRecorder,
    stateStore,
    quoteService,
    logLines: lines,
    processor,
  };
}
