import { randomUUID } from "node:crypto";
import { isActionRequired } from "../domain/result-codes.js";
import {
  describePaymentMethod,
  planPaymentResult,
  type ResultOutcome,
} from "../domain/result-outcome.js";
import type { GatewayResponse, OrderPaymentRecord, OrderRecord } from "../domain/types.js";
import { SystemClock, type ClockPort } from "../infra/clock.js";
import { createLogger, type AppLogger } from "../infra/logger.js";
import { attempt, toError } from "../infra/result.js";
import type { HistoryLogPort } from "../ports/history-log.js";
import type { OrderLifecyclePort } from "../ports/order-lifecycle.js";
import type { OrderRepositoryPort } from "../ports/order-repository.js";
import type { QuoteServicePort } from "../ports/quote-service.js";
import type { TransientStateStorePort } from "../ports/transient-state-store.js";
import type { VaultRecorderPort } from "../ports/vault-recorder.js";

interface PaymentResultProcessorOptions {
  logger?: AppLogger;
  clock?: ClockPort;
}

const METADATA_KEYS = [
  "resultCode",
  "action",
  "additionalData",
  "pspReference",
  "details",
  "donationToken",
] as const satisfies readonly (keyof GatewayResponse)[];

function hasValue(value: unknown): boolean {
  if (value === undefined || value === null || value === "") {
    return false;
  }
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  if (typeof value === "object") {
    return Object.keys(value).length > 0;
  }
  return true;
}

export class PaymentResultProcessor {
  private readonly logger: AppLogger;
  private readonly clock: ClockPort;

  constructor(
    private readonly orderLifecycle: OrderLifecyclePort,
    private readonly orderRepository: OrderRepositoryPort,
    private readonly historyLog: HistoryLogPort,
    private readonly vaultRecorder: VaultRecorderPort,
    private readonly stateStore: TransientStateStorePort,
    private readonly quoteService: QuoteServicePort,
    options: PaymentResultProcessorOptions = {},
  ) {
    this.logger = options.logger ?? createLogger({ name: "payment-result-processor" });
    this.clock = options.clock ?? new SystemClock();
  }

  /**
   * Applies a payment details response to the order and reports whether the
   * checkout may continue. Never throws: failures are logged and reported as `false`.
   */
  async process(response: GatewayResponse, order: OrderRecord): Promise<boolean> {
    if (Object.keys(response).length === 0) {
      this.logger.error({ orderId: order.id }, "Payment details call failed, gateway response is empty");
      return false;
    }

    const authResult = response.authResult ?? response.resultCode;
    if (authResult === undefined) {
      // Unknown result: log the payload and leave the order history untouched.
      this.logger.error(
        { orderId: order.id, response },
        "Unexpected result indicator in gateway response",
      );
      return false;
    }

    try {
      return await this.applyResult(response, authResult, order);
    } catch (error) {
      this.logger.error(
        { err: toError(error), orderId: order.id, authResult },
        "Failed to apply gateway payment result to the order",
      );
      return false;
    }
  }

  private async applyResult(response: GatewayResponse, authResult: string, order: OrderRecord): Promise<boolean> {
    this.logger.info({ orderId: order.id, authResult }, "Updating the order");

    const plan = planPaymentResult({
      resultCode: response.resultCode,
      authResult,
      pspReference: response.pspReference?.trim() ?? "",
      paymentMethod: describePaymentMethod(response),
    });

    this.recordResponseMetadata(order.payment, response);

    const vaultResult = await attempt(() => this.vaultRecorder.recordRecurringDetails(order.payment, response));
    if (!vaultResult.ok) {
      this.logger.error(
        { err: vaultResult.error, orderId: order.id },
        "Failed to record recurring payment details",
      );
    }

    let current = order;
    if (!isActionRequired(response.resultCode)) {
      // Expect the authorisation webhook next; it only applies to orders in state `new`.
      current = await this.advanceToNew(current);
    }

    const cleanupResult = await attempt(() => this.stateStore.clear(current.quote_id, authResult));
    if (!cleanupResult.ok) {
      this.logger.error(
        { err: cleanupResult.error, quoteId: current.quote_id },
        "Error cleaning the payment state data",
      );
    }

    current = await this.applyOutcome(plan.outcome, response, current);

    await this.historyLog.append({
      id: `hist_${randomUUID()}`,
      order_id: current.id,
      status: current.status,
      comment: plan.comment,
      entity_name: "order",
      created_at: this.clock.nowIso(),
    });

    current.result_event_code = authResult;
    current.updated_at = this.clock.nowIso();
    await this.orderRepository.save(current);

    return plan.outcome.success;
  }

  private async applyOutcome(
    outcome: ResultOutcome,
    response: GatewayResponse,
    order: OrderRecord,
  ): Promise<OrderRecord> {
    switch (outcome.kind) {
      case "authorised":
        await this.markAuthorised(response, order);
        return order;
      case "pending": {
        const advanced = await this.advanceToNew(order);
        this.logger.info({ orderId: order.id }, "Waiting for the payment notification");
        return advanced;
      }
      case "action_required":
        this.logger.info({ orderId: order.id }, "Additional action is required for the payment");
        return order;
      case "received":
        this.logger.info({ orderId: order.id }, "Waiting for the payment notification");
        return order;
      case "refused":
        await this.cancelIfPossible(order);
        return order;
      case "unrecognized":
        // No terminal state here: the offer-closed notification cancels or holds the order.
        this.logger.error(
          { orderId: order.id, resultCode: response.resultCode, response },
          "Payment details call failed, cancel or hold the order on the offer-closed notification",
        );
        return order;
    }
  }

  private recordResponseMetadata(payment: OrderPaymentRecord, response: GatewayResponse): void {
    for (const key of METADATA_KEYS) {
      const value = response[key];
      if (hasValue(value)) {
        payment.additional_information[key] = structuredClone(value);
      }
    }
  }

  private async advanceToNew(order: OrderRecord): Promise<OrderRecord> {
    const advanced = await this.orderLifecycle.advanceToNew(order);
    await this.orderRepository.save(advanced);
    return advanced;
  }

  private async markAuthorised(response: GatewayResponse, order: OrderRecord): Promise<void> {
    if (response.pspReference) {
      order.payment.cc_trans_id = response.pspReference;
      order.payment.last_trans_id = response.pspReference;
      order.payment.transaction_id = response.pspReference;
    }

    const disableResult = await attempt(() => this.quoteService.disableQuote(order.quote_id));
    if (!disableResult.ok) {
      this.logger.error(
        { err: disableResult.error, quoteId: order.quote_id },
        "Failed to disable quote",
      );
    }
  }

  private async cancelIfPossible(order: OrderRecord): Promise<void> {
    if (!this.orderLifecycle.isCancellable(order)) {
      this.logger.info({ orderId: order.id, state: order.state }, "The order cannot be cancelled");
      return;
    }
    order.action_flags.cancel = true;
    await this.orderLifecycle.cancel(order);
  }
}
