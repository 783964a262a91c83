import type { OrderRecord, OrderState } from "../../domain/types.js";
import type { ClockPort } from "../../infra/clock.js";
import { AppError } from "../../infra/app-error.js";
import type { OrderLifecyclePort } from "../../ports/order-lifecycle.js";

interface InMemoryOrderLifecycleOptions {
  newOrderStatus: string;
  clock: ClockPort;
}

const CANCELLABLE_STATES: ReadonlySet<OrderState> = new Set(["pending_payment", "new", "processing"]);

export class InMemoryOrderLifecycle implements OrderLifecyclePort {
  constructor(private readonly options: InMemoryOrderLifecycleOptions) {}

  async advanceToNew(order: OrderRecord): Promise<OrderRecord> {
    if (order.state !== "pending_payment") {
      return order;
    }
    order.state = "new";
    order.status = this.options.newOrderStatus;
    order.updated_at = this.options.clock.nowIso();
    return order;
  }

  isCancellable(order: OrderRecord): boolean {
    if (order.action_flags.cancel === false) {
      return false;
    }
    return CANCELLABLE_STATES.has(order.state);
  }

  async cancel(order: OrderRecord): Promise<void> {
    if (!this.isCancellable(order)) {
      throw new AppError(409, "order_not_cancellable", `Order '${order.id}' cannot be cancelled.`);
    }
    order.state = "canceled";
    order.status = "canceled";
    order.updated_at = this.options.clock.nowIso();
  }
}
