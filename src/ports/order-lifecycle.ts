import type { OrderRecord } from "../domain/types.js";

/**
 * Status transitions owned by the host order system.
 *
 * Implementations must serialize writes per order: at most one status
 * transition may run concurrently for a given order id.
 */
export interface OrderLifecyclePort {
  /** Moves a `pending_payment` order to `new`; any other state is returned untouched. */
  advanceToNew(order: OrderRecord): Promise<OrderRecord>;
  cancel(order: OrderRecord): Promise<void>;
  isCancellable(order: OrderRecord): boolean;
}
