import type { OrderHistoryEntry } from "../domain/types.js";

export interface HistoryLogPort {
  append(entry: OrderHistoryEntry): Promise<void>;
  listByOrder(orderId: string): Promise<OrderHistoryEntry[]>;
}
