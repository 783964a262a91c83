import type { OrderHistoryEntry } from "../../domain/types.js";
import type { HistoryLogPort } from "../../ports/history-log.js";

export class InMemoryHistoryLog implements HistoryLogPort {
  private readonly entries: OrderHistoryEntry[] = [];

  async append(entry: OrderHistoryEntry): Promise<void> {
    this.entries.push({ ...entry });
  }

  async listByOrder(orderId: string): Promise<OrderHistoryEntry[]> {
    return this.entries.filter((entry) => entry.order_id === orderId).map((entry) => ({ ...entry }));
  }
}
