import type { OrderRecord } from "../../domain/types.js";
import type { OrderRepositoryPort } from "../../ports/order-repository.js";

export class InMemoryOrderRepository implements OrderRepositoryPort {
  private readonly orders = new Map<string, OrderRecord>();

  async getById(id: string): Promise<OrderRecord | null> {
    return this.orders.get(id) ?? null;
  }

  async save(order: OrderRecord): Promise<void> {
    this.orders.set(order.id, order);
  }
}
