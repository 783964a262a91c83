import type { OrderRecord } from "../domain/types.js";

export interface OrderRepositoryPort {
  getById(id: string): Promise<OrderRecord | null>;
  save(order: OrderRecord): Promise<void>;
}
