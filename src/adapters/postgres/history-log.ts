import type { Pool } from "pg";
import type { OrderHistoryEntry } from "../../domain/types.js";
import type { HistoryLogPort } from "../../ports/history-log.js";
import { mapTimestamp } from "./mapping.js";

export class PostgresHistoryLog implements HistoryLogPort {
  constructor(private readonly pool: Pool) {}

  async append(entry: OrderHistoryEntry): Promise<void> {
    await this.pool.query(
      `
        INSERT INTO prc_order_status_history (
          id,
          order_id,
          status,
          comment,
          entity_name,
          created_at
        )
        VALUES ($1, $2, $3, $4, $5, $6::timestamptz)
      `,
      [entry.id, entry.order_id, entry.status, entry.comment, entry.entity_name, entry.created_at],
    );
  }

  async listByOrder(orderId: string): Promise<OrderHistoryEntry[]> {
    const result = await this.pool.query<{
      id: string;
      order_id: string;
      status: string;
      comment: string;
      created_at: unknown;
    }>(
      `
        SELECT id, order_id, status, comment, created_at
        FROM prc_order_status_history
        WHERE order_id = $1
        ORDER BY created_at ASC, id ASC
      `,
      [orderId],
    );
    return result.rows.map((row) => ({
      id: row.id,
      order_id: row.order_id,
      status: row.status,
      comment: row.comment,
      entity_name: "order",
      created_at: mapTimestamp(row.created_at),
    }));
  }
}
