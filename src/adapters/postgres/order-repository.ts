import type { Pool } from "pg";
import type { OrderRecord } from "../../domain/types.js";
import type { OrderRepositoryPort } from "../../ports/order-repository.js";
import { mapActionFlags, mapPayment, mapTimestamp } from "./mapping.js";

export class PostgresOrderRepository implements OrderRepositoryPort {
  constructor(private readonly pool: Pool) {}

  async getById(id: string): Promise<OrderRecord | null> {
    const result = await this.pool.query<{
      id: string;
      increment_id: string;
      quote_id: string;
      store_id: string;
      state: OrderRecord["state"];
      status: string;
      payment: unknown;
      action_flags: unknown;
      result_event_code: string | null;
      created_at: unknown;
      updated_at: unknown;
    }>(
      `
        SELECT
          id,
          increment_id,
          quote_id,
          store_id,
          state,
          status,
          payment,
          action_flags,
          result_event_code,
          created_at,
          updated_at
        FROM prc_orders
        WHERE id = $1
      `,
      [id],
    );
    const row = result.rows[0];
    if (!row) {
      return null;
    }

    return {
      id: row.id,
      increment_id: row.increment_id,
      quote_id: row.quote_id,
      store_id: row.store_id,
      state: row.state,
      status: row.status,
      payment: mapPayment(row.payment),
      action_flags: mapActionFlags(row.action_flags),
      result_event_code: row.result_event_code,
      created_at: mapTimestamp(row.created_at),
      updated_at: mapTimestamp(row.updated_at),
    };
  }

  async save(order: OrderRecord): Promise<void> {
    await this.pool.query(
      `
        INSERT INTO prc_orders (
          id,
          increment_id,
          quote_id,
          store_id,
          state,
          status,
          payment,
          action_flags,
          result_event_code,
          created_at,
          updated_at
        )
        VALUES (
          $1,
          $2,
          $3,
          $4,
          $5,
          $6,
          $7::jsonb,
          $8::jsonb,
          $9,
          $10::timestamptz,
          $11::timestamptz
        )
        ON CONFLICT (id) DO UPDATE
        SET state = EXCLUDED.state,
            status = EXCLUDED.status,
            payment = EXCLUDED.payment,
            action_flags = EXCLUDED.action_flags,
            result_event_code = EXCLUDED.result_event_code,
            updated_at = EXCLUDED.updated_at
      `,
      [
        order.id,
        order.increment_id,
        order.quote_id,
        order.store_id,
        order.state,
        order.status,
        JSON.stringify(order.payment),
        JSON.stringify(order.action_flags),
        order.result_event_code,
        order.created_at,
        order.updated_at,
      ],
    );
  }
}
