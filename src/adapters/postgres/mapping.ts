import type { OrderActionFlag, OrderPaymentRecord } from "../../domain/types.js";
import { AppError } from "../../infra/app-error.js";

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function nullableString(value: unknown, field: string): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value !== "string") {
    throw new AppError(500, "persistence_mapping_error", `Unable to map string field '${field}'.`);
  }
  return value;
}

export function mapTimestamp(value: unknown): string {
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
}

export function mapPayment(value: unknown): OrderPaymentRecord {
  if (!isObject(value) || typeof value.method !== "string") {
    throw new AppError(500, "persistence_mapping_error", "Unable to map order payment record.");
  }
  return {
    method: value.method,
    additional_information: isObject(value.additional_information) ? value.additional_information : {},
    cc_trans_id: nullableString(value.cc_trans_id, "cc_trans_id"),
    last_trans_id: nullableString(value.last_trans_id, "last_trans_id"),
    transaction_id: nullableString(value.transaction_id, "transaction_id"),
  };
}

const ACTION_FLAGS: readonly OrderActionFlag[] = ["cancel", "hold", "unhold"];

export function mapActionFlags(value: unknown): Partial<Record<OrderActionFlag, boolean>> {
  const flags: Partial<Record<OrderActionFlag, boolean>> = {};
  if (!isObject(value)) {
    return flags;
  }
  for (const flag of ACTION_FLAGS) {
    const raw = value[flag];
    if (typeof raw === "boolean") {
      flags[flag] = raw;
    }
  }
  return flags;
}
