import type { GatewayAction, GatewayResponse } from "../domain/types.js";
import { AppError } from "../infra/app-error.js";

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

function isOptionalString(value: unknown): boolean {
  return value === undefined || typeof value === "string";
}

function isOptionalObject(value: unknown): boolean {
  return value === undefined || isObject(value);
}

export interface FormatPaymentResponseInput {
  resultCode: string;
  action?: GatewayAction | null;
  additionalData?: Record<string, unknown> | null;
}

export interface RecurringPaymentRequestInput {
  payment_method_code: string;
  provider_code: string;
  gateway_token: string;
  token_details: string;
}

export function assertGatewayResponse(payload: unknown): asserts payload is GatewayResponse {
  if (!isObject(payload)) {
    throw new AppError(400, "invalid_request_body", "Request body must be an object.");
  }

  for (const field of ["resultCode", "authResult", "pspReference", "donationToken"] as const) {
    if (!isOptionalString(payload[field])) {
      throw new AppError(422, "invalid_gateway_response", `${field} must be a string.`);
    }
  }
  for (const field of ["action", "additionalData", "details"] as const) {
    if (!isOptionalObject(payload[field])) {
      throw new AppError(422, "invalid_gateway_response", `${field} must be an object.`);
    }
  }

  const { paymentMethod } = payload;
  if (paymentMethod !== undefined) {
    if (!isObject(paymentMethod) || !isOptionalString(paymentMethod.brand) || !isOptionalString(paymentMethod.type)) {
      throw new AppError(
        422,
        "invalid_gateway_response",
        "paymentMethod must be an object with optional string brand and type.",
      );
    }
  }
}

export function assertFormatPaymentResponseInput(payload: unknown): asserts payload is FormatPaymentResponseInput {
  if (!isObject(payload)) {
    throw new AppError(400, "invalid_request_body", "Request body must be an object.");
  }
  if (!isString(payload.resultCode)) {
    throw new AppError(422, "invalid_result_code", "resultCode is required.");
  }
  if (payload.action !== null && !isOptionalObject(payload.action)) {
    throw new AppError(422, "invalid_action", "action must be an object.");
  }
  if (payload.additionalData !== null && !isOptionalObject(payload.additionalData)) {
    throw new AppError(422, "invalid_additional_data", "additionalData must be an object.");
  }
}

export function assertRecurringPaymentRequestInput(
  payload: unknown,
): asserts payload is RecurringPaymentRequestInput {
  if (!isObject(payload)) {
    throw new AppError(400, "invalid_request_body", "Request body must be an object.");
  }
  for (const field of ["payment_method_code", "provider_code", "gateway_token"] as const) {
    if (!isString(payload[field])) {
      throw new AppError(422, `invalid_${field}`, `${field} is required.`);
    }
  }
  if (typeof payload.token_details !== "string") {
    throw new AppError(422, "invalid_token_details", "token_details must be a JSON string.");
  }
}

export function normalizeResourceId(value: unknown, fieldName: string): string {
  if (typeof value !== "string") {
    throw new AppError(400, "invalid_path_parameter", `${fieldName} is required.`);
  }

  const normalized = value.trim();
  if (normalized.length === 0 || normalized.length > 255) {
    throw new AppError(
      422,
      `invalid_${fieldName}`,
      `${fieldName} length must be between 1 and 255 characters.`,
    );
  }
  return normalized;
}
