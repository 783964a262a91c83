import { isActionRequired } from "./result-codes.js";
import type { GatewayResponse } from "./types.js";

export type ResultOutcome =
  | { kind: "authorised"; success: true }
  | { kind: "pending"; success: true; note: string }
  | { kind: "action_required"; success: true }
  | { kind: "received"; success: boolean }
  | { kind: "refused"; success: false }
  | { kind: "unrecognized"; success: false };

export interface PaymentResultPlan {
  outcome: ResultOutcome;
  comment: string;
}

export interface PaymentResultPlanInput {
  resultCode?: string;
  authResult: string;
  pspReference: string;
  paymentMethod: string;
}

const COMMENT_SEPARATOR = " <br /> ";

export const BANK_TRANSFER_PENDING_NOTE = "Waiting for the customer to transfer the money.";
export const DIRECT_DEBIT_PENDING_NOTE = "This request will be sent to the bank at the end of the day.";
export const GENERIC_PENDING_NOTE = [
  "The payment result is not confirmed (yet).",
  "Once the payment is authorised, the order status will be updated accordingly.",
  "If the order is stuck on this status, the payment can be seen as unsuccessful.",
  "The order can be cancelled automatically when an offer-closed notification arrives.",
].join(COMMENT_SEPARATOR);

/**
 * Brand wins over type, so wallets report e.g. `applepay` rather than `scheme`.
 */
export function describePaymentMethod(response: GatewayResponse): string {
  return response.paymentMethod?.brand ?? response.paymentMethod?.type ?? "";
}

export function pendingNoteFor(paymentMethod: string): string {
  if (paymentMethod.includes("bankTransfer")) {
    return BANK_TRANSFER_PENDING_NOTE;
  }
  if (paymentMethod === "sepadirectdebit") {
    return DIRECT_DEBIT_PENDING_NOTE;
  }
  return GENERIC_PENDING_NOTE;
}

export function resolveResultOutcome(resultCode: string | undefined, paymentMethod: string): ResultOutcome {
  switch (resultCode) {
    case "Authorised":
      return { kind: "authorised", success: true };
    case "Pending":
      return { kind: "pending", success: true, note: pendingNoteFor(paymentMethod) };
    case "PresentToShopper":
      return { kind: "action_required", success: true };
    case "Received":
      return { kind: "received", success: !paymentMethod.includes("alipay_hk") };
    case "Refused":
    case "Cancelled":
      return { kind: "refused", success: false };
    default:
      if (isActionRequired(resultCode)) {
        return { kind: "action_required", success: true };
      }
      return { kind: "unrecognized", success: false };
  }
}

export function formatAuditComment(input: PaymentResultPlanInput): string {
  return [
    "Payment details response:",
    `authResult: ${input.authResult}`,
    `pspReference: ${input.pspReference}`,
    `paymentMethod: ${input.paymentMethod}`,
  ].join(COMMENT_SEPARATOR);
}

export function planPaymentResult(input: PaymentResultPlanInput): PaymentResultPlan {
  const outcome = resolveResultOutcome(input.resultCode, input.paymentMethod);
  const comment = formatAuditComment(input);
  if (outcome.kind === "pending") {
    return { outcome, comment: `${comment}<br /><br />${outcome.note}` };
  }
  return { outcome, comment };
}
