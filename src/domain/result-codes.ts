import type { GatewayAction } from "./types.js";

export const RESULT_CODES = [
  "Authorised",
  "Refused",
  "RedirectShopper",
  "IdentifyShopper",
  "ChallengeShopper",
  "Received",
  "Pending",
  "PresentToShopper",
  "Error",
  "Cancelled",
] as const;

export type ResultCode = (typeof RESULT_CODES)[number];

// Terminal (point-of-sale) payments report this instead of Authorised.
export const POS_SUCCESS = "Success";

export const ACTION_REQUIRED_RESULT_CODES = [
  "RedirectShopper",
  "IdentifyShopper",
  "ChallengeShopper",
  "Pending",
] as const satisfies readonly ResultCode[];

export type ActionRequiredResultCode = (typeof ACTION_REQUIRED_RESULT_CODES)[number];

const RESULT_CODE_SET: ReadonlySet<string> = new Set(RESULT_CODES);
const ACTION_REQUIRED_SET: ReadonlySet<string> = new Set(ACTION_REQUIRED_RESULT_CODES);

// Checkout state data is only dropped once the payment is authorised.
const STATE_DATA_CLEANUP_RESULT_CODES: ReadonlySet<string> = new Set<ResultCode>(["Authorised"]);

export function isResultCode(value: unknown): value is ResultCode {
  return typeof value === "string" && RESULT_CODE_SET.has(value);
}

export function isActionRequired(code: string | undefined): code is ActionRequiredResultCode {
  return code !== undefined && ACTION_REQUIRED_SET.has(code);
}

export function shouldCleanStateData(authResult: string): boolean {
  return STATE_DATA_CLEANUP_RESULT_CODES.has(authResult);
}

export type NormalizedResponse =
  | { isFinal: true; resultCode: BareFinalResultCode }
  | { isFinal: false; resultCode: ActionRequiredResultCode; action: GatewayAction | null }
  | { isFinal: true; resultCode: "PresentToShopper"; action: GatewayAction | null }
  | { isFinal: true; resultCode: "Received"; additionalData: Record<string, unknown> | null };

const BARE_FINAL_RESULT_CODES: ReadonlySet<string> = new Set(["Authorised", "Refused", "Error", POS_SUCCESS]);

type BareFinalResultCode = "Authorised" | "Refused" | "Error" | typeof POS_SUCCESS;

function isBareFinal(code: string): code is BareFinalResultCode {
  return BARE_FINAL_RESULT_CODES.has(code);
}

export function formatPaymentResponse(
  resultCode: string,
  action?: GatewayAction | null,
  additionalData?: Record<string, unknown> | null,
): NormalizedResponse {
  if (isBareFinal(resultCode)) {
    return { isFinal: true, resultCode };
  }
  if (isActionRequired(resultCode)) {
    return { isFinal: false, resultCode, action: action ?? null };
  }
  if (resultCode === "PresentToShopper") {
    return { isFinal: true, resultCode: "PresentToShopper", action: action ?? null };
  }
  if (resultCode === "Received") {
    return { isFinal: true, resultCode: "Received", additionalData: additionalData ?? null };
  }
  // Unknown codes never reach the caller.
  return { isFinal: true, resultCode: "Error" };
}
