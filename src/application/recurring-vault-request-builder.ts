import type { RecurringPaymentInput, RecurringPaymentRequest } from "../domain/types.js";
import { AppError } from "../infra/app-error.js";
import type { RecurringSettingsPort } from "../ports/recurring-settings.js";
import type { TransientStateStorePort } from "../ports/transient-state-store.js";

interface RecurringVaultRequestBuilderOptions {
  ccVaultCode: string;
}

export const TOKEN_TYPE_DETAIL = "tokenType";

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function parseTokenDetails(raw: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw.trim() === "" ? "{}" : raw);
  } catch {
    throw new AppError(422, "invalid_vault_token", "Vault token details must be valid JSON.");
  }
  if (!isObject(parsed)) {
    throw new AppError(422, "invalid_vault_token", "Vault token details must be a JSON object.");
  }
  return parsed;
}

/**
 * Builds the payment request body for a charge against a stored (vaulted) payment method.
 */
export class RecurringVaultRequestBuilder {
  constructor(
    private readonly stateStore: TransientStateStorePort,
    private readonly recurringSettings: RecurringSettingsPort,
    private readonly options: RecurringVaultRequestBuilderOptions,
  ) {}

  async build(input: RecurringPaymentInput): Promise<RecurringPaymentRequest> {
    const { payment, order } = input;
    const details = parseTokenDetails(payment.token.token_details);

    const body: Record<string, unknown> = { ...(await this.stateStore.getStateData(order.quote_id)) };

    const tokenType = details[TOKEN_TYPE_DETAIL];
    body.recurringProcessingModel =
      typeof tokenType === "string" && tokenType.length > 0
        ? tokenType
        : await this.recurringSettings.getRecurringProcessingModel(payment.provider_code, order.store_id);

    if (payment.method_code === this.options.ccVaultCode) {
      // Lets the storefront run the native 3DS challenge instead of an issuer redirect.
      const additionalData = isObject(body.additionalData) ? body.additionalData : {};
      body.additionalData = { ...additionalData, allow3DS2: true };
    } else {
      if (typeof details.type !== "string" || details.type.length === 0) {
        throw new AppError(422, "invalid_vault_token", "Vault token details must include the payment method type.");
      }
      body.paymentMethod = {
        type: details.type,
        storedPaymentMethodId: payment.token.gateway_token,
      };
    }

    return { body };
  }
}
