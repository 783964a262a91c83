import type { GatewayResponse, OrderPaymentRecord, VaultPaymentToken } from "../../domain/types.js";
import type { ClockPort } from "../../infra/clock.js";
import type { VaultRecorderPort } from "../../ports/vault-recorder.js";

export const RECURRING_DETAIL_REFERENCE = "recurring.recurringDetailReference";
export const RECURRING_SHOPPER_REFERENCE = "recurring.shopperReference";
export const RECURRING_PROCESSING_MODEL = "recurringProcessingModel";

interface InMemoryVaultRecorderOptions {
  enabled: boolean;
  clock: ClockPort;
}

function readString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

export class InMemoryVaultRecorder implements VaultRecorderPort {
  private readonly tokens = new Map<string, VaultPaymentToken>();

  constructor(private readonly options: InMemoryVaultRecorderOptions) {}

  async recordRecurringDetails(payment: OrderPaymentRecord, response: GatewayResponse): Promise<void> {
    if (!this.options.enabled) {
      return;
    }
    const additionalData = response.additionalData ?? {};
    const gatewayToken = readString(additionalData, RECURRING_DETAIL_REFERENCE);
    if (!gatewayToken) {
      return;
    }

    const details: Record<string, string> = {};
    if (response.paymentMethod?.type) {
      details.type = response.paymentMethod.type;
    }
    const tokenType = readString(additionalData, RECURRING_PROCESSING_MODEL);
    if (tokenType) {
      details.tokenType = tokenType;
    }

    this.tokens.set(gatewayToken, {
      gateway_token: gatewayToken,
      payment_method_code: payment.method,
      customer_reference: readString(additionalData, RECURRING_SHOPPER_REFERENCE) ?? null,
      token_details: JSON.stringify(details),
      created_at: this.options.clock.nowIso(),
    });
  }

  async listTokens(customerReference?: string): Promise<VaultPaymentToken[]> {
    return [...this.tokens.values()].filter(
      (token) => customerReference === undefined || token.customer_reference === customerReference,
    );
  }
}
