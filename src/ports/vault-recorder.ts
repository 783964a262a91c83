import type { GatewayResponse, OrderPaymentRecord, VaultPaymentToken } from "../domain/types.js";

export interface VaultRecorderPort {
  recordRecurringDetails(payment: OrderPaymentRecord, response: GatewayResponse): Promise<void>;
  listTokens(customerReference?: string): Promise<VaultPaymentToken[]>;
}
