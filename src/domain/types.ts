export type OrderState =
  | "pending_payment"
  | "new"
  | "processing"
  | "complete"
  | "closed"
  | "canceled"
  | "holded";

export type OrderActionFlag = "cancel" | "hold" | "unhold";

export type GatewayAction = Record<string, unknown>;

export interface GatewayPaymentMethod {
  brand?: string;
  type?: string;
}

export interface GatewayResponse {
  resultCode?: string;
  authResult?: string;
  action?: GatewayAction;
  additionalData?: Record<string, unknown>;
  pspReference?: string;
  paymentMethod?: GatewayPaymentMethod;
  details?: Record<string, unknown>;
  donationToken?: string;
}

export interface OrderPaymentRecord {
  method: string;
  additional_information: Record<string, unknown>;
  cc_trans_id: string | null;
  last_trans_id: string | null;
  transaction_id: string | null;
}

export interface OrderRecord {
  id: string;
  increment_id: string;
  quote_id: string;
  store_id: string;
  state: OrderState;
  status: string;
  payment: OrderPaymentRecord;
  action_flags: Partial<Record<OrderActionFlag, boolean>>;
  result_event_code: string | null;
  created_at: string;
  updated_at: string;
}

export interface OrderHistoryEntry {
  id: string;
  order_id: string;
  status: string;
  comment: string;
  entity_name: "order";
  created_at: string;
}

export interface VaultPaymentToken {
  gateway_token: string;
  payment_method_code: string;
  customer_reference: string | null;
  token_details: string;
  created_at: string;
}

export type RecurringProcessingModel = "CardOnFile" | "Subscription" | "UnscheduledCardOnFile";

export interface RecurringPaymentInput {
  payment: {
    method_code: string;
    provider_code: string;
    token: Pick<VaultPaymentToken, "gateway_token" | "token_details">;
  };
  order: Pick<OrderRecord, "quote_id" | "store_id">;
}

export interface RecurringPaymentRequest {
  body: Record<string, unknown>;
}
