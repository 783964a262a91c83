export type CheckoutStateData = Record<string, unknown>;

export interface TransientStateStorePort {
  getStateData(quoteId: string): Promise<CheckoutStateData>;
  setStateData(quoteId: string, data: CheckoutStateData): Promise<void>;
  /** Drops the quote's state data when `authResult` closes the checkout session. */
  clear(quoteId: string, authResult: string): Promise<void>;
}
