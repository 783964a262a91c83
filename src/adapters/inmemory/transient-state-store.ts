import { shouldCleanStateData } from "../../domain/result-codes.js";
import type { CheckoutStateData, TransientStateStorePort } from "../../ports/transient-state-store.js";

export class InMemoryTransientStateStore implements TransientStateStorePort {
  private readonly stateByQuote = new Map<string, CheckoutStateData>();

  async getStateData(quoteId: string): Promise<CheckoutStateData> {
    return structuredClone(this.stateByQuote.get(quoteId) ?? {});
  }

  async setStateData(quoteId: string, data: CheckoutStateData): Promise<void> {
    this.stateByQuote.set(quoteId, structuredClone(data));
  }

  async clear(quoteId: string, authResult: string): Promise<void> {
    if (!shouldCleanStateData(authResult)) {
      return;
    }
    this.stateByQuote.delete(quoteId);
  }
}
