import type { QuoteServicePort } from "../../ports/quote-service.js";

export class InMemoryQuoteService implements QuoteServicePort {
  private readonly activeQuotes = new Map<string, boolean>();

  registerQuote(quoteId: string): void {
    this.activeQuotes.set(quoteId, true);
  }

  isActive(quoteId: string): boolean {
    return this.activeQuotes.get(quoteId) ?? false;
  }

  // Quotes created outside this process are recorded as disabled on first sight.
  async disableQuote(quoteId: string): Promise<void> {
    this.activeQuotes.set(quoteId, false);
  }
}
