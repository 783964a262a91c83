export interface QuoteServicePort {
  disableQuote(quoteId: string): Promise<void>;
}
