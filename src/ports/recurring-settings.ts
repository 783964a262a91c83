import type { RecurringProcessingModel } from "../domain/types.js";

export interface RecurringSettingsPort {
  getRecurringProcessingModel(providerCode: string, storeId: string): Promise<RecurringProcessingModel>;
}
