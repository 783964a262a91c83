import type { RecurringProcessingModel } from "../../domain/types.js";
import type { RecurringSettingsPort } from "../../ports/recurring-settings.js";

interface InMemoryRecurringSettingsOptions {
  defaultModel: RecurringProcessingModel;
  modelsByProvider?: Record<string, RecurringProcessingModel>;
}

export class InMemoryRecurringSettings implements RecurringSettingsPort {
  constructor(private readonly options: InMemoryRecurringSettingsOptions) {}

  async getRecurringProcessingModel(providerCode: string, _storeId: string): Promise<RecurringProcessingModel> {
    return this.options.modelsByProvider?.[providerCode] ?? this.options.defaultModel;
  }
}
