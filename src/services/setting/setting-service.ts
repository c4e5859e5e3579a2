import { DEFAULT_SETTINGS_ID } from "src/lib/constant";
import { SettingModel } from "src/models/setting/setting-schema";

export const findGlobalApiKeyHashService = async (timeoutMs: number): Promise<string | null> => {
  const setting = await SettingModel.findById(DEFAULT_SETTINGS_ID).maxTimeMS(timeoutMs).exec();
  return setting ? setting.encrypted_global_api_key : null;
};
