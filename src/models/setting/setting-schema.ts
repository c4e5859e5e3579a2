import mongoose, { Schema } from "mongoose";

export interface ISetting {
  _id: string;
  encrypted_global_api_key: string;
}

const SettingSchema = new Schema<ISetting>(
  {
    _id: { type: String, required: true },
    // hex SHA3-256 digest of the global API key
    encrypted_global_api_key: { type: String, required: true },
  },
  { collection: "settings", versionKey: false }
);

export const SettingModel = mongoose.model<ISetting>("Setting", SettingSchema);
