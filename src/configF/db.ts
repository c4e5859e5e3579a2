import mongoose from "mongoose";
import type { AppConfig } from "src/configF/env";

const connectDB = async (config: AppConfig) => {
  try {
    await mongoose.connect(config.mongodbUri, {
      maxPoolSize: config.maxPoolSize,
      serverSelectionTimeoutMS: config.serverSelectionTimeoutMs,
    });
    console.log("MongoDB connected");
  } catch (error) {
    console.error("MongoDB connection error:", error);
    throw error;
  }
};

export const disconnectDB = async () => {
  await mongoose.disconnect();
  console.log("MongoDB disconnected");
};

export default connectDB;
