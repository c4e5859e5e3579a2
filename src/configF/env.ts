import { configDotenv } from "dotenv";
import { z } from "zod";

configDotenv();

const envSchema = z.object({
  MONGODB_URI: z.string().min(1),
  PORT: z.coerce.number().int().positive().default(8000),
  QUERY_TIMEOUT_MS: z.coerce.number().int().positive().default(300),
  MONGODB_MAX_POOL_SIZE: z.coerce.number().int().positive().default(20),
  MONGODB_SERVER_SELECTION_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  MAX_STATISTIC_TEXT_LENGTH: z.coerce.number().int().positive().default(8192),
});

export interface AppConfig {
  mongodbUri: string;
  port: number;
  queryTimeoutMs: number;
  maxPoolSize: number;
  serverSelectionTimeoutMs: number;
  maxStatisticTextLength: number;
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join(", ");
    throw new Error(`Invalid environment configuration: ${problems}`);
  }

  const { data } = parsed;
  return {
    mongodbUri: data.MONGODB_URI,
    port: data.PORT,
    queryTimeoutMs: data.QUERY_TIMEOUT_MS,
    maxPoolSize: data.MONGODB_MAX_POOL_SIZE,
    serverSelectionTimeoutMs: data.MONGODB_SERVER_SELECTION_TIMEOUT_MS,
    maxStatisticTextLength: data.MAX_STATISTIC_TEXT_LENGTH,
  };
};
