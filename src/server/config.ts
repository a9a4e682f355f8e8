import * as dotenv from "dotenv";
import { z } from "zod";
import { setLogLevel } from "./logger";

const EnvSchema = z.object({
  HOST: z.string().min(1).default("0.0.0.0"),
  PORT: z.coerce.number().int().min(1).max(65535).default(8010),
  BOT_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  BOT_MAX_STEPS: z.coerce.number().int().positive().default(500),
  CHAT_MAX_LENGTH: z.coerce.number().int().positive().default(300),
  CHAT_RECENT: z.coerce.number().int().positive().default(30),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info")
});

export type ServerConfig = z.infer<typeof EnvSchema>;

/**
 * Reads `.env` (when present) into process.env, then validates the variables.
 * Throws a ZodError at boot rather than running with a half-parsed config.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, useDotenv = true): ServerConfig {
  if (useDotenv) {
    dotenv.config();
  }
  const config = EnvSchema.parse(env);
  setLogLevel(config.LOG_LEVEL);
  return config;
}
