/**
 * Environment — runtime settings from process.env (and ./.env).
 */

import dotenv from "dotenv";
import { z } from "zod";
import { isLogLevel, type LogLevel } from "@chat-tally/shared/logging";
import { ConfigError } from "./config.js";

const emptyToUndefined = (value: unknown): unknown => {
  if (typeof value === "string" && value.trim() === "") return undefined;
  return value;
};

const EnvSchema = z.object({
  CHAT_TALLY_CONFIG: z.preprocess(emptyToUndefined, z.string().default("config.json")),
  CHAT_TALLY_OUTPUT: z.preprocess(emptyToUndefined, z.string().default("output.txt")),
  CHAT_TALLY_LOG_LEVEL: z.preprocess(
    emptyToUndefined,
    z.string().refine(isLogLevel, { message: "not a log level" }).default("info"),
  ),
  CHAT_TALLY_LOG_DIR: z.preprocess(emptyToUndefined, z.string().optional()),
});

export interface AgentEnv {
  configPath: string;
  outputPath: string;
  logLevel: LogLevel;
  logDir?: string;
}

export function parseEnv(source: NodeJS.ProcessEnv): AgentEnv {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    throw new ConfigError(
      "environment",
      result.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`),
    );
  }

  const env = result.data;
  return {
    configPath: env.CHAT_TALLY_CONFIG,
    outputPath: env.CHAT_TALLY_OUTPUT,
    logLevel: env.CHAT_TALLY_LOG_LEVEL,
    logDir: env.CHAT_TALLY_LOG_DIR,
  };
}

/**
 * Load ./.env into process.env (existing variables win), then validate.
 */
export function loadEnv(): AgentEnv {
  dotenv.config();
  return parseEnv(process.env);
}
