/**
 * Configuration — the chat credentials file.
 *
 * `config.json` holds the Twitch OAuth token and the bot's name, read once
 * at startup. Anything unreadable or off-schema is a ConfigError, which
 * main() turns into "Invalid Config" and a non-zero exit.
 */

import { readFileSync } from "fs";
import * as path from "path";
import { z } from "zod";

// ============================================
// SCHEMA
// ============================================

const ConfigSchema = z.object({
  OAuthToken: z.string().min(1),
  Name: z.string().min(1),
  /** Channel to join; defaults to the bot's own channel */
  Channel: z.string().min(1).optional(),
});

export interface ChatConfig {
  oauthToken: string;
  name: string;
  channel: string;
}

// ============================================
// ERRORS
// ============================================

export class ConfigError extends Error {
  readonly configPath: string;
  readonly issues: string[];

  constructor(configPath: string, issues: string[], options?: { cause?: unknown }) {
    super(`Invalid Config: ${configPath}`, options);
    this.name = "ConfigError";
    this.configPath = configPath;
    this.issues = issues;
  }
}

// ============================================
// LOADING
// ============================================

export function parseConfig(raw: string, configPath: string): ChatConfig {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(configPath, ["file is not valid JSON"], { cause: err });
  }

  const result = ConfigSchema.safeParse(json);
  if (!result.success) {
    throw new ConfigError(
      configPath,
      result.error.issues.map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    );
  }

  const { OAuthToken, Name, Channel } = result.data;
  return {
    oauthToken: OAuthToken,
    name: Name,
    channel: Channel ?? Name,
  };
}

export function loadConfig(configPath: string): ChatConfig {
  const resolved = path.resolve(configPath);
  let raw: string;
  try {
    raw = readFileSync(resolved, "utf-8");
  } catch (err) {
    throw new ConfigError(resolved, ["file could not be read"], { cause: err });
  }
  // Strip UTF-8 BOM
  if (raw.charCodeAt(0) === 0xFEFF) raw = raw.slice(1);
  return parseConfig(raw, resolved);
}
