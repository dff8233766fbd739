/**
 * Twitch IRC client — thin wrapper over tmi.js.
 *
 * The rest of the agent only sees ChatClient, so tests can drive the
 * adapter with an in-process fake instead of a socket.
 */

import tmi from "tmi.js";
import type { ILogger } from "@chat-tally/shared/logging";
import type { ChatConfig } from "../core/config.js";
import type { ChatClient, ChatEvent } from "./types.js";

export function toOAuthPassword(token: string): string {
  return token.startsWith("oauth:") ? token : `oauth:${token}`;
}

export function createTmiClient(config: ChatConfig, log?: ILogger): ChatClient {
  const client = new tmi.Client({
    options: { debug: false },
    connection: { reconnect: true, secure: true },
    identity: {
      username: config.name,
      password: toOAuthPassword(config.oauthToken),
    },
    channels: [config.channel],
    // tmi.js would print straight to stdout otherwise
    logger: {
      info: (message: string) => log?.debug(message),
      warn: (message: string) => log?.warn(message),
      error: (message: string) => log?.error(message),
    },
  });

  return {
    onMessage(handler: (event: ChatEvent) => void): void {
      client.on("message", (channel, tags, message, self) => {
        handler({ channel, sender: tags.username, message, self });
      });
    },
    async connect(): Promise<void> {
      await client.connect();
    },
    async disconnect(): Promise<void> {
      await client.disconnect();
    },
  };
}
