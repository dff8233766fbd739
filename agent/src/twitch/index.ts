/**
 * Twitch Module
 */

export { TwitchAdapter, type ChatClientFactory } from "./adapter.js";
export { createTmiClient, toOAuthPassword } from "./client.js";
export type { ChatClient, ChatEvent } from "./types.js";
