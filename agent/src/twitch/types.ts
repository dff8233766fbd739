/**
 * Shared Twitch chat types used by the client wrapper and the adapter.
 */

export interface ChatEvent {
  channel: string;
  /** Login name of the sender; tmi.js leaves it undefined on some notices */
  sender: string | undefined;
  message: string;
  /** Sent by this bot's own identity */
  self: boolean;
}

export interface ChatClient {
  onMessage(handler: (event: ChatEvent) => void): void;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
}
