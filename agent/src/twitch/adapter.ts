/**
 * Twitch Adapter — bridge between chat and the tally.
 *
 * Connects the client, forwards every chat message to the ingress handler,
 * and tracks in-flight records so shutdown can wait for them. Connection
 * failures are logged, never thrown: the console keeps working offline.
 */

import type { ILogger } from "@chat-tally/shared/logging";
import type { ChatConfig } from "../core/config.js";
import type { IngressHandler } from "../tally/index.js";
import { createTmiClient } from "./client.js";
import type { ChatClient, ChatEvent } from "./types.js";

export type ChatClientFactory = (config: ChatConfig, log?: ILogger) => ChatClient;

export class TwitchAdapter {
  private client: ChatClient | null = null;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    private readonly config: ChatConfig,
    private readonly ingress: IngressHandler,
    private readonly log?: ILogger,
    private readonly createClient: ChatClientFactory = createTmiClient,
  ) {}

  /** Returns false when the initial connection failed. */
  async start(): Promise<boolean> {
    if (this.client) return true;

    const client = this.createClient(this.config, this.log);
    client.onMessage((event) => this.handleMessage(event));
    this.client = client;

    this.log?.info(`Connecting to #${this.config.channel} as ${this.config.name}`);
    try {
      await client.connect();
      this.log?.info("Connected to Twitch chat");
      return true;
    } catch (err) {
      this.log?.error("Failed to connect to Twitch chat", err);
      return false;
    }
  }

  async stop(): Promise<void> {
    const client = this.client;
    this.client = null;
    if (client) {
      try {
        await client.disconnect();
      } catch (err) {
        this.log?.debug("Disconnect failed", { reason: String(err) });
      }
    }
    await Promise.allSettled(this.inFlight);
  }

  private handleMessage(event: ChatEvent): void {
    if (event.self) return;

    const task: Promise<void> = this.ingress(event.sender, event.message)
      .catch((err: unknown) => {
        this.log?.error("Failed to record chat message", err, { sender: event.sender });
      })
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }
}
