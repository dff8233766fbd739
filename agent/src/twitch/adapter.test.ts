/**
 * Twitch Adapter Tests
 *
 * Drives the adapter with an in-process fake client; no sockets.
 */

import { describe, it, expect } from "vitest";
import { TwitchAdapter } from "./adapter.js";
import { toOAuthPassword } from "./client.js";
import { TallyStore, createIngressHandler } from "../tally/index.js";
import type { ChatConfig } from "../core/config.js";
import { FakeChatClient, createMemoryLogger } from "../__tests__/helpers.js";

const config: ChatConfig = { oauthToken: "test-token", name: "quizbot", channel: "quizbot" };

function setup() {
  const store = new TallyStore();
  const client = new FakeChatClient();
  const { logger, entries } = createMemoryLogger();
  const adapter = new TwitchAdapter(config, createIngressHandler(store), logger, () => client);
  return { store, client, adapter, entries };
}

describe("toOAuthPassword", () => {
  it("adds the oauth: prefix once", () => {
    expect(toOAuthPassword("test-token")).toBe("oauth:test-token");
    expect(toOAuthPassword("oauth:test-token")).toBe("oauth:test-token");
  });
});

describe("TwitchAdapter", () => {
  it("connects and forwards chat messages to the tally", async () => {
    const { store, client, adapter } = setup();

    await expect(adapter.start()).resolves.toBe(true);
    expect(client.connected).toBe(true);

    client.emit("alice", "Pog");
    client.emit("bob", "pog ");
    client.emit("alice", "POG");
    await adapter.stop();

    expect(await store.topN(3)).toEqual([{ message: "pog", count: 2 }]);
  });

  it("ignores the bot's own messages and events without a sender", async () => {
    const { store, client, adapter } = setup();
    await adapter.start();

    client.emit("quizbot", "hello", true);
    client.emit(undefined, "hello");
    await adapter.stop();

    expect(await store.size()).toBe(0);
  });

  it("logs a failed connection instead of throwing", async () => {
    const { client, adapter, entries } = setup();
    client.failConnect = new Error("Login authentication failed");

    await expect(adapter.start()).resolves.toBe(false);

    const failure = entries.find(e => e.level === "error");
    expect(failure?.message).toBe("Failed to connect to Twitch chat");
    expect(failure?.error?.message).toBe("Login authentication failed");
  });

  it("only creates one client across repeated starts", async () => {
    let created = 0;
    const client = new FakeChatClient();
    const adapter = new TwitchAdapter(config, createIngressHandler(new TallyStore()), undefined, () => {
      created++;
      return client;
    });

    await adapter.start();
    await adapter.start();
    expect(created).toBe(1);
  });

  it("stop() disconnects and waits for in-flight records", async () => {
    let release: () => void = () => undefined;
    const recorded: string[] = [];
    const client = new FakeChatClient();
    const adapter = new TwitchAdapter(config, async (sender, message) => {
      await new Promise<void>(resolve => { release = resolve; });
      recorded.push(`${sender}:${message}`);
    }, undefined, () => client);
    await adapter.start();
    client.emit("carol", "Kappa");

    let stopped = false;
    const stopping = adapter.stop().then(() => { stopped = true; });
    await new Promise(resolve => setTimeout(resolve, 10));
    expect(client.connected).toBe(false);
    expect(stopped).toBe(false);

    release();
    await stopping;
    expect(recorded).toEqual(["carol:Kappa"]);
  });

  it("does not log the oauth token", async () => {
    const { adapter, entries } = setup();
    await adapter.start();

    expect(JSON.stringify(entries)).not.toContain("test-token");
  });
});
