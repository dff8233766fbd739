/**
 * Shared test fixtures: an in-memory logger, sinks, terminal output and
 * chat client.
 */

import { Logger, type LogEntry } from "@chat-tally/shared/logging";
import type { OutputSink } from "../publisher/index.js";
import type { TerminalOutput } from "../console/index.js";
import type { ChatClient, ChatEvent } from "../twitch/index.js";

export function createMemoryLogger(): { logger: Logger; entries: LogEntry[]; messages: () => string[] } {
  const entries: LogEntry[] = [];
  const logger = new Logger({
    minLevel: "trace",
    component: "test",
    transports: [{ name: "memory", minLevel: "trace", log: (entry) => { entries.push(entry); } }],
  });
  return { logger, entries, messages: () => entries.map(e => e.message) };
}

export class MemorySink implements OutputSink {
  readonly writes: string[] = [];

  async write(content: string): Promise<void> {
    this.writes.push(content);
  }

  get last(): string | undefined {
    return this.writes[this.writes.length - 1];
  }
}

/** Sink whose writes stay pending until released, in call order. */
export class StalledSink implements OutputSink {
  readonly writes: string[] = [];
  private releases: Array<() => void> = [];

  write(content: string): Promise<void> {
    return new Promise<void>((resolve) => {
      this.releases.push(() => {
        this.writes.push(content);
        resolve();
      });
    });
  }

  get waiting(): number {
    return this.releases.length;
  }

  releaseNext(): void {
    this.releases.shift()?.();
  }
}

export class MemoryOutput implements TerminalOutput {
  readonly chunks: string[] = [];

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  get text(): string {
    return this.chunks.join("");
  }
}

export class FakeChatClient implements ChatClient {
  connected = false;
  failConnect: Error | null = null;
  private handlers: Array<(event: ChatEvent) => void> = [];

  onMessage(handler: (event: ChatEvent) => void): void {
    this.handlers.push(handler);
  }

  async connect(): Promise<void> {
    if (this.failConnect) throw this.failConnect;
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    this.connected = false;
  }

  emit(sender: string | undefined, message: string, self = false): void {
    for (const handler of this.handlers) {
      handler({ channel: "#testchannel", sender, message, self });
    }
  }
}
