/**
 * Publisher Tests
 *
 * Uses a temp directory for the file sink to avoid touching real files.
 */

import { describe, it, expect, vi, beforeEach, afterAll } from "vitest";
import { promises as fs } from "fs";
import * as path from "path";
import * as os from "os";
import { TallyStore } from "../tally/index.js";
import { Publisher } from "./publisher.js";
import { formatReport } from "./report.js";
import { FileSink } from "./sink.js";
import { MemorySink, StalledSink, createMemoryLogger } from "../__tests__/helpers.js";

const tempDir = path.join(os.tmpdir(), `chat-tally-publisher-test-${Date.now()}`);

beforeEach(async () => {
  await fs.rm(tempDir, { recursive: true, force: true });
  await fs.mkdir(tempDir, { recursive: true });
});

afterAll(async () => {
  await fs.rm(tempDir, { recursive: true, force: true });
});

// ============================================
// formatReport
// ============================================

describe("formatReport", () => {
  it("writes the header then one line per entry with CRLF endings", () => {
    expect(formatReport([
      { message: "pog", count: 3 },
      { message: "kekw", count: 1 },
    ])).toBe("Answers:\r\npog(3)\r\nkekw(1)\r\n");
  });

  it("is only the header for no entries", () => {
    expect(formatReport([])).toBe("Answers:\r\n");
  });
});

// ============================================
// Publisher.tick
// ============================================

describe("Publisher.tick", () => {
  it("publishes the pog scenario", async () => {
    const store = new TallyStore();
    const sink = new MemorySink();
    const publisher = new Publisher(store, sink);

    await store.record("A", "Pog");
    await store.record("B", "Pog");
    await store.record("C", "Pog");
    await store.record("A", "Pog");
    await store.record("B", "POG ");

    await expect(publisher.tick()).resolves.toBe(true);
    expect(sink.writes).toEqual(["Answers:\r\npog(3)\r\n"]);
  });

  it("does nothing while the tally is empty", async () => {
    const sink = new MemorySink();
    const publisher = new Publisher(new TallyStore(), sink);

    await expect(publisher.tick()).resolves.toBe(false);
    expect(sink.writes).toEqual([]);
  });

  it("publishes only the top three", async () => {
    const store = new TallyStore();
    const sink = new MemorySink();
    const publisher = new Publisher(store, sink);

    await store.record("a", "one");
    await store.record("a", "two");
    await store.record("b", "two");
    await store.record("a", "three");
    await store.record("a", "four");
    await store.record("b", "four");
    await store.record("c", "four");

    await publisher.tick();
    expect(sink.last).toBe("Answers:\r\nfour(3)\r\ntwo(2)\r\none(1)\r\n");
  });

  it("logs before writing", async () => {
    const { logger, messages } = createMemoryLogger();
    const store = new TallyStore();
    const publisher = new Publisher(store, new MemorySink(), logger);
    await store.record("a", "x");

    await publisher.tick();
    expect(messages()).toEqual(["Updating output file"]);
  });

  it("does not hold the tally lock while the sink writes", async () => {
    const store = new TallyStore();
    await store.record("a", "x");

    let releaseWrite!: () => void;
    const sink = { write: vi.fn(() => new Promise<void>(r => { releaseWrite = r; })) };
    const publisher = new Publisher(store, sink);

    const tick = publisher.tick();
    await vi.waitFor(() => expect(sink.write).toHaveBeenCalled());

    // Ingress keeps working while the write is stuck
    await expect(store.record("b", "x")).resolves.toMatchObject({ kind: "counted", count: 2 });

    releaseWrite();
    await expect(tick).resolves.toBe(true);
  });

  it("propagates sink failures to the caller", async () => {
    const store = new TallyStore();
    await store.record("a", "x");
    const publisher = new Publisher(store, { write: () => Promise.reject(new Error("disk full")) });

    await expect(publisher.tick()).rejects.toThrow("disk full");
  });
});

// ============================================
// Publisher.clear
// ============================================

describe("Publisher.clear", () => {
  it("resets the tally and overwrites the sink with the bare header", async () => {
    const store = new TallyStore();
    const sink = new MemorySink();
    await store.record("a", "x");

    await new Publisher(store, sink).clear();

    expect(await store.size()).toBe(0);
    expect(sink.writes).toEqual(["Answers:"]);
  });

  it("lands after a tick whose write was already under way", async () => {
    const store = new TallyStore();
    const sink = new StalledSink();
    const publisher = new Publisher(store, sink);
    await store.record("a", "pog");

    const tick = publisher.tick();
    await vi.waitFor(() => expect(sink.waiting).toBe(1));

    const clear = publisher.clear();
    // Queued behind the tick: nothing reset yet, no second write started
    await new Promise(resolve => setTimeout(resolve, 10));
    expect(sink.waiting).toBe(1);

    sink.releaseNext();
    await expect(tick).resolves.toBe(true);
    await vi.waitFor(() => expect(sink.waiting).toBe(1));
    sink.releaseNext();
    await clear;

    await expect(publisher.tick()).resolves.toBe(false);
    expect(sink.writes).toEqual(["Answers:\r\npog(1)\r\n", "Answers:"]);
  });

  it("a tick queued behind a clear sees the emptied tally", async () => {
    const store = new TallyStore();
    const sink = new MemorySink();
    const publisher = new Publisher(store, sink);
    await store.record("a", "pog");

    await Promise.all([publisher.clear(), publisher.tick()]);

    expect(sink.writes).toEqual(["Answers:"]);
  });
});

// ============================================
// Publisher.drain
// ============================================

describe("Publisher.drain", () => {
  it("waits for every queued write", async () => {
    const store = new TallyStore();
    const sink = new StalledSink();
    const publisher = new Publisher(store, sink);
    await store.record("a", "pog");

    const tick = publisher.tick();
    let drained = false;
    const draining = publisher.drain().then(() => { drained = true; });

    await vi.waitFor(() => expect(sink.waiting).toBe(1));
    expect(drained).toBe(false);

    sink.releaseNext();
    await Promise.all([tick, draining]);
    expect(drained).toBe(true);
    expect(sink.writes).toEqual(["Answers:\r\npog(1)\r\n"]);
  });

  it("resolves after a failed write", async () => {
    const store = new TallyStore();
    await store.record("a", "x");
    const publisher = new Publisher(store, { write: () => Promise.reject(new Error("disk full")) });

    await expect(publisher.tick()).rejects.toThrow("disk full");
    await expect(publisher.drain()).resolves.toBeUndefined();
  });
});

// ============================================
// FileSink
// ============================================

describe("FileSink", () => {
  it("overwrites the file in full on every write", async () => {
    const filePath = path.join(tempDir, "output.txt");
    const sink = new FileSink(filePath);

    await sink.write("Answers:\r\nlonger answer(2)\r\n");
    await sink.write("Answers:\r\nx(1)\r\n");

    expect(await fs.readFile(filePath, "utf-8")).toBe("Answers:\r\nx(1)\r\n");
  });

  it("resolves relative paths against the working directory", () => {
    expect(new FileSink("output.txt").filePath).toBe(path.resolve("output.txt"));
  });
});
