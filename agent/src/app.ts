/**
 * Agent assembly — builds the store, publisher, console and chat bridge
 * and wires them together. Kept apart from index.ts so the whole agent can
 * run in-process against fakes.
 */

import type { ILogger } from "@chat-tally/shared/logging";
import { createComponentLogger } from "./logging.js";
import type { ChatConfig } from "./core/config.js";
import { RunningFlag } from "./core/running-flag.js";
import { TallyStore, createIngressHandler } from "./tally/index.js";
import { Publisher, PUBLISH_INTERVAL_MS, type OutputSink } from "./publisher/index.js";
import {
  LineEditor,
  attachKeyboard,
  createCommandDispatcher,
  type CommandResult,
  type KeyboardInput,
  type Terminal,
} from "./console/index.js";
import { TwitchAdapter, type ChatClientFactory } from "./twitch/index.js";
import { startPeriodicManager, stopPeriodicManager } from "./periodic/index.js";

export interface AgentDeps {
  config: ChatConfig;
  sink: OutputSink;
  terminal: Terminal;
  /** Keyboard stream; omitted when there is no interactive console */
  input?: KeyboardInput;
  createClient?: ChatClientFactory;
}

export interface RunningAgent {
  flag: RunningFlag;
  store: TallyStore;
  publisher: Publisher;
  editor: LineEditor;
  chat: TwitchAdapter;
  dispatch: (line: string) => Promise<CommandResult>;
  /** Resolves after the running flag clears and shutdown completes */
  run(): Promise<void>;
  shutdown(): Promise<void>;
}

export async function startAgent(deps: AgentDeps): Promise<RunningAgent> {
  const log: ILogger = createComponentLogger("agent");
  const consoleLog = createComponentLogger("console");

  const flag = new RunningFlag();
  const store = new TallyStore(createComponentLogger("store"));
  const publisher = new Publisher(store, deps.sink, createComponentLogger("publisher"));

  const dispatch = createCommandDispatcher({
    publisher,
    flag,
    terminal: deps.terminal,
    log: consoleLog,
  });

  const editor = new LineEditor(deps.terminal, {
    onSubmit: async (line) => {
      await dispatch(line);
    },
    onInterrupt: () => {
      if (flag.stop("interrupt")) consoleLog.info("Interrupted");
    },
  });

  const detachKeyboard = deps.input
    ? attachKeyboard(deps.input, (key) => {
        editor.handleKey(key).catch((err: unknown) => {
          consoleLog.error("Key handling failed", err);
        });
      })
    : null;

  const chat = new TwitchAdapter(
    deps.config,
    createIngressHandler(store, createComponentLogger("ingress")),
    createComponentLogger("twitch"),
    deps.createClient,
  );
  await chat.start();

  startPeriodicManager([
    {
      id: "publish",
      name: "Publish answers",
      intervalMs: PUBLISH_INTERVAL_MS,
      initialDelayMs: PUBLISH_INTERVAL_MS,
      enabled: true,
      run: async () => {
        await publisher.tick();
      },
    },
  ], { log: createComponentLogger("periodic") });

  log.info("Ready. Commands: clear, exit");

  let stopped: Promise<void> | null = null;
  const shutdown = (): Promise<void> => {
    if (!stopped) {
      stopped = (async () => {
        flag.stop("shutdown");
        await stopPeriodicManager();
        detachKeyboard?.();
        await chat.stop();
        // A tick or clear still writing must finish before the process exits
        await publisher.drain();
        log.info("Stopped", { reason: flag.stopReason });
      })();
    }
    return stopped;
  };

  return {
    flag,
    store,
    publisher,
    editor,
    chat,
    dispatch,
    async run() {
      await flag.wait();
      await shutdown();
    },
    shutdown,
  };
}
