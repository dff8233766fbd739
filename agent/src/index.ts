/**
 * Chat Tally Agent
 *
 * Counts distinct answers in a Twitch channel's chat, writes the top three
 * to an output file every five seconds, and takes `clear` / `exit` from
 * the local console.
 */

import { initAgentLogging } from "./logging.js";
import { loadEnv, type AgentEnv } from "./core/env.js";
import { ConfigError, loadConfig } from "./core/config.js";
import { Terminal } from "./console/index.js";
import { FileSink } from "./publisher/index.js";
import { startAgent } from "./app.js";

async function main(): Promise<number> {
  const terminal = new Terminal(process.stdout);

  let env: AgentEnv;
  try {
    env = loadEnv();
  } catch (err) {
    if (err instanceof ConfigError) {
      terminal.writeLine("Invalid Config");
      for (const issue of err.issues) terminal.writeLine(`  ${issue}`);
      return 1;
    }
    throw err;
  }

  const logger = initAgentLogging({
    minLevel: env.logLevel,
    logDir: env.logDir,
    write: (text) => terminal.writeLine(text),
  });

  try {
    const config = loadConfig(env.configPath);
    const agent = await startAgent({
      config,
      sink: new FileSink(env.outputPath),
      terminal,
      input: process.stdin,
    });

    process.once("SIGINT", () => agent.flag.stop("SIGINT"));
    process.once("SIGTERM", () => agent.flag.stop("SIGTERM"));

    await agent.run();
    return 0;
  } catch (err) {
    if (err instanceof ConfigError) {
      terminal.writeLine("Invalid Config");
      logger.fatal("Could not load config", err, { path: err.configPath, issues: err.issues });
      return 1;
    }
    logger.fatal("Agent crashed", err);
    return 1;
  } finally {
    await logger.close();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    console.error("[chat-tally] Fatal:", err);
    process.exit(1);
  });
