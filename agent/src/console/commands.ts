/**
 * Operator Commands
 *
 * `clear` resets the tally and blanks the output file, `exit` clears the
 * running flag. Anything else prints usage. Output goes through the
 * terminal so it lands cleanly around the operator's typing.
 */

import type { ILogger } from "@chat-tally/shared/logging";
import type { Publisher } from "../publisher/index.js";
import type { RunningFlag } from "../core/running-flag.js";
import type { Terminal } from "./terminal.js";

export const COMMANDS = {
  clear: "clear message logs",
  exit: "exit the program",
} as const;

export type CommandName = keyof typeof COMMANDS;
export type CommandResult = CommandName | "unknown";

export interface CommandContext {
  publisher: Publisher;
  flag: RunningFlag;
  terminal: Terminal;
  log?: ILogger;
}

function isCommandName(value: string): value is CommandName {
  return Object.prototype.hasOwnProperty.call(COMMANDS, value);
}

export function createCommandDispatcher(ctx: CommandContext): (line: string) => Promise<CommandResult> {
  return async (line) => {
    const input = line.trim();

    if (!isCommandName(input)) {
      ctx.terminal.writeLine(`Unknown command: ${input}`);
      ctx.terminal.writeLine("Available commands:");
      for (const [name, description] of Object.entries(COMMANDS)) {
        ctx.terminal.writeLine(`${name} - ${description}`);
      }
      return "unknown";
    }

    switch (input) {
      case "clear":
        try {
          await ctx.publisher.clear();
        } catch (err) {
          ctx.log?.error("Failed to blank output file", err);
        }
        ctx.terminal.writeLine("Cleared Message Log");
        break;
      case "exit":
        if (ctx.flag.stop("exit command")) {
          ctx.log?.info("Exit requested");
        }
        break;
    }
    return input;
  };
}
