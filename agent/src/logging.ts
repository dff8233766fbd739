/**
 * Logging Setup for the Chat Tally Agent
 *
 * Initializes the centralized logging system with the agent's transports.
 */

import { nanoid } from "nanoid";
import {
  Logger,
  ConsoleTransport,
  FileTransport,
  type ConsoleWriter,
  type ILogger,
  type LogLevel,
  type LogTransport
} from "@chat-tally/shared/logging";

export interface LoggingOptions {
  /** Minimum level to log (default: "info") */
  minLevel?: LogLevel;
  /** Where console lines go; the terminal in production */
  write?: ConsoleWriter;
  /** Directory for JSON-lines log files; omitted = no file output */
  logDir?: string;
  /** Console colors (default: auto-detect) */
  colors?: boolean;
}

// ============================================
// INITIALIZATION
// ============================================

let logger: Logger | null = null;

/**
 * Initialize the logging system for the agent. Each call starts a new
 * session ID, so a log directory shared across runs stays separable.
 */
export function initAgentLogging(options: LoggingOptions = {}): Logger {
  const minLevel = options.minLevel || "info";

  const transports: LogTransport[] = [
    new ConsoleTransport({
      minLevel,
      colors: options.colors,
      write: options.write,
    }),
  ];

  if (options.logDir) {
    transports.push(new FileTransport({
      minLevel: "debug", // Files always get debug+
      logDir: options.logDir,
      filename: "chat-tally",
    }));
  }

  logger = new Logger({
    minLevel: options.logDir ? "debug" : minLevel,
    component: "chat-tally",
    sessionId: nanoid(10),
    transports,
  });

  return logger;
}

/**
 * Get the logger instance.
 * Throws if not initialized.
 */
export function getAgentLogger(): Logger {
  if (!logger) {
    throw new Error("Logger not initialized. Call initAgentLogging() first.");
  }
  return logger;
}

/**
 * Create a namespaced logger for a specific component.
 *
 * ```typescript
 * const storeLog = createComponentLogger("store");
 * storeLog.info("Cleared"); // logs as [chat-tally.store]
 * ```
 */
export function createComponentLogger(component: string): ILogger {
  return getAgentLogger().child({ component: `chat-tally.${component}` });
}
