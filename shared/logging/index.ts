/**
 * Centralized Logging System
 *
 * Usage:
 *
 * ```typescript
 * import { Logger, ConsoleTransport, FileTransport } from "@chat-tally/shared/logging";
 *
 * const logger = new Logger({
 *   minLevel: "debug",
 *   component: "chat-tally",
 *   transports: [
 *     new ConsoleTransport({ colors: true }),
 *     new FileTransport({ logDir: "./logs" })
 *   ]
 * });
 *
 * logger.info("Starting up", { channel: "somechannel" });
 * const storeLog = logger.child({ component: "chat-tally.store" });
 * storeLog.debug("Cleared");
 * ```
 */

export {
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  isLogLevel,
  type LogLevel,
  type LogEntry,
  type LogTransport,
  type LoggerConfig,
  type ILogger
} from "./types.js";

export { Logger } from "./logger.js";

export {
  ConsoleTransport,
  FileTransport,
  type ConsoleTransportOptions,
  type ConsoleWriter,
  type FileTransportOptions
} from "./transports/index.js";
