/**
 * File Transport
 *
 * Appends JSON lines to `<logDir>/<filename>-YYYY-MM-DD.log`, switching
 * files when the date changes. Node.js only.
 */

import * as fs from "fs";
import * as path from "path";
import { LogTransport, LogEntry, LogLevel } from "../types.js";

export interface FileTransportOptions {
  minLevel?: LogLevel;
  logDir: string;
  /** Base filename (default: "chat-tally") */
  filename?: string;
}

export class FileTransport implements LogTransport {
  name = "file";
  minLevel: LogLevel;
  private logDir: string;
  private filename: string;
  private currentPath = "";
  private stream: fs.WriteStream | null = null;

  constructor(options: FileTransportOptions) {
    this.minLevel = options.minLevel || "debug";
    this.logDir = options.logDir;
    this.filename = options.filename || "chat-tally";

    fs.mkdirSync(this.logDir, { recursive: true });
  }

  /** Path of the file today's entries go to */
  getLogPath(date: Date = new Date()): string {
    const day = date.toISOString().slice(0, 10);
    return path.join(this.logDir, `${this.filename}-${day}.log`);
  }

  log(entry: LogEntry): void {
    const target = this.getLogPath(new Date(entry.timestamp));
    if (!this.stream || target !== this.currentPath) {
      this.stream?.end();
      this.currentPath = target;
      this.stream = fs.createWriteStream(target, { flags: "a" });
      this.stream.on("error", (err: Error) => {
        console.error("[FileTransport] Write error:", err);
      });
    }
    this.stream.write(JSON.stringify(entry) + "\n");
  }

  async flush(): Promise<void> {
    const stream = this.stream;
    if (!stream) return;
    // Writes complete in order, so an empty write's callback marks the tail
    await new Promise<void>((resolve) => stream.write("", () => resolve()));
  }

  async close(): Promise<void> {
    const stream = this.stream;
    this.stream = null;
    if (!stream) return;
    await new Promise<void>((resolve) => stream.end(() => resolve()));
  }
}
