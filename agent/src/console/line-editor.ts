/**
 * Line Editor
 *
 * Owns the operator's input buffer. Key handling runs under the input
 * lock; a submitted line is dispatched only after the lock is released,
 * so a command that takes the tally lock never nests inside this one.
 */

import { AsyncLock } from "../core/lock.js";
import type { Terminal } from "./terminal.js";

export type KeyPress =
  | { kind: "char"; char: string }
  | { kind: "backspace" }
  | { kind: "submit" }
  | { kind: "interrupt" };

export interface LineEditorOptions {
  onSubmit: (line: string) => Promise<void>;
  /** Ctrl+C; raw mode keeps it from raising SIGINT */
  onInterrupt: () => void;
}

export class LineEditor {
  private readonly lock = new AsyncLock();
  private buffer: string[] = [];

  constructor(
    private readonly terminal: Terminal,
    private readonly options: LineEditorOptions,
  ) {
    terminal.attachInput(() => this.contents);
  }

  get contents(): string {
    return this.buffer.join("");
  }

  async handleKey(key: KeyPress): Promise<void> {
    if (key.kind === "interrupt") {
      this.options.onInterrupt();
      return;
    }

    const submitted = await this.lock.runExclusive((): string | null => {
      switch (key.kind) {
        case "char":
          this.buffer.push(key.char);
          this.terminal.echo(key.char);
          return null;
        case "backspace":
          if (this.buffer.length > 0) {
            this.buffer.pop();
            this.terminal.redraw(this.buffer.join(""));
          }
          return null;
        case "submit": {
          const line = this.buffer.join("");
          this.buffer = [];
          this.terminal.newline();
          return line;
        }
        default:
          return null;
      }
    });

    if (submitted !== null) {
      await this.options.onSubmit(submitted);
    }
  }
}
