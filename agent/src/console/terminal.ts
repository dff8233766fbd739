/**
 * Terminal — the one place console output goes through.
 *
 * Knows the operator's unsubmitted input line. A line written while that
 * input is non-empty clears the screen line, prints the new text, then
 * redraws the input, so log output and typing never mangle each other.
 *
 * All writes are synchronous: a write reads the input snapshot and emits
 * it without yielding, so no key handler can run in between.
 */

const CLEAR_LINE = "\r\x1b[2K";

export interface TerminalOutput {
  write(chunk: string): boolean;
}

export class Terminal {
  private readInput: () => string = () => "";

  constructor(private readonly out: TerminalOutput) {}

  /** Register the source of the in-progress input line. */
  attachInput(readInput: () => string): void {
    this.readInput = readInput;
  }

  writeLine(text: string): void {
    const pending = this.readInput();
    if (pending.length === 0) {
      this.out.write(text + "\n");
      return;
    }
    this.out.write(CLEAR_LINE + text + "\n" + pending);
  }

  /** Echo typed characters at the cursor */
  echo(chars: string): void {
    this.out.write(chars);
  }

  /** Redraw the current line from scratch (after a deletion) */
  redraw(line: string): void {
    this.out.write(CLEAR_LINE + line);
  }

  newline(): void {
    this.out.write("\n");
  }
}
