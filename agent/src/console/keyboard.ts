/**
 * Keyboard — raw key presses from a TTY stream.
 *
 * readline's keypress decoder turns stdin bytes into events; in raw mode
 * nothing is echoed or line-buffered by the terminal, the Line Editor does
 * that. Listening is event-driven, so no other loop ever waits on it.
 */

import * as readline from "readline";
import type { KeyPress } from "./line-editor.js";

const CONTROL_CHARS = /\p{C}/u;

export function toKeyPress(str: string | undefined, key: readline.Key | undefined): KeyPress | null {
  if (key?.ctrl && key.name === "c") return { kind: "interrupt" };

  switch (key?.name) {
    case "return":
    case "enter":
      return { kind: "submit" };
    case "backspace":
      return { kind: "backspace" };
  }

  if (key?.ctrl || key?.meta) return null;
  if (str === undefined || str.length === 0 || CONTROL_CHARS.test(str)) return null;
  return { kind: "char", char: str };
}

export interface KeyboardInput extends NodeJS.ReadableStream {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
}

/**
 * Start forwarding key presses. Returns a function that stops listening
 * and restores the terminal mode.
 */
export function attachKeyboard(input: KeyboardInput, onKey: (key: KeyPress) => void): () => void {
  readline.emitKeypressEvents(input);
  if (input.isTTY) input.setRawMode?.(true);

  let previousKey: string | undefined;
  const listener = (str: string | undefined, key: readline.Key | undefined): void => {
    // Piped CRLF decodes as "return" then "enter": one line, one submit
    const afterReturn = previousKey === "return";
    previousKey = key?.name;
    if (afterReturn && key?.name === "enter") return;

    const press = toKeyPress(str, key);
    if (press) onKey(press);
  };

  input.on("keypress", listener);
  input.resume();

  return () => {
    input.off("keypress", listener);
    if (input.isTTY) input.setRawMode?.(false);
    input.pause();
  };
}
