/**
 * Command Console Module
 */

export { Terminal, type TerminalOutput } from "./terminal.js";
export { LineEditor, type KeyPress, type LineEditorOptions } from "./line-editor.js";
export { attachKeyboard, toKeyPress, type KeyboardInput } from "./keyboard.js";
export {
  createCommandDispatcher,
  COMMANDS,
  type CommandName,
  type CommandResult,
  type CommandContext,
} from "./commands.js";
