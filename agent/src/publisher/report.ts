import type { TallyEntry } from "../tally/index.js";

export const REPORT_HEADER = "Answers:";
const LINE_END = "\r\n";

/** `Answers:` then one `<message>(<count>)` line per entry, CRLF-terminated. */
export function formatReport(entries: readonly TallyEntry[]): string {
  return entries.reduce(
    (output, entry) => output + `${entry.message}(${entry.count})${LINE_END}`,
    REPORT_HEADER + LINE_END,
  );
}
