/**
 * Publisher
 *
 * Snapshots the top answers and overwrites the output sink. The snapshot
 * is taken through `topN`, which releases the tally lock before returning,
 * so slow sink I/O never holds up ingress.
 *
 * Every sink write goes through one output queue, snapshot included. A
 * tick queued ahead of a clear finishes before the clear blanks the sink,
 * and no two writes are ever in flight on the same file.
 */

import type { ILogger } from "@chat-tally/shared/logging";
import { AsyncLock } from "../core/lock.js";
import type { TallyStore } from "../tally/index.js";
import { formatReport, REPORT_HEADER } from "./report.js";
import type { OutputSink } from "./sink.js";

export const PUBLISH_INTERVAL_MS = 5_000;
export const TOP_ANSWERS = 3;

export class Publisher {
  private readonly output = new AsyncLock();

  constructor(
    private readonly store: TallyStore,
    private readonly sink: OutputSink,
    private readonly log?: ILogger,
  ) {}

  /**
   * One publish tick. Returns false when there was nothing to publish.
   */
  tick(): Promise<boolean> {
    return this.output.runExclusive(async () => {
      const entries = await this.store.topN(TOP_ANSWERS);
      if (entries.length === 0) return false;

      this.log?.info("Updating output file");
      await this.sink.write(formatReport(entries));
      return true;
    });
  }

  /**
   * Empty the tally and blank the sink as one queued step. The reset
   * happens even when the write fails; the write error is rethrown.
   */
  clear(): Promise<void> {
    return this.output.runExclusive(async () => {
      await this.store.reset();
      await this.sink.write(REPORT_HEADER);
    });
  }

  /** Resolves once every write queued so far has settled. */
  async drain(): Promise<void> {
    await this.output.runExclusive(() => undefined);
  }
}
