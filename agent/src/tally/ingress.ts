/**
 * Ingress Handler — one call per inbound chat event.
 *
 * Stateless; all shared state lives behind the store's lock, so any number
 * of overlapping calls is safe.
 */

import type { ILogger } from "@chat-tally/shared/logging";
import type { TallyStore } from "./store.js";

export type IngressHandler = (
  sender: string | null | undefined,
  message: string | null | undefined,
) => Promise<void>;

export function createIngressHandler(store: TallyStore, log?: ILogger): IngressHandler {
  return async (sender, message) => {
    if (sender == null || message == null) {
      log?.trace("Dropped chat event without sender or message");
      return;
    }
    await store.record(sender, message);
  };
}
