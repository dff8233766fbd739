/**
 * Tally Module
 */

export { normalize } from "./normalize.js";
export { TallyStore, type TallyEntry, type RecordOutcome } from "./store.js";
export { createIngressHandler, type IngressHandler } from "./ingress.js";
