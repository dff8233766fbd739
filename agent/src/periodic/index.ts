/**
 * Periodic Module
 */

export {
  startPeriodicManager,
  stopPeriodicManager,
  _resetForTesting,
  DEFAULT_POLL_INTERVAL_MS,
  type PeriodicTaskDef,
  type ManagerOptions,
} from "./manager.js";
