/**
 * Periodic Manager
 *
 * Single coordinator for the agent's timed work (the publish tick).
 *
 * Responsibilities:
 * - Task registry with intervals and initial delays
 * - Overlap prevention: one run in flight at a time
 * - Single poll loop that checks which tasks are due
 * - Start/stop lifecycle; stop waits for the run in flight
 *
 * The poll interval bounds how late a task can start, so it is kept short.
 */

import type { ILogger } from "@chat-tally/shared/logging";

// ============================================
// TYPES
// ============================================

export interface PeriodicTaskDef {
  /** Unique task identifier */
  id: string;
  /** Human-readable name for logs */
  name: string;
  /** How often to run (ms), measured from the start of the previous run */
  intervalMs: number;
  /** Delay before first run after manager starts (ms) */
  initialDelayMs: number;
  enabled: boolean;
  /** Throw to signal failure; the manager logs it and keeps going */
  run: () => Promise<void>;
}

export interface ManagerOptions {
  /** How often the manager checks for due tasks (default: 50ms) */
  pollIntervalMs?: number;
  log?: ILogger;
}

// ============================================
// CONSTANTS
// ============================================

export const DEFAULT_POLL_INTERVAL_MS = 50;

// ============================================
// STATE
// ============================================

let tasks: PeriodicTaskDef[] = [];
let pollTimer: NodeJS.Timeout | null = null;
let inFlight: Promise<void> | null = null;
let logger: ILogger | undefined;
const nextRunAt = new Map<string, number>();

// ============================================
// LIFECYCLE
// ============================================

/**
 * Start the periodic manager with a set of tasks, replacing any task set
 * already registered.
 */
export function startPeriodicManager(taskDefs: PeriodicTaskDef[], options: ManagerOptions = {}): void {
  halt();

  tasks = taskDefs;
  logger = options.log;

  const startedAt = Date.now();
  for (const task of tasks) {
    nextRunAt.set(task.id, startedAt + task.initialDelayMs);
  }

  pollTimer = setInterval(poll, options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS);

  const enabledNames = tasks.filter(t => t.enabled).map(t => t.name);
  logger?.debug(`Manager started with ${enabledNames.length} task(s): ${enabledNames.join(", ")}`);
}

/**
 * Stop polling. Resolves after the run in flight, if any, has finished;
 * nothing new starts once this is called.
 */
export async function stopPeriodicManager(): Promise<void> {
  if (halt()) logger?.debug("Manager stopped");
  if (inFlight) await inFlight;
}

function halt(): boolean {
  if (!pollTimer) return false;
  clearInterval(pollTimer);
  pollTimer = null;
  tasks = [];
  nextRunAt.clear();
  return true;
}

// ============================================
// POLL LOOP
// ============================================

function poll(): void {
  // Previous run still in flight
  if (inFlight) return;

  const due = tasks.filter(t => t.enabled && Date.now() >= (nextRunAt.get(t.id) ?? 0));
  if (due.length === 0) return;

  inFlight = runInOrder(due).finally(() => {
    inFlight = null;
  });
}

async function runInOrder(due: PeriodicTaskDef[]): Promise<void> {
  for (const task of due) {
    if (!pollTimer) return;
    await runTask(task);
  }
}

async function runTask(task: PeriodicTaskDef): Promise<void> {
  nextRunAt.set(task.id, Date.now() + task.intervalMs);

  try {
    await task.run();
  } catch (err) {
    logger?.error(`Task "${task.name}" failed`, err);
  }
}

// ============================================
// TESTING HELPERS
// ============================================

/** Reset all state (tests only) */
export function _resetForTesting(): void {
  halt();
  inFlight = null;
  logger = undefined;
}
