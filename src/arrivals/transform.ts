/**
 * Arrivals Module - Pure Transformations
 *
 * New-file detection with a cooldown between motion alerts. The cooldown
 * gates alerts, not detection: files that arrive during the cooldown are
 * still absorbed into the known set and never alerted later.
 */
import type { ArrivalDecision, ArrivalState } from "./schema.js";

/**
 * Filenames present in `current` but not in `known`, sorted.
 *
 * @example
 * findNewFiles(new Set(["a.jpg", "b.jpg"]), new Set(["a.jpg"])) // ["b.jpg"]
 */
export function findNewFiles(
  current: ReadonlySet<string>,
  known: ReadonlySet<string>,
): string[] {
  return [...current].filter((name) => !known.has(name)).sort();
}

/**
 * Check whether a motion alert may fire at `now`.
 */
export function isAlarmAllowed(
  lastAlarmAt: number | null,
  now: number,
  cooldownMs: number,
): boolean {
  return lastAlarmAt === null || now - lastAlarmAt >= cooldownMs;
}

/**
 * Remaining cooldown in milliseconds, or 0 if not in cooldown.
 */
export function getAlarmCooldownRemaining(
  lastAlarmAt: number | null,
  now: number,
  cooldownMs: number,
): number {
  if (lastAlarmAt === null) return 0;
  return Math.max(0, cooldownMs - (now - lastAlarmAt));
}

/**
 * Decide what one tick's snapshot means for alerting.
 *
 * @param state - Known files and last alarm time from the previous tick
 * @param current - Snapshot taken this tick
 * @param now - Current timestamp in ms
 * @param cooldownMs - Minimum time between two motion alerts
 */
export function evaluateArrivals(
  state: ArrivalState,
  current: ReadonlySet<string>,
  now: number,
  cooldownMs: number,
): ArrivalDecision {
  const newFiles = findNewFiles(current, state.knownFiles);

  if (newFiles.length === 0) {
    return { kind: "none", next: { ...state, knownFiles: current } };
  }

  if (isAlarmAllowed(state.lastAlarmAt, now, cooldownMs)) {
    return {
      kind: "alert",
      newFiles,
      next: { knownFiles: current, lastAlarmAt: now },
    };
  }

  return {
    kind: "suppressed",
    newFiles,
    remainingMs: getAlarmCooldownRemaining(state.lastAlarmAt, now, cooldownMs),
    next: { ...state, knownFiles: current },
  };
}
