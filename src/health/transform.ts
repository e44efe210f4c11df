/**
 * Health Module - Pure Transformations
 *
 * Hysteresis filter: majority vote over the last `n` samples, with the
 * raw sample passed through until the window has filled once.
 */
import type { HealthState, HealthWindow, PublishResult } from "./schema.js";

/**
 * Create an empty window holding `capacity` samples.
 *
 * @throws RangeError if capacity is not a positive integer
 */
export function createHealthWindow(capacity: number): HealthWindow {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new RangeError(`Hysteresis window must be >= 1, got ${capacity}`);
  }
  return {
    capacity,
    samples: new Array<boolean>(capacity).fill(false),
    next: 0,
    size: 0,
  };
}

/**
 * Write a sample into the window, overwriting the oldest once full.
 */
export function pushSample(window: HealthWindow, sample: boolean): HealthWindow {
  const samples = [...window.samples];
  samples[window.next] = sample;
  return {
    capacity: window.capacity,
    samples,
    next: (window.next + 1) % window.capacity,
    size: Math.min(window.size + 1, window.capacity),
  };
}

/**
 * Number of `true` samples currently held.
 */
export function countOnline(window: HealthWindow): number {
  let count = 0;
  for (let i = 0; i < window.size; i++) {
    const slot = (window.next - 1 - i + window.capacity) % window.capacity;
    if (window.samples[slot] === true) count++;
  }
  return count;
}

/**
 * Strict majority needed for an online verdict: floor(n/2) + 1.
 */
export function majorityThreshold(capacity: number): number {
  return Math.floor(capacity / 2) + 1;
}

/**
 * Compute the filtered verdict.
 *
 * @param window - Window that already contains `latest`
 * @param latest - The newest raw sample
 * @returns `latest` while the window is filling, the strict majority afterwards
 *
 * @example
 * // n = 3, samples [true, false, true] -> true
 * // n = 4, samples [true, true, false, false] -> false (tie)
 */
export function computeVerdict(window: HealthWindow, latest: boolean): boolean {
  if (window.size < window.capacity) {
    return latest;
  }
  return countOnline(window) >= majorityThreshold(window.capacity);
}

/**
 * Offer a verdict for publication. Only the first verdict and actual
 * flips count as changes; a stable verdict leaves the state untouched.
 */
export function publishVerdict(
  state: HealthState,
  verdict: boolean,
  now: number,
): PublishResult {
  if (state.online === verdict) {
    return { changed: false, state };
  }
  return { changed: true, state: { online: verdict, changedAt: now } };
}

/**
 * Health state after the watcher stops: unknown, stamped with the stop time.
 */
export function resetHealth(now: number): HealthState {
  return { online: null, changedAt: now };
}
