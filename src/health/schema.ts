/**
 * Health Module - Types
 *
 * Raw reachability samples are smoothed through a fixed-size window
 * before they become a published online/offline verdict.
 */

/**
 * Fixed-capacity ring buffer of the most recent raw samples.
 * `samples.length` always equals `capacity`; only the first `size`
 * slots (counted backwards from `next`) hold real samples.
 */
export type HealthWindow = Readonly<{
  capacity: number;
  samples: ReadonlyArray<boolean>;
  /** Slot the next sample is written to */
  next: number;
  /** Number of samples collected so far, capped at capacity */
  size: number;
}>;

/**
 * Published health verdict.
 */
export type HealthState = Readonly<{
  /** null until the first verdict and again after the watcher stops */
  online: boolean | null;
  /** Timestamp (ms) of the last published change */
  changedAt: number | null;
}>;

export const UNKNOWN_HEALTH_STATE: HealthState = {
  online: null,
  changedAt: null,
};

/**
 * Result of offering a verdict for publication.
 */
export type PublishResult = Readonly<{
  changed: boolean;
  state: HealthState;
}>;
