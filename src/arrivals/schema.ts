/**
 * Arrivals Module - Types
 */

/**
 * What the debouncer remembers between ticks.
 */
export type ArrivalState = Readonly<{
  /** Filenames seen on the previous tick */
  knownFiles: ReadonlySet<string>;
  /** Timestamp (ms) of the last motion alert that actually fired */
  lastAlarmAt: number | null;
}>;

export const INITIAL_ARRIVAL_STATE: ArrivalState = {
  knownFiles: new Set(),
  lastAlarmAt: null,
};

/**
 * Outcome of comparing a snapshot with the known files.
 * In every case `next` is the state to keep for the following tick.
 */
export type ArrivalDecision =
  | { readonly kind: "none"; readonly next: ArrivalState }
  | {
      readonly kind: "alert";
      readonly newFiles: ReadonlyArray<string>;
      readonly next: ArrivalState;
    }
  | {
      readonly kind: "suppressed";
      readonly newFiles: ReadonlyArray<string>;
      readonly remainingMs: number;
      readonly next: ArrivalState;
    };
