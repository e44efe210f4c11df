/**
 * Arrivals Module - Public API
 */

// Types
export type { ArrivalDecision, ArrivalState } from "./schema.js";

export { INITIAL_ARRIVAL_STATE } from "./schema.js";

// Pure transformations
export {
  evaluateArrivals,
  findNewFiles,
  getAlarmCooldownRemaining,
  isAlarmAllowed,
} from "./transform.js";
