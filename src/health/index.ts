/**
 * Health Module - Public API
 */

// Types
export type { HealthState, HealthWindow, PublishResult } from "./schema.js";

export { UNKNOWN_HEALTH_STATE } from "./schema.js";

// Pure transformations
export {
  computeVerdict,
  countOnline,
  createHealthWindow,
  majorityThreshold,
  publishVerdict,
  pushSample,
  resetHealth,
} from "./transform.js";
