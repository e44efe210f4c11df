/**
 * Monitoring Module - Public API
 *
 * Exports types and the lifecycle controller factory.
 */

// Types
export type {
  Monitor,
  MonitorDependencies,
  MonitoringState,
  StatusResponse,
  StatusSnapshot,
} from "./schema.js";

export { INITIAL_MONITORING_STATE } from "./schema.js";

// Service functions
export { createMonitor } from "./service.js";

// Pure transformations
export { configVariables, toStatusResponse, toStatusSnapshot } from "./transform.js";
