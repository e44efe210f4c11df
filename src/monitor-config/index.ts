/**
 * Monitor Config Module - Public API
 */

// Types
export type { MonitorConfig, MonitorConfigFile } from "./schema.js";
export type { MonitorConfigError } from "./errors.js";

export { MonitorConfigFileSchema } from "./schema.js";
export {
  configInvalid,
  configUnreadable,
  formatMonitorConfigError,
} from "./errors.js";

// Service functions
export { loadMonitorConfig, parseMonitorConfig } from "./service.js";

// Pure transformations
export { formatIssues, toMonitorConfig } from "./transform.js";
