/**
 * Probe Module - Public API
 */

// Types
export type {
  CommandRunner,
  HttpProbeConfig,
  PingProbeConfig,
  Probe,
  ProbeConfig,
} from "./schema.js";

// Service functions (side effects)
export { createProbe, probeHttp, probePing, runCommand } from "./service.js";

// Pure transformations
export { buildPingArgs, isReachableStatus } from "./transform.js";
