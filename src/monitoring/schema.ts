/**
 * Monitoring Module - Schemas and Types
 *
 * State of the watcher loop and the contract of the lifecycle controller.
 */
import type { Result } from "neverthrow";

import type { HealthState } from "../health/index.js";
import { UNKNOWN_HEALTH_STATE } from "../health/index.js";
import type { MonitorConfig, MonitorConfigError } from "../monitor-config/index.js";
import type {
  MonitorEventEmitter,
  NotificationError,
} from "../notifications/index.js";
import type { Probe, ProbeConfig } from "../probe/index.js";
import type { DeletionSummary, ScanError } from "../scanner/index.js";

// =============================================================================
// Monitoring State
// =============================================================================

/**
 * Shared state read by `status()` and written by the loop and `clearImages()`.
 */
export type MonitoringState = Readonly<{
  /** Last published health verdict */
  health: HealthState;
  /** Filenames seen on the previous tick */
  knownFiles: ReadonlySet<string>;
  /** Timestamp of the last motion alert that fired */
  lastAlarmAt: number | null;
  /** Bumped whenever knownFiles is resynchronised outside the loop */
  knownFilesGeneration: number;
}>;

export const INITIAL_MONITORING_STATE: MonitoringState = {
  health: UNKNOWN_HEALTH_STATE,
  knownFiles: new Set(),
  lastAlarmAt: null,
  knownFilesGeneration: 0,
};

/**
 * Point-in-time view of the watcher (epoch ms).
 */
export type StatusSnapshot = Readonly<{
  timestamp: number;
  running: boolean;
  online: boolean | null;
  lastAlarmAt: number | null;
  lastHealthChangeAt: number | null;
  knownFilesCount: number;
}>;

/**
 * Wire format of `GET /status`.
 */
export type StatusResponse = Readonly<{
  timestamp_utc: string;
  watcher_running: boolean;
  webcam_online: boolean | null;
  last_alarm_utc: string | null;
  last_webcam_change_utc: string | null;
  known_files_count: number;
}>;

// =============================================================================
// Lifecycle Controller
// =============================================================================

/**
 * Collaborators of a monitor. Only `loadConfig` is required; the rest
 * default to the real probe, ntfy emitter and clock.
 */
export type MonitorDependencies = Readonly<{
  loadConfig: () => Promise<Result<MonitorConfig, MonitorConfigError>>;
  createProbe?: (config: ProbeConfig) => Probe;
  createEmitter?: (config: MonitorConfig) => MonitorEventEmitter;
  now?: () => number;
}>;

export type Monitor = Readonly<{
  /** ok(false) when a loop is already running or starting */
  start: () => Promise<Result<boolean, MonitorConfigError>>;
  /** false when nothing was running or the loop did not exit in time */
  stop: (timeoutMs: number) => Promise<boolean>;
  status: () => StatusSnapshot;
  clearImages: () => Promise<Result<DeletionSummary, MonitorConfigError | ScanError>>;
  testNotify: () => Promise<Result<void, MonitorConfigError | NotificationError>>;
}>;
