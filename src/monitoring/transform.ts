/**
 * Monitoring Module - Pure Transformations
 */
import type { MonitorConfig } from "../monitor-config/index.js";
import type { TemplateVariables } from "../notifications/index.js";
import type {
  MonitoringState,
  StatusResponse,
  StatusSnapshot,
} from "./schema.js";

/**
 * Snapshot the shared state.
 */
export function toStatusSnapshot(
  state: MonitoringState,
  running: boolean,
  now: number,
): StatusSnapshot {
  return {
    timestamp: now,
    running,
    online: state.health.online,
    lastAlarmAt: state.lastAlarmAt,
    lastHealthChangeAt: state.health.changedAt,
    knownFilesCount: state.knownFiles.size,
  };
}

function toIso(timestamp: number | null): string | null {
  return timestamp === null ? null : new Date(timestamp).toISOString();
}

/**
 * Convert a snapshot to the `GET /status` wire format.
 *
 * @example
 * toStatusResponse({ timestamp: 0, running: false, online: null, ... })
 * // { timestamp_utc: "1970-01-01T00:00:00.000Z", watcher_running: false, ... }
 */
export function toStatusResponse(snapshot: StatusSnapshot): StatusResponse {
  return {
    timestamp_utc: new Date(snapshot.timestamp).toISOString(),
    watcher_running: snapshot.running,
    webcam_online: snapshot.online,
    last_alarm_utc: toIso(snapshot.lastAlarmAt),
    last_webcam_change_utc: toIso(snapshot.lastHealthChangeAt),
    known_files_count: snapshot.knownFilesCount,
  };
}

/**
 * Placeholder values every notification of a run can use.
 */
export function configVariables(config: MonitorConfig): TemplateVariables {
  return {
    name: config.name,
    watch_dir: config.watchDir,
    web_url: config.webUrl ?? "",
  };
}
