/**
 * Live watcher status, re-fetched by HTMX every few seconds.
 */
import type { FC } from "hono/jsx";

import type { StatusSnapshot } from "../../monitoring/index.js";

export const STATUS_POLL_SECONDS = 5;

function formatTime(timestamp: number | null): string {
  return timestamp === null ? "never" : new Date(timestamp).toISOString();
}

function describeOnline(online: boolean | null): string {
  if (online === null) return "Unknown";
  return online ? "Online" : "Offline";
}

export const StatusPanel: FC<{ status: StatusSnapshot }> = ({ status }) => (
  <article
    id="status-panel"
    hx-get="/ui/status"
    hx-trigger={`every ${STATUS_POLL_SECONDS}s`}
    hx-swap="outerHTML"
  >
    <div class="grid">
      <div style={{ textAlign: "center" }}>
        <small>Watcher</small>
        <h2 id="watcher-state" style={{ margin: "0" }}>
          {status.running ? "Running" : "Stopped"}
        </h2>
      </div>
      <div style={{ textAlign: "center" }}>
        <small>Camera</small>
        <h2 id="camera-state" style={{ margin: "0" }}>
          {describeOnline(status.online)}
        </h2>
      </div>
      <div style={{ textAlign: "center" }}>
        <small>Known images</small>
        <h2 id="known-files" style={{ margin: "0" }}>
          {status.knownFilesCount}
        </h2>
      </div>
    </div>
    <footer>
      <small>
        Last alarm: {formatTime(status.lastAlarmAt)} · Camera changed:{" "}
        {formatTime(status.lastHealthChangeAt)} · Updated:{" "}
        {formatTime(status.timestamp)}
      </small>
    </footer>
  </article>
);
