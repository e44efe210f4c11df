/**
 * Monitor Config Module - Pure Transformations
 */
import type { ZodIssue } from "zod";

import { normalizeExtension } from "../scanner/index.js";
import type { ProbeConfig } from "../probe/index.js";
import type { MonitorConfig, MonitorConfigFile } from "./schema.js";

/**
 * Convert the file representation into the runtime config.
 *
 * @example
 * // pollIntervalSeconds: 5, cooldownMinutes: 10
 * // -> pollIntervalMs: 5000, cooldownMs: 600000
 */
export function toMonitorConfig(file: MonitorConfigFile): MonitorConfig {
  const { probe } = file.health;
  const probeConfig: ProbeConfig =
    probe.method === "http"
      ? { method: "http", url: probe.url, timeoutMs: probe.timeoutSeconds * 1000 }
      : { method: "ping", host: probe.host, timeoutMs: probe.timeoutSeconds * 1000 };

  return {
    name: file.name,
    watchDir: file.watchDir,
    extensions: new Set(file.extensions.map(normalizeExtension)),
    pollIntervalMs: file.pollIntervalSeconds * 1000,
    cooldownMs: file.cooldownMinutes * 60_000,
    webUrl: file.webUrl,
    health: { hysteresis: file.health.hysteresis, probe: probeConfig },
    ntfy: file.ntfy,
  };
}

/**
 * One line per schema issue, prefixed with its JSON path.
 *
 * @example
 * formatIssues([{ path: ["health", "hysteresis"], message: "Expected number" }])
 * // ["health.hysteresis: Expected number"]
 */
export function formatIssues(
  issues: ReadonlyArray<Pick<ZodIssue, "path" | "message">>,
): string[] {
  return issues.map((issue) =>
    issue.path.length > 0
      ? `${issue.path.join(".")}: ${issue.message}`
      : issue.message,
  );
}
