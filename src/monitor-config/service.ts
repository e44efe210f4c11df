/**
 * Monitor Config Module - Service Layer
 *
 * Reads the config file from disk. Called on every watcher start, so an
 * edit takes effect after a stop/start without restarting the service.
 */
import { readFile } from "node:fs/promises";
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import { configInvalid, configUnreadable } from "./errors.js";
import type { MonitorConfigError } from "./errors.js";
import type { MonitorConfig } from "./schema.js";
import { MonitorConfigFileSchema } from "./schema.js";
import { formatIssues, toMonitorConfig } from "./transform.js";

const log = createLogger("config");

/**
 * Validate already-parsed JSON.
 */
export function parseMonitorConfig(
  path: string,
  data: unknown,
): Result<MonitorConfig, MonitorConfigError> {
  const parsed = MonitorConfigFileSchema.safeParse(data);
  if (!parsed.success) {
    return err(configInvalid(path, formatIssues(parsed.error.issues)));
  }
  return ok(toMonitorConfig(parsed.data));
}

/**
 * Load and validate the monitor config file.
 *
 * @param path - Path to the JSON file
 * @returns Runtime config, or CONFIG_UNREADABLE / CONFIG_INVALID
 */
export async function loadMonitorConfig(
  path: string,
): Promise<Result<MonitorConfig, MonitorConfigError>> {
  let data: unknown;
  try {
    data = JSON.parse(await readFile(path, "utf8"));
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    log.error({ path, error: cause.message }, "Failed to read monitor config");
    return err(configUnreadable(path, cause.message, cause));
  }

  const result = parseMonitorConfig(path, data);
  result.match(
    (monitorConfig) =>
      log.debug(
        { path, watchDir: monitorConfig.watchDir, probe: monitorConfig.health.probe.method },
        "Monitor config loaded",
      ),
    (error) => log.error({ path, error: error.message }, "Monitor config is invalid"),
  );
  return result;
}
