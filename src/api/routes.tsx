/**
 * API routes for the upload watcher.
 *
 * - /api/health - Liveness check
 * - /status, /start, /stop, /test_notify, /clear_images - Watcher control (JSON)
 * - /, /ui/status - Dashboard and its polled status fragment
 *
 * Routes only translate between HTTP and the monitor passed in.
 */
import { Hono } from "hono";

import { createLogger } from "../logger.js";
import { formatMonitorConfigError } from "../monitor-config/index.js";
import type { Monitor } from "../monitoring/index.js";
import { toStatusResponse } from "../monitoring/index.js";
import { formatNotificationError } from "../notifications/index.js";
import { formatScanError } from "../scanner/index.js";
import { StatusPanel } from "../ui/components/StatusPanel.js";
import { Dashboard } from "../ui/pages/Dashboard.js";

const log = createLogger("api");

export const APP_VERSION = "1.0.0";

export type RoutesOptions = Readonly<{
  appName: string;
  /** Wait bound for POST /stop */
  stopTimeoutMs: number;
}>;

/**
 * Build the routes around one monitor instance.
 */
export function createRoutes(monitor: Monitor, options: RoutesOptions): Hono {
  const routes = new Hono();

  // ===========================================================================
  // Health Check
  // ===========================================================================

  routes.get("/api/health", (c) => {
    const requestId = c.get("requestId");
    log.debug({ requestId }, "Health check");

    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      requestId,
      version: APP_VERSION,
    });
  });

  // ===========================================================================
  // Watcher Control
  // ===========================================================================

  routes.get("/status", (c) => {
    return c.json(toStatusResponse(monitor.status()));
  });

  routes.post("/start", async (c) => {
    const requestId = c.get("requestId");
    log.info({ requestId }, "POST /start");

    const result = await monitor.start();

    if (result.isErr()) {
      const error = formatMonitorConfigError(result.error);
      log.error({ requestId, error }, "Failed to start watcher");
      return c.json(
        { ok: false, running: monitor.status().running, error },
        500,
      );
    }

    return c.json({ ok: result.value, running: monitor.status().running });
  });

  routes.post("/stop", async (c) => {
    const requestId = c.get("requestId");
    log.info({ requestId }, "POST /stop");

    const stopped = await monitor.stop(options.stopTimeoutMs);
    return c.json({ ok: stopped, running: monitor.status().running });
  });

  routes.post("/test_notify", async (c) => {
    const requestId = c.get("requestId");
    log.info({ requestId }, "POST /test_notify");

    const result = await monitor.testNotify();

    if (result.isErr()) {
      const { error } = result;
      if (error.type === "CONFIG_UNREADABLE" || error.type === "CONFIG_INVALID") {
        return c.json({ ok: false, error: formatMonitorConfigError(error) }, 500);
      }
      return c.json({ ok: false, error: formatNotificationError(error) }, 502);
    }

    return c.json({ ok: true });
  });

  routes.post("/clear_images", async (c) => {
    const requestId = c.get("requestId");
    log.info({ requestId }, "POST /clear_images");

    const result = await monitor.clearImages();

    if (result.isErr()) {
      const { error } = result;
      const message =
        error.type === "DIRECTORY_UNREADABLE"
          ? formatScanError(error)
          : formatMonitorConfigError(error);
      log.error({ requestId, error: message }, "Failed to clear images");
      return c.json({ ok: false, deleted: 0, failed: 0, error: message }, 500);
    }

    return c.json({
      ok: true,
      deleted: result.value.deleted,
      failed: result.value.failed,
    });
  });

  // ===========================================================================
  // Dashboard UI
  // ===========================================================================

  routes.get("/", (c) => {
    return c.html(<Dashboard appName={options.appName} status={monitor.status()} />);
  });

  routes.get("/ui/status", (c) => {
    return c.html(<StatusPanel status={monitor.status()} />);
  });

  return routes;
}
