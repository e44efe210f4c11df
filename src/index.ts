/**
 * CamWatch - Application Entry Point
 *
 * Wires the monitor to the HTTP control surface, starts the Node server,
 * optionally starts the watcher and stops it again on SIGTERM/SIGINT.
 */
import { serve } from "@hono/node-server";

import { createApp } from "./api/app.js";
import { config } from "./config.js";
import { createLogger } from "./logger.js";
import {
  formatMonitorConfigError,
  loadMonitorConfig,
} from "./monitor-config/index.js";
import { createMonitor } from "./monitoring/index.js";

const log = createLogger("api");

log.info(
  {
    env: config.NODE_ENV,
    monitorConfig: config.MONITOR_CONFIG_PATH,
    autoStart: config.AUTO_START,
    stopTimeoutMs: config.STOP_TIMEOUT_MS,
  },
  "Configuration loaded",
);

// =============================================================================
// Monitor and HTTP Server
// =============================================================================

const monitor = createMonitor({
  loadConfig: () => loadMonitorConfig(config.MONITOR_CONFIG_PATH),
});

const app = createApp(monitor, {
  appName: config.APP_NAME,
  stopTimeoutMs: config.STOP_TIMEOUT_MS,
});

const server = serve(
  { fetch: app.fetch, port: config.PORT, hostname: config.HOST },
  (info) => {
    log.info(
      { host: info.address, port: info.port, appName: config.APP_NAME },
      `🚀 ${config.APP_NAME} listening on ${info.address}:${info.port}`,
    );
  },
);

if (config.AUTO_START) {
  monitor
    .start()
    .then((result) => {
      if (result.isErr()) {
        log.error(
          { error: formatMonitorConfigError(result.error) },
          "Watcher not started",
        );
      }
    })
    .catch((error: unknown) => {
      log.error({ error }, "Watcher start crashed");
    });
}

// =============================================================================
// Graceful Shutdown
// =============================================================================

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;

  log.info({ signal }, `${signal} received. Shutting down gracefully...`);

  const stopped = await monitor.stop(config.STOP_TIMEOUT_MS);
  if (!stopped && monitor.status().running) {
    log.warn("Watcher still running at shutdown");
  }

  server.close();
  log.info("Shutdown complete");
  process.exit(0);
}

function onSignal(signal: string): void {
  shutdown(signal).catch((error: unknown) => {
    log.error({ error }, "Shutdown failed");
    process.exit(1);
  });
}

process.on("SIGTERM", () => onSignal("SIGTERM"));
process.on("SIGINT", () => onSignal("SIGINT"));
