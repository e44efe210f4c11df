/**
 * Probe Module - Service Layer
 *
 * Reachability checks against the camera. Every failure mode (timeout,
 * refused connection, 5xx, non-zero ping exit) is reported as `false`.
 */
import { execFile } from "node:child_process";

import { createLogger } from "../logger.js";
import type {
  CommandRunner,
  HttpProbeConfig,
  PingProbeConfig,
  Probe,
  ProbeConfig,
} from "./schema.js";
import { PING_GRACE_MS } from "./schema.js";
import { buildPingArgs, isReachableStatus } from "./transform.js";

const log = createLogger("probe");

/**
 * GET the configured URL with a hard timeout.
 */
export async function probeHttp(config: HttpProbeConfig): Promise<boolean> {
  try {
    const response = await fetch(config.url, {
      method: "GET",
      signal: AbortSignal.timeout(config.timeoutMs),
    });
    const reachable = isReachableStatus(response.status);
    await response.body?.cancel();
    log.trace({ url: config.url, status: response.status, reachable }, "HTTP probe");
    return reachable;
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    log.debug(
      { url: config.url, error: cause.message, timedOut: cause.name === "TimeoutError" },
      "HTTP probe failed",
    );
    return false;
  }
}

/**
 * Default command runner backed by child_process.execFile.
 */
export const runCommand: CommandRunner = (command, args, timeoutMs) =>
  new Promise((resolve) => {
    execFile(command, [...args], { timeout: timeoutMs }, (error) => {
      if (error === null) {
        resolve(0);
        return;
      }
      resolve(typeof error.code === "number" ? error.code : null);
    });
  });

/**
 * Send one ICMP echo via the system ping binary.
 */
export async function probePing(
  config: PingProbeConfig,
  run: CommandRunner = runCommand,
): Promise<boolean> {
  const exitCode = await run(
    "ping",
    buildPingArgs(config.host, config.timeoutMs),
    config.timeoutMs + PING_GRACE_MS,
  );
  log.trace({ host: config.host, exitCode }, "Ping probe");
  return exitCode === 0;
}

/**
 * Create the probe for a configuration.
 */
export function createProbe(config: ProbeConfig): Probe {
  switch (config.method) {
    case "http":
      return () => probeHttp(config);
    case "ping":
      return () => probePing(config);
  }
}
