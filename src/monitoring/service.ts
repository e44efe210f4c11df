/**
 * Monitoring Module - Service Layer
 *
 * Lifecycle controller for the watcher loop. Each tick probes the camera,
 * feeds the hysteresis filter, scans the upload directory and feeds the
 * arrival debouncer; transitions are reported through the event emitter.
 *
 * All state lives inside the instance returned by `createMonitor`.
 * Synchronous sections never interleave, so the check-and-claim in
 * `start` and every state swap are atomic with respect to other calls.
 */
import { setTimeout as delay } from "node:timers/promises";
import { type Result, err, ok } from "neverthrow";

import { INITIAL_ARRIVAL_STATE, evaluateArrivals } from "../arrivals/index.js";
import {
  type HealthWindow,
  UNKNOWN_HEALTH_STATE,
  computeVerdict,
  createHealthWindow,
  publishVerdict,
  pushSample,
  resetHealth,
} from "../health/index.js";
import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import type { MonitorConfig, MonitorConfigError } from "../monitor-config/index.js";
import {
  type MonitorEvent,
  type MonitorEventEmitter,
  type NotificationError,
  createEventEmitter,
} from "../notifications/index.js";
import { type Probe, createProbe } from "../probe/index.js";
import {
  type DeletionSummary,
  type ScanError,
  deleteFiles,
  formatScanError,
  scanDirectory,
} from "../scanner/index.js";
import type {
  Monitor,
  MonitorDependencies,
  MonitoringState,
  StatusSnapshot,
} from "./schema.js";
import { INITIAL_MONITORING_STATE } from "./schema.js";
import { configVariables, toStatusSnapshot } from "./transform.js";

const log = createLogger("monitoring");

/**
 * The live loop. At most one exists per monitor.
 */
type RunHandle = Readonly<{
  controller: AbortController;
  /** Settles once the loop and its cleanup have finished; never rejects */
  done: Promise<void>;
  config: MonitorConfig;
  emitter: MonitorEventEmitter;
}>;

type RunTarget = Readonly<{
  config: MonitorConfig;
  emitter: MonitorEventEmitter;
}>;

function defaultEmitter(config: MonitorConfig): MonitorEventEmitter {
  return createEventEmitter(config.ntfy, configVariables(config));
}

/**
 * Sleep that ends early, without throwing, when the signal aborts.
 */
async function sleep(ms: number, signal: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (!signal.aborted) throw error;
  }
}

/**
 * Wait for `done` at most `timeoutMs`. Resolves whether it settled in time.
 */
async function waitWithTimeout(
  done: Promise<void>,
  timeoutMs: number,
): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), timeoutMs);
  });

  try {
    return await Promise.race([done.then(() => true), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

// =============================================================================
// Monitor Factory
// =============================================================================

/**
 * Create a watcher lifecycle controller.
 *
 * @example
 * const monitor = createMonitor({ loadConfig: () => loadMonitorConfig(path) });
 * await monitor.start();
 * monitor.status().running; // true
 * await monitor.stop(5000);
 */
export function createMonitor(dependencies: MonitorDependencies): Monitor {
  const now = dependencies.now ?? Date.now;
  const makeProbe = dependencies.createProbe ?? createProbe;
  const makeEmitter = dependencies.createEmitter ?? defaultEmitter;

  let state: MonitoringState = INITIAL_MONITORING_STATE;
  let run: RunHandle | null = null;
  let pendingStart: Promise<Result<boolean, MonitorConfigError>> | null = null;

  // ===========================================================================
  // Event Emission
  // ===========================================================================

  async function emit(
    emitter: MonitorEventEmitter,
    event: MonitorEvent,
  ): Promise<void> {
    const result = await emitter.emit(event);
    if (result.isErr()) {
      log.warn(
        { event: event.type, error: result.error.message },
        "Notification not delivered",
      );
    }
  }

  // ===========================================================================
  // Run Loop
  // ===========================================================================

  /**
   * One poll cycle: health first, then arrivals.
   *
   * @returns The health window to carry into the next tick
   */
  async function tick(
    config: MonitorConfig,
    probe: Probe,
    emitter: MonitorEventEmitter,
    window: HealthWindow,
  ): Promise<HealthWindow> {
    // A clearImages() anywhere in this tick invalidates its diff
    const generation = state.knownFilesGeneration;

    // 1. Health
    const sample = await probe();
    const nextWindow = pushSample(window, sample);
    const verdict = computeVerdict(nextWindow, sample);
    const published = publishVerdict(state.health, verdict, now());

    if (published.changed) {
      state = { ...state, health: published.state };
      log.info({ online: verdict, sample }, `Camera is ${verdict ? "online" : "offline"}`);
      await emit(emitter, { type: verdict ? "online" : "offline" });
    }

    // 2. Arrivals
    const scan = await scanDirectory(config.watchDir, config.extensions);

    if (scan.isErr()) {
      log.warn({ error: formatScanError(scan.error) }, "Scan failed, keeping known files");
      return nextWindow;
    }

    if (state.knownFilesGeneration !== generation) {
      log.debug("Known files resynchronised during tick, skipping diff");
      return nextWindow;
    }

    const decision = evaluateArrivals(
      { knownFiles: state.knownFiles, lastAlarmAt: state.lastAlarmAt },
      scan.value,
      now(),
      config.cooldownMs,
    );
    state = { ...state, ...decision.next };

    switch (decision.kind) {
      case "alert":
        log.info({ files: decision.newFiles }, "New images, sending motion alert");
        await emit(emitter, { type: "motion", filenames: decision.newFiles });
        break;
      case "suppressed":
        log.info(
          {
            files: decision.newFiles,
            remainingSeconds: Math.ceil(decision.remainingMs / 1000),
          },
          "New images within cooldown, alert suppressed",
        );
        break;
      case "none":
        break;
    }

    return nextWindow;
  }

  async function runLoop(
    config: MonitorConfig,
    emitter: MonitorEventEmitter,
    signal: AbortSignal,
  ): Promise<void> {
    const generation = state.knownFilesGeneration;
    const initial = await scanDirectory(config.watchDir, config.extensions);
    if (initial.isErr()) {
      log.error(
        { error: formatScanError(initial.error) },
        "Watch directory unreadable, watcher exits",
      );
      return;
    }

    // Files present at startup are never reported as new. A clear that
    // finished during the scan already resynchronised the known set.
    const knownFiles =
      state.knownFilesGeneration === generation ? initial.value : state.knownFiles;
    state = {
      ...state,
      ...INITIAL_ARRIVAL_STATE,
      health: UNKNOWN_HEALTH_STATE,
      knownFiles,
    };
    const probe = makeProbe(config.health.probe);
    let window = createHealthWindow(config.health.hysteresis);

    log.info(
      { dir: config.watchDir, knownFiles: knownFiles.size },
      "Watcher started",
    );
    await emit(emitter, { type: "started" });

    try {
      while (!signal.aborted) {
        await sleep(config.pollIntervalMs, signal);
        if (signal.aborted) break;

        try {
          window = await tick(config, probe, emitter, window);
        } catch (error) {
          logOperationFailed(log, "tick", error);
        }
      }
    } finally {
      state = { ...state, health: resetHealth(now()) };
      log.info("Watcher stopped");
      await emit(emitter, { type: "offline" });
      await emit(emitter, { type: "stopped" });
    }
  }

  // ===========================================================================
  // Lifecycle Operations
  // ===========================================================================

  async function launch(): Promise<Result<boolean, MonitorConfigError>> {
    const loaded = await dependencies.loadConfig();
    if (loaded.isErr()) {
      logOperationFailed(log, "start", loaded.error.message);
      return err(loaded.error);
    }

    const config = loaded.value;
    const controller = new AbortController();
    const emitter = makeEmitter(config);

    const done = runLoop(config, emitter, controller.signal)
      .catch((error: unknown) => logOperationFailed(log, "runLoop", error))
      .finally(() => {
        if (run?.controller === controller) {
          run = null;
        }
      });

    run = { controller, done, config, emitter };
    return ok(true);
  }

  async function start(): Promise<Result<boolean, MonitorConfigError>> {
    if (run !== null || pendingStart !== null) {
      log.debug("Watcher already running, start ignored");
      return ok(false);
    }

    // Claimed before the first await so concurrent starts see it
    const attempt = launch();
    pendingStart = attempt;
    try {
      return await attempt;
    } finally {
      pendingStart = null;
    }
  }

  async function stop(timeoutMs: number): Promise<boolean> {
    if (pendingStart !== null) {
      await pendingStart;
    }

    const current = run;
    if (current === null) {
      log.debug("Watcher not running, stop ignored");
      return false;
    }

    const startTime = Date.now();
    logOperationStart(log, "stop", { timeoutMs });
    current.controller.abort();

    const stopped = await waitWithTimeout(current.done, timeoutMs);
    if (stopped) {
      logOperationComplete(log, "stop", startTime);
    } else {
      log.warn({ timeoutMs }, "Watcher did not stop in time");
    }
    return stopped;
  }

  function status(): StatusSnapshot {
    return toStatusSnapshot(state, run !== null, now());
  }

  /**
   * Config and emitter of the running loop, or freshly loaded ones.
   */
  async function resolveTarget(): Promise<Result<RunTarget, MonitorConfigError>> {
    if (run !== null) {
      return ok({ config: run.config, emitter: run.emitter });
    }
    const loaded = await dependencies.loadConfig();
    return loaded.map((config) => ({ config, emitter: makeEmitter(config) }));
  }

  async function clearImages(): Promise<
    Result<DeletionSummary, MonitorConfigError | ScanError>
  > {
    const target = await resolveTarget();
    if (target.isErr()) {
      return err(target.error);
    }

    const { config, emitter } = target.value;
    const startTime = Date.now();
    logOperationStart(log, "clearImages", { dir: config.watchDir });

    const listed = await scanDirectory(config.watchDir, config.extensions);
    if (listed.isErr()) {
      logOperationFailed(log, "clearImages", formatScanError(listed.error));
      await emit(emitter, {
        type: "cleared",
        deletedCount: 0,
        failedCount: 0,
        error: formatScanError(listed.error),
      });
      return err(listed.error);
    }

    const summary = await deleteFiles(config.watchDir, listed.value);

    // Whatever survived the deletion is known, so it is never alerted
    const remaining = await scanDirectory(config.watchDir, config.extensions);
    state = {
      ...state,
      knownFiles: remaining.unwrapOr(new Set<string>()),
      knownFilesGeneration: state.knownFilesGeneration + 1,
    };

    await emit(emitter, {
      type: "cleared",
      deletedCount: summary.deleted,
      failedCount: summary.failed,
    });
    logOperationComplete(log, "clearImages", startTime, {
      deleted: summary.deleted,
      failed: summary.failed,
    });
    return ok(summary);
  }

  async function testNotify(): Promise<
    Result<void, MonitorConfigError | NotificationError>
  > {
    const target = await resolveTarget();
    if (target.isErr()) {
      return err(target.error);
    }

    const result = await target.value.emitter.emit({ type: "test" });
    if (result.isErr()) {
      log.warn({ error: result.error.message }, "Test notification failed");
      return err(result.error);
    }
    return ok(undefined);
  }

  return { start, stop, status, clearImages, testNotify };
}
