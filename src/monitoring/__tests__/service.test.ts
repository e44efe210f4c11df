/**
 * Monitoring Service Integration Tests
 *
 * Runs the real loop against a temporary directory with a scripted probe
 * and a recording emitter.
 */
import { mkdtemp, readdir, rename, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { type Result, err, ok } from "neverthrow";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

// Mock logger to reduce noise in tests
vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
  logOperationStart: vi.fn(),
  logOperationComplete: vi.fn(),
  logOperationFailed: vi.fn(),
}));

// Import after mocks
import type { MonitorConfig } from "../../monitor-config/index.js";
import { configInvalid } from "../../monitor-config/index.js";
import type {
  MonitorEvent,
  MonitorEventEmitter,
  NotificationError,
} from "../../notifications/index.js";
import { networkError } from "../../notifications/index.js";
import type { Probe } from "../../probe/index.js";
import type { Monitor, MonitorDependencies } from "../schema.js";
import { createMonitor } from "../service.js";

// =============================================================================
// Helpers
// =============================================================================

function makeConfig(
  watchDir: string,
  overrides: Partial<MonitorConfig> = {},
): MonitorConfig {
  return {
    name: "Garage",
    watchDir,
    extensions: new Set([".jpg", ".png"]),
    pollIntervalMs: 10,
    cooldownMs: 600_000,
    webUrl: undefined,
    health: {
      hysteresis: 1,
      probe: { method: "ping", host: "192.0.2.10", timeoutMs: 100 },
    },
    ntfy: { server: "http://ntfy.test", topic: "cam", defaults: {}, templates: {} },
    ...overrides,
  };
}

function recordingEmitter(): { events: MonitorEvent[]; emitter: MonitorEventEmitter } {
  const events: MonitorEvent[] = [];
  const emitter: MonitorEventEmitter = {
    emit: async (event): Promise<Result<void, NotificationError>> => {
      events.push(event);
      return ok(undefined);
    },
  };
  return { events, emitter };
}

/**
 * A promise the test resolves by hand, used to hold the loop mid-tick.
 */
function createGate(): { wait: Promise<void>; open: () => void } {
  let open: () => void = () => undefined;
  const wait = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { wait, open };
}

describe("Monitoring Service", () => {
  let dir: string;
  let monitors: Monitor[];

  function setup(
    config: MonitorConfig,
    probe: Probe,
    emitter: MonitorEventEmitter,
    overrides: Partial<MonitorDependencies> = {},
  ) {
    const createProbe = vi.fn((): Probe => probe);
    const monitor = createMonitor({
      loadConfig: async () => ok(config),
      createProbe,
      createEmitter: () => emitter,
      ...overrides,
    });
    monitors.push(monitor);
    return { monitor, createProbe };
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "monitoring-"));
    monitors = [];
  });

  afterEach(async () => {
    await Promise.all(monitors.map((monitor) => monitor.stop(1000)));
    await rm(dir, { recursive: true, force: true });
  });

  // ===========================================================================
  // start / stop
  // ===========================================================================

  describe("start", () => {
    test("concurrent starts spawn exactly one loop", async () => {
      // Arrange
      const { events, emitter } = recordingEmitter();
      const { monitor, createProbe } = setup(
        makeConfig(dir),
        vi.fn<Probe>().mockResolvedValue(true),
        emitter,
      );

      // Act
      const results = await Promise.all([
        monitor.start(),
        monitor.start(),
        monitor.start(),
      ]);

      // Assert
      expect(results.map((result) => result._unsafeUnwrap())).toEqual([
        true,
        false,
        false,
      ]);
      await vi.waitFor(() => expect(events).toContainEqual({ type: "started" }));
      expect(createProbe).toHaveBeenCalledTimes(1);
      expect(events.filter((event) => event.type === "started")).toHaveLength(1);
    });

    test("start after start returns false", async () => {
      // Arrange
      const { emitter } = recordingEmitter();
      const { monitor } = setup(
        makeConfig(dir),
        vi.fn<Probe>().mockResolvedValue(true),
        emitter,
      );

      // Act
      const first = await monitor.start();
      const second = await monitor.start();

      // Assert
      expect(first._unsafeUnwrap()).toBe(true);
      expect(second._unsafeUnwrap()).toBe(false);
      expect(monitor.status().running).toBe(true);
    });

    test("returns the config error and stays idle", async () => {
      // Arrange
      const { events, emitter } = recordingEmitter();
      const { monitor } = setup(
        makeConfig(dir),
        vi.fn<Probe>().mockResolvedValue(true),
        emitter,
        {
          loadConfig: async () =>
            err(configInvalid("monitor.json", ["ntfy: Required"])),
        },
      );

      // Act
      const result = await monitor.start();

      // Assert
      expect(result._unsafeUnwrapErr().type).toBe("CONFIG_INVALID");
      expect(monitor.status().running).toBe(false);
      expect(events).toEqual([]);
    });

    test("exits without events when the watch directory is unreadable", async () => {
      // Arrange
      const { events, emitter } = recordingEmitter();
      const { monitor, createProbe } = setup(
        makeConfig(join(dir, "missing")),
        vi.fn<Probe>().mockResolvedValue(true),
        emitter,
      );

      // Act
      const result = await monitor.start();

      // Assert
      expect(result._unsafeUnwrap()).toBe(true);
      await vi.waitFor(() => expect(monitor.status().running).toBe(false));
      expect(events).toEqual([]);
      expect(createProbe).not.toHaveBeenCalled();
    });
  });

  describe("stop", () => {
    test("returns false for a monitor that never started", async () => {
      // Arrange
      const { emitter } = recordingEmitter();
      const { monitor } = setup(
        makeConfig(dir),
        vi.fn<Probe>().mockResolvedValue(true),
        emitter,
      );

      // Act & Assert
      expect(await monitor.stop(100)).toBe(false);
    });

    test("stops the loop and resets health to unknown", async () => {
      // Arrange
      const { events, emitter } = recordingEmitter();
      const { monitor } = setup(
        makeConfig(dir),
        vi.fn<Probe>().mockResolvedValue(true),
        emitter,
      );
      await monitor.start();
      await vi.waitFor(() => expect(monitor.status().online).toBe(true));

      // Act
      const stopped = await monitor.stop(1000);

      // Assert
      expect(stopped).toBe(true);
      const status = monitor.status();
      expect(status.running).toBe(false);
      expect(status.online).toBeNull();
      expect(status.lastHealthChangeAt).not.toBeNull();
      expect(events).toEqual([
        { type: "started" },
        { type: "online" },
        { type: "offline" },
        { type: "stopped" },
      ]);
    });

    test("reports false when the loop does not finish in time", async () => {
      // Arrange
      const gate = createGate();
      const emitter: MonitorEventEmitter = {
        emit: async (event): Promise<Result<void, NotificationError>> => {
          if (event.type === "stopped") await gate.wait;
          return ok(undefined);
        },
      };
      const { monitor } = setup(
        makeConfig(dir),
        vi.fn<Probe>().mockResolvedValue(true),
        emitter,
      );
      await monitor.start();

      // Act
      const stopped = await monitor.stop(20);

      // Assert
      expect(stopped).toBe(false);
      expect(monitor.status().running).toBe(true);
      gate.open();
      await vi.waitFor(() => expect(monitor.status().running).toBe(false));
    });

    test("can start again after a stop", async () => {
      // Arrange
      const { events, emitter } = recordingEmitter();
      const { monitor } = setup(
        makeConfig(dir),
        vi.fn<Probe>().mockResolvedValue(true),
        emitter,
      );
      await monitor.start();
      await monitor.stop(1000);

      // Act
      const result = await monitor.start();

      // Assert
      expect(result._unsafeUnwrap()).toBe(true);
      await vi.waitFor(() =>
        expect(events.filter((event) => event.type === "started")).toHaveLength(2),
      );
    });
  });

  // ===========================================================================
  // Health
  // ===========================================================================

  describe("health", () => {
    test("a single failed probe inside the window does not flip the verdict", async () => {
      // Arrange
      const { events, emitter } = recordingEmitter();
      const probe = vi
        .fn<Probe>()
        .mockResolvedValueOnce(true)
        .mockResolvedValueOnce(true)
        .mockResolvedValueOnce(false)
        .mockResolvedValue(true);
      const { monitor } = setup(
        makeConfig(dir, {
          health: {
            hysteresis: 3,
            probe: { method: "ping", host: "192.0.2.10", timeoutMs: 100 },
          },
        }),
        probe,
        emitter,
      );
      await monitor.start();

      // Act
      await vi.waitFor(() => expect(probe.mock.calls.length).toBeGreaterThanOrEqual(5));
      await monitor.stop(1000);

      // Assert
      expect(events).toEqual([
        { type: "started" },
        { type: "online" },
        { type: "offline" },
        { type: "stopped" },
      ]);
    });

    test("publishes each flip exactly once", async () => {
      // Arrange
      const { events, emitter } = recordingEmitter();
      const probe = vi
        .fn<Probe>()
        .mockResolvedValueOnce(false)
        .mockResolvedValueOnce(false)
        .mockResolvedValueOnce(true)
        .mockResolvedValue(true);
      const { monitor } = setup(makeConfig(dir), probe, emitter);
      await monitor.start();

      // Act
      await vi.waitFor(() => expect(probe.mock.calls.length).toBeGreaterThanOrEqual(6));
      await monitor.stop(1000);

      // Assert
      expect(events).toEqual([
        { type: "started" },
        { type: "offline" },
        { type: "online" },
        { type: "offline" },
        { type: "stopped" },
      ]);
    });
  });

  // ===========================================================================
  // Arrivals
  // ===========================================================================

  describe("arrivals", () => {
    test("alerts on new files and suppresses repeats within the cooldown", async () => {
      // Arrange
      await writeFile(join(dir, "a.jpg"), "");
      const { events, emitter } = recordingEmitter();
      const { monitor } = setup(
        makeConfig(dir),
        vi.fn<Probe>().mockResolvedValue(true),
        emitter,
      );
      await monitor.start();
      await vi.waitFor(() => expect(monitor.status().online).toBe(true));

      // Act
      await writeFile(join(dir, "b.jpg"), "");
      await writeFile(join(dir, "notes.txt"), "");
      await vi.waitFor(() =>
        expect(events).toContainEqual({ type: "motion", filenames: ["b.jpg"] }),
      );
      await writeFile(join(dir, "c.png"), "");
      await vi.waitFor(() => expect(monitor.status().knownFilesCount).toBe(3));

      // Assert
      expect(events.filter((event) => event.type === "motion")).toHaveLength(1);
      expect(monitor.status().lastAlarmAt).not.toBeNull();
    });

    test("alerts again once the cooldown is zero", async () => {
      // Arrange
      const { events, emitter } = recordingEmitter();
      const { monitor } = setup(
        makeConfig(dir, { cooldownMs: 0 }),
        vi.fn<Probe>().mockResolvedValue(true),
        emitter,
      );
      await monitor.start();
      await vi.waitFor(() => expect(monitor.status().online).toBe(true));

      // Act
      await writeFile(join(dir, "a.jpg"), "");
      await vi.waitFor(() => expect(monitor.status().knownFilesCount).toBe(1));
      await writeFile(join(dir, "b.jpg"), "");
      await vi.waitFor(() => expect(monitor.status().knownFilesCount).toBe(2));

      // Assert
      expect(events.filter((event) => event.type === "motion")).toEqual([
        { type: "motion", filenames: ["a.jpg"] },
        { type: "motion", filenames: ["b.jpg"] },
      ]);
    });

    test("keeps running and keeps known files while the directory is gone", async () => {
      // Arrange
      await writeFile(join(dir, "a.jpg"), "");
      const away = `${dir}-away`;
      const { events, emitter } = recordingEmitter();
      const probe = vi.fn<Probe>().mockResolvedValue(true);
      const { monitor } = setup(makeConfig(dir), probe, emitter);
      await monitor.start();
      await vi.waitFor(() => expect(monitor.status().online).toBe(true));

      // Act
      await rename(dir, away);
      const whileGone = probe.mock.calls.length;
      await vi.waitFor(() =>
        expect(probe.mock.calls.length).toBeGreaterThanOrEqual(whileGone + 2),
      );
      const statusWhileGone = monitor.status();

      await rename(away, dir);
      const afterReturn = probe.mock.calls.length;
      await vi.waitFor(() =>
        expect(probe.mock.calls.length).toBeGreaterThanOrEqual(afterReturn + 2),
      );

      // Assert
      expect(statusWhileGone.running).toBe(true);
      expect(statusWhileGone.knownFilesCount).toBe(1);
      expect(monitor.status().knownFilesCount).toBe(1);
      expect(events.filter((event) => event.type === "motion")).toEqual([]);

      await writeFile(join(dir, "b.jpg"), "");
      await vi.waitFor(() =>
        expect(events).toContainEqual({ type: "motion", filenames: ["b.jpg"] }),
      );
    });

    test("keeps polling when notifications cannot be delivered", async () => {
      // Arrange
      const events: MonitorEvent[] = [];
      const emitter: MonitorEventEmitter = {
        emit: async (event): Promise<Result<void, NotificationError>> => {
          events.push(event);
          return event.type === "offline" || event.type === "stopped"
            ? ok(undefined)
            : err(networkError("connection refused"));
        },
      };
      const probe = vi.fn<Probe>().mockResolvedValue(true);
      const { monitor } = setup(makeConfig(dir), probe, emitter);
      await monitor.start();
      await vi.waitFor(() => expect(events).toContainEqual({ type: "online" }));

      // Act
      await writeFile(join(dir, "a.jpg"), "");
      await vi.waitFor(() =>
        expect(events).toContainEqual({ type: "motion", filenames: ["a.jpg"] }),
      );
      const afterMotion = probe.mock.calls.length;
      await vi.waitFor(() =>
        expect(probe.mock.calls.length).toBeGreaterThanOrEqual(afterMotion + 2),
      );
      const stopped = await monitor.stop(1000);

      // Assert
      expect(stopped).toBe(true);
      expect(events.map((event) => event.type)).toEqual([
        "started",
        "online",
        "motion",
        "offline",
        "stopped",
      ]);
    });
  });

  // ===========================================================================
  // clearImages / testNotify
  // ===========================================================================

  describe("clearImages", () => {
    test("reports 0/0 for an empty directory", async () => {
      // Arrange
      const { events, emitter } = recordingEmitter();
      const { monitor } = setup(
        makeConfig(dir),
        vi.fn<Probe>().mockResolvedValue(true),
        emitter,
      );

      // Act
      const result = await monitor.clearImages();

      // Assert
      expect(result._unsafeUnwrap()).toEqual({ deleted: 0, failed: 0, failures: [] });
      expect(events).toEqual([{ type: "cleared", deletedCount: 0, failedCount: 0 }]);
    });

    test("deletes matching files while running without reporting them", async () => {
      // Arrange
      await writeFile(join(dir, "a.jpg"), "");
      await writeFile(join(dir, "b.png"), "");
      await writeFile(join(dir, "notes.txt"), "");
      const { events, emitter } = recordingEmitter();
      const { monitor } = setup(
        makeConfig(dir),
        vi.fn<Probe>().mockResolvedValue(true),
        emitter,
      );
      await monitor.start();
      await vi.waitFor(() => expect(monitor.status().online).toBe(true));

      // Act
      const result = await monitor.clearImages();

      // Assert
      expect(result._unsafeUnwrap().deleted).toBe(2);
      expect(await readdir(dir)).toEqual(["notes.txt"]);
      expect(monitor.status().knownFilesCount).toBe(0);

      await writeFile(join(dir, "a.jpg"), "");
      await vi.waitFor(() =>
        expect(events).toContainEqual({ type: "motion", filenames: ["a.jpg"] }),
      );
      expect(events.filter((event) => event.type === "motion")).toHaveLength(1);
      expect(events).toContainEqual({ type: "cleared", deletedCount: 2, failedCount: 0 });
    });

    test("a tick in flight during the clear skips its diff", async () => {
      // Arrange
      await writeFile(join(dir, "a.jpg"), "");
      const first = createGate();
      const second = createGate();
      const probe = vi
        .fn<Probe>()
        .mockResolvedValueOnce(true)
        .mockImplementationOnce(async () => {
          await first.wait;
          return true;
        })
        .mockImplementationOnce(async () => {
          await second.wait;
          return true;
        })
        .mockResolvedValue(true);
      const { events, emitter } = recordingEmitter();
      const { monitor } = setup(makeConfig(dir), probe, emitter);
      await monitor.start();
      await vi.waitFor(() => expect(probe).toHaveBeenCalledTimes(2));

      // Act
      const result = await monitor.clearImages();
      await writeFile(join(dir, "c.jpg"), "");
      first.open();
      await vi.waitFor(() => expect(probe).toHaveBeenCalledTimes(3));

      // Assert
      expect(result._unsafeUnwrap().deleted).toBe(1);
      expect(events.filter((event) => event.type === "motion")).toEqual([]);
      expect(monitor.status().knownFilesCount).toBe(0);

      second.open();
      await vi.waitFor(() =>
        expect(events).toContainEqual({ type: "motion", filenames: ["c.jpg"] }),
      );
    });

    test("returns the scan error and reports it", async () => {
      // Arrange
      const missing = join(dir, "missing");
      const { events, emitter } = recordingEmitter();
      const { monitor } = setup(
        makeConfig(missing),
        vi.fn<Probe>().mockResolvedValue(true),
        emitter,
      );

      // Act
      const result = await monitor.clearImages();

      // Assert
      expect(result._unsafeUnwrapErr().type).toBe("DIRECTORY_UNREADABLE");
      expect(events).toEqual([
        {
          type: "cleared",
          deletedCount: 0,
          failedCount: 0,
          error: expect.stringContaining(`Cannot read ${missing}`),
        },
      ]);
    });
  });

  describe("testNotify", () => {
    test("emits a test event while idle", async () => {
      // Arrange
      const { events, emitter } = recordingEmitter();
      const { monitor } = setup(
        makeConfig(dir),
        vi.fn<Probe>().mockResolvedValue(true),
        emitter,
      );

      // Act
      const result = await monitor.testNotify();

      // Assert
      expect(result.isOk()).toBe(true);
      expect(events).toEqual([{ type: "test" }]);
      expect(monitor.status().running).toBe(false);
    });

    test("returns the delivery error", async () => {
      // Arrange
      const emitter: MonitorEventEmitter = {
        emit: async (): Promise<Result<void, NotificationError>> =>
          err(networkError("connection refused")),
      };
      const { monitor } = setup(
        makeConfig(dir),
        vi.fn<Probe>().mockResolvedValue(true),
        emitter,
      );

      // Act
      const result = await monitor.testNotify();

      // Assert
      expect(result._unsafeUnwrapErr()).toEqual({
        type: "NETWORK_ERROR",
        message: "connection refused",
      });
    });
  });
});
