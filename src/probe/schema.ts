/**
 * Probe Module - Types
 */

/**
 * HTTP health check against the camera's web interface.
 */
export type HttpProbeConfig = Readonly<{
  method: "http";
  url: string;
  timeoutMs: number;
}>;

/**
 * Single ICMP echo request via the system `ping` binary.
 */
export type PingProbeConfig = Readonly<{
  method: "ping";
  host: string;
  timeoutMs: number;
}>;

export type ProbeConfig = HttpProbeConfig | PingProbeConfig;

/**
 * One reachability check. Resolves `false` on any failure, never rejects.
 */
export type Probe = () => Promise<boolean>;

/**
 * Runs a command and resolves with its exit code (null if it was killed).
 */
export type CommandRunner = (
  command: string,
  args: ReadonlyArray<string>,
  timeoutMs: number,
) => Promise<number | null>;

/**
 * Extra time granted to the ping process on top of its own `-W` deadline.
 */
export const PING_GRACE_MS = 1000;
