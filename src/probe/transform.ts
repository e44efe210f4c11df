/**
 * Probe Module - Pure Transformations
 */

/**
 * Any answer below 500 proves the camera is up, including auth challenges
 * (401/403) from cameras that protect their web UI.
 */
export function isReachableStatus(status: number): boolean {
  return status < 500;
}

/**
 * Build `ping` arguments for a single echo with a whole-second deadline.
 *
 * @example
 * buildPingArgs("192.168.1.50", 2500) // ["-c", "1", "-W", "3", "192.168.1.50"]
 */
export function buildPingArgs(host: string, timeoutMs: number): string[] {
  const seconds = Math.max(1, Math.ceil(timeoutMs / 1000));
  return ["-c", "1", "-W", String(seconds), host];
}
