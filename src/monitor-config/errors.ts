/**
 * Monitor Config Module - Error Types
 */

/**
 * Errors that can occur while loading the monitor config file.
 */
export type MonitorConfigError =
  | {
      readonly type: "CONFIG_UNREADABLE";
      readonly path: string;
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "CONFIG_INVALID";
      readonly path: string;
      readonly message: string;
      readonly issues: ReadonlyArray<string>;
    };

/**
 * Create a CONFIG_UNREADABLE error (missing file, bad permissions, bad JSON).
 */
export function configUnreadable(
  path: string,
  message: string,
  cause?: Error,
): MonitorConfigError {
  if (cause) {
    return { type: "CONFIG_UNREADABLE", path, message, cause };
  }
  return { type: "CONFIG_UNREADABLE", path, message };
}

/**
 * Create a CONFIG_INVALID error from schema issues.
 */
export function configInvalid(
  path: string,
  issues: ReadonlyArray<string>,
): MonitorConfigError {
  return {
    type: "CONFIG_INVALID",
    path,
    message: `Invalid monitor config: ${issues.join("; ")}`,
    issues,
  };
}

/**
 * Format a MonitorConfigError for logging and API responses.
 */
export function formatMonitorConfigError(error: MonitorConfigError): string {
  switch (error.type) {
    case "CONFIG_UNREADABLE":
      return `Cannot load ${error.path}: ${error.message}`;
    case "CONFIG_INVALID":
      return `${error.path}: ${error.message}`;
  }
}
