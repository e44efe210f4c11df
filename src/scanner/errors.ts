/**
 * Scanner Module - Error Types
 *
 * Errors are values, not exceptions.
 */

/**
 * Errors that can occur while reading or clearing the watch directory.
 */
export type ScanError = {
  readonly type: "DIRECTORY_UNREADABLE";
  readonly dir: string;
  readonly message: string;
  readonly cause?: Error;
};

/**
 * A single file that could not be deleted.
 */
export type DeleteFailure = Readonly<{
  filename: string;
  message: string;
}>;

/**
 * Create a DIRECTORY_UNREADABLE error.
 */
export function directoryUnreadable(
  dir: string,
  message: string,
  cause?: Error,
): ScanError {
  if (cause) {
    return { type: "DIRECTORY_UNREADABLE", dir, message, cause };
  }
  return { type: "DIRECTORY_UNREADABLE", dir, message };
}

/**
 * Format a ScanError for logging and API responses.
 */
export function formatScanError(error: ScanError): string {
  return `Cannot read ${error.dir}: ${error.message}`;
}
