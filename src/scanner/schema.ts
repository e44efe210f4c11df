/**
 * Scanner Module - Types
 */
import type { DeleteFailure } from "./errors.js";

/**
 * Filenames (not paths) found in the watch directory at one point in time.
 */
export type FileSnapshot = ReadonlySet<string>;

/**
 * Aggregate outcome of deleting a batch of files.
 */
export type DeletionSummary = Readonly<{
  deleted: number;
  failed: number;
  failures: ReadonlyArray<DeleteFailure>;
}>;

export const EMPTY_DELETION_SUMMARY: DeletionSummary = {
  deleted: 0,
  failed: 0,
  failures: [],
};
