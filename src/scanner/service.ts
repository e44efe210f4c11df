/**
 * Scanner Module - Service Layer
 *
 * Filesystem access for the watch directory: listing snapshots and
 * deleting them on request.
 */
import { readdir, unlink } from "node:fs/promises";
import { join } from "node:path";
import { type Result, ResultAsync } from "neverthrow";

import { createLogger } from "../logger.js";
import type { DeleteFailure, ScanError } from "./errors.js";
import { directoryUnreadable } from "./errors.js";
import type { DeletionSummary, FileSnapshot } from "./schema.js";
import { hasAcceptedExtension, summarizeDeletions } from "./transform.js";

const log = createLogger("scanner");

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * List the regular files in `dir` whose extension is accepted.
 *
 * @param dir - Directory to scan
 * @param extensions - Normalized extensions (lower case, leading dot)
 * @returns Set of filenames, or DIRECTORY_UNREADABLE
 */
export async function scanDirectory(
  dir: string,
  extensions: ReadonlySet<string>,
): Promise<Result<FileSnapshot, ScanError>> {
  return ResultAsync.fromPromise(
    readdir(dir, { withFileTypes: true }),
    (error) => {
      const cause = toError(error);
      return directoryUnreadable(dir, cause.message, cause);
    },
  ).map(
    (entries): FileSnapshot =>
      new Set(
        entries
          .filter(
            (entry) =>
              entry.isFile() && hasAcceptedExtension(entry.name, extensions),
          )
          .map((entry) => entry.name),
      ),
  );
}

/**
 * Delete one file, reporting the outcome as a value.
 */
async function deleteFile(
  dir: string,
  filename: string,
): Promise<Result<string, DeleteFailure>> {
  return ResultAsync.fromPromise(
    unlink(join(dir, filename)),
    (error): DeleteFailure => ({
      filename,
      message: toError(error).message,
    }),
  ).map(() => filename);
}

/**
 * Delete every listed file in `dir`. A failing file never stops the batch.
 */
export async function deleteFiles(
  dir: string,
  filenames: Iterable<string>,
): Promise<DeletionSummary> {
  const results: Result<string, DeleteFailure>[] = [];

  for (const filename of filenames) {
    const result = await deleteFile(dir, filename);
    if (result.isErr()) {
      log.warn(
        { dir, filename, error: result.error.message },
        "Failed to delete file",
      );
    }
    results.push(result);
  }

  const summary = summarizeDeletions(results);
  log.info(
    { dir, deleted: summary.deleted, failed: summary.failed },
    "Deletion batch finished",
  );
  return summary;
}
