/**
 * Scanner Module - Pure Transformations
 *
 * Extension matching and deletion bookkeeping. No I/O.
 */
import { extname } from "node:path";
import type { Result } from "neverthrow";

import type { DeleteFailure } from "./errors.js";
import type { DeletionSummary } from "./schema.js";
import { EMPTY_DELETION_SUMMARY } from "./schema.js";

/**
 * Normalize a configured extension to lower case with a leading dot.
 *
 * @example
 * normalizeExtension("JPG") // ".jpg"
 * normalizeExtension(".Png") // ".png"
 */
export function normalizeExtension(extension: string): string {
  const trimmed = extension.trim().toLowerCase();
  return trimmed.startsWith(".") ? trimmed : `.${trimmed}`;
}

/**
 * Check whether a filename ends in one of the accepted extensions.
 * Only the last suffix counts, compared case-insensitively; dotfiles
 * such as `.jpg` have no extension.
 */
export function hasAcceptedExtension(
  filename: string,
  extensions: ReadonlySet<string>,
): boolean {
  const extension = extname(filename).toLowerCase();
  return extension !== "" && extensions.has(extension);
}

/**
 * Fold per-file deletion results into counts.
 */
export function summarizeDeletions(
  results: ReadonlyArray<Result<string, DeleteFailure>>,
): DeletionSummary {
  return results.reduce<DeletionSummary>(
    (summary, result) =>
      result.match(
        () => ({ ...summary, deleted: summary.deleted + 1 }),
        (failure) => ({
          ...summary,
          failed: summary.failed + 1,
          failures: [...summary.failures, failure],
        }),
      ),
    EMPTY_DELETION_SUMMARY,
  );
}
