/**
 * Scanner Module - Public API
 */

// Types
export type { DeletionSummary, FileSnapshot } from "./schema.js";
export type { DeleteFailure, ScanError } from "./errors.js";

export { EMPTY_DELETION_SUMMARY } from "./schema.js";
export { directoryUnreadable, formatScanError } from "./errors.js";

// Service functions (side effects)
export { deleteFiles, scanDirectory } from "./service.js";

// Pure transformations
export {
  hasAcceptedExtension,
  normalizeExtension,
  summarizeDeletions,
} from "./transform.js";
