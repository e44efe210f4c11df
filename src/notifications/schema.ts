/**
 * Notifications Module - Schemas and Types
 *
 * Event taxonomy of the watcher and the ntfy templates that render it.
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import type { Result } from "neverthrow";
import { z } from "zod";

import type { NotificationError } from "./errors.js";

// =============================================================================
// Monitor Events
// =============================================================================

/**
 * Everything the watcher reports to the notification sink.
 */
export type MonitorEvent =
  | Readonly<{ type: "started" }>
  | Readonly<{ type: "stopped" }>
  | Readonly<{ type: "online" }>
  | Readonly<{ type: "offline" }>
  | Readonly<{ type: "motion"; filenames: ReadonlyArray<string> }>
  | Readonly<{
      type: "cleared";
      deletedCount: number;
      failedCount: number;
      error?: string;
    }>
  | Readonly<{ type: "test" }>;

export type MonitorEventType = MonitorEvent["type"];

/**
 * Sink for monitor events. `emit` resolves with a Result and never rejects.
 */
export type MonitorEventEmitter = Readonly<{
  emit: (event: MonitorEvent) => Promise<Result<void, NotificationError>>;
}>;

// =============================================================================
// ntfy Templates
// =============================================================================

/**
 * ntfy priority: 1-5 or one of its named levels.
 */
export const PrioritySchema = z.union([
  z.number().int().min(1).max(5),
  z.enum(["min", "low", "default", "high", "urgent", "max"]),
]);

/**
 * One message template. Every field is optional so templates can be
 * layered over `defaults`.
 */
export const NtfyTemplateSchema = z.object({
  title: z.string().optional().describe("Title header, may contain {placeholders}"),
  priority: PrioritySchema.optional(),
  tags: z
    .union([z.array(z.string()), z.string()])
    .optional()
    .describe("Emoji shortcodes or plain tags"),
  message: z.string().optional().describe("Body, may contain {placeholders}"),
});

export type NtfyTemplate = z.infer<typeof NtfyTemplateSchema>;

/**
 * Template names. `cleared_partial` replaces `cleared` when a deletion failed.
 */
export const TEMPLATE_NAMES = [
  "started",
  "stopped",
  "online",
  "offline",
  "motion",
  "cleared",
  "cleared_partial",
  "test",
] as const;

export type TemplateName = (typeof TEMPLATE_NAMES)[number];

export const NtfyTemplatesSchema = z
  .object({
    started: NtfyTemplateSchema.optional(),
    stopped: NtfyTemplateSchema.optional(),
    online: NtfyTemplateSchema.optional(),
    offline: NtfyTemplateSchema.optional(),
    motion: NtfyTemplateSchema.optional(),
    cleared: NtfyTemplateSchema.optional(),
    cleared_partial: NtfyTemplateSchema.optional(),
    test: NtfyTemplateSchema.optional(),
  })
  .strict();

export const NtfyConfigSchema = z.object({
  server: z.string().url().default("https://ntfy.sh").describe("ntfy server base URL"),
  topic: z.string().trim().min(1, "ntfy.topic is required"),
  defaults: NtfyTemplateSchema.default({}),
  templates: NtfyTemplatesSchema.default({}),
});

export type NtfyConfig = z.infer<typeof NtfyConfigSchema>;

/**
 * Built-in templates, used for anything the config file leaves out.
 */
export const DEFAULT_TEMPLATES: Readonly<Record<TemplateName, NtfyTemplate>> = {
  started: {
    title: "{name}",
    tags: ["eyes"],
    message: "Watcher started for {watch_dir}",
  },
  stopped: {
    title: "{name}",
    tags: ["stop_sign"],
    message: "Watcher stopped",
  },
  online: {
    title: "{name}",
    tags: ["white_check_mark"],
    message: "Camera is online",
  },
  offline: {
    title: "{name}",
    priority: 4,
    tags: ["warning"],
    message: "Camera is offline",
  },
  motion: {
    title: "{name}: motion",
    priority: 4,
    tags: ["rotating_light"],
    message: "{count} new image(s): {files}",
  },
  cleared: {
    title: "{name}",
    tags: ["wastebasket"],
    message: "Deleted {deleted} image(s)",
  },
  cleared_partial: {
    title: "{name}",
    priority: 4,
    tags: ["warning"],
    message: "Clearing incomplete: {deleted} deleted, {failed} failed. {error}",
  },
  test: {
    title: "{name}",
    tags: ["test_tube"],
    message: "Test notification from {name}",
  },
};

// =============================================================================
// Rendering
// =============================================================================

/**
 * Values available to `{placeholders}`.
 */
export type TemplateVariables = Readonly<Record<string, string>>;

/**
 * Fully rendered HTTP request for ntfy.
 */
export type NtfyRequest = Readonly<{
  url: string;
  body: string;
  headers: Readonly<Record<string, string>>;
}>;

/**
 * Timeout for one ntfy publish.
 */
export const NTFY_TIMEOUT_MS = 8_000;
