/**
 * Monitor Config Module - Schemas and Types
 *
 * The JSON file describing what to watch, how to probe the camera and
 * where to send notifications. Durations are written in human units in
 * the file and converted to milliseconds for the monitor.
 */
import { z } from "zod";

import { NtfyConfigSchema } from "../notifications/index.js";
import type { NtfyConfig } from "../notifications/index.js";
import type { ProbeConfig } from "../probe/index.js";

// =============================================================================
// File Schema
// =============================================================================

export const ProbeFileSchema = z.discriminatedUnion("method", [
  z.object({
    method: z.literal("http"),
    url: z.string().url(),
    timeoutSeconds: z.number().positive().default(3),
  }),
  z.object({
    method: z.literal("ping"),
    host: z.string().trim().min(1),
    timeoutSeconds: z.number().positive().default(2),
  }),
]);

export const HealthFileSchema = z.object({
  hysteresis: z
    .number()
    .int()
    .min(1)
    .max(1000)
    .default(1)
    .describe("Samples in the majority-vote window"),
  probe: ProbeFileSchema,
});

export const MonitorConfigFileSchema = z.object({
  name: z.string().trim().min(1).default("Webcam").describe("Label used in messages"),
  watchDir: z.string().trim().min(1).describe("Directory the camera uploads into"),
  extensions: z
    .array(z.string().trim().min(1))
    .min(1)
    .default([".jpg", ".jpeg", ".png"]),
  // Timer delays above 2^31-1 ms fire after 1 ms
  pollIntervalSeconds: z.number().positive().max(2_147_483).default(5),
  cooldownMinutes: z.number().min(0).default(10),
  webUrl: z.string().url().optional().describe("Link to the image gallery"),
  health: HealthFileSchema,
  ntfy: NtfyConfigSchema,
});

export type MonitorConfigFile = z.infer<typeof MonitorConfigFileSchema>;

// =============================================================================
// Runtime Config
// =============================================================================

/**
 * Validated, immutable config for one run of the watcher.
 */
export type MonitorConfig = Readonly<{
  name: string;
  watchDir: string;
  /** Lower case with leading dot */
  extensions: ReadonlySet<string>;
  pollIntervalMs: number;
  cooldownMs: number;
  webUrl: string | undefined;
  health: Readonly<{
    hysteresis: number;
    probe: ProbeConfig;
  }>;
  ntfy: NtfyConfig;
}>;
