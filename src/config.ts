/**
 * Typed process configuration - server settings live in the environment,
 * parsed with Zod at startup. App crashes immediately on invalid config.
 *
 * The watcher itself (directory, camera, ntfy templates) is configured in a
 * separate JSON file that is re-read on every start, see `monitor-config/`.
 */
import { z } from "zod";

/**
 * Custom boolean parser for environment variables.
 * z.coerce.boolean() doesn't work with string "false" (it's truthy).
 */
const envBoolean = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((val) =>
      val === undefined ? defaultValue : val.toLowerCase() === "true",
    );

export const ConfigSchema = z.object({
  // ==========================================================================
  // Server Configuration
  // ==========================================================================
  PORT: z.coerce.number().int().positive().default(8080).describe("HTTP server port"),
  HOST: z.string().min(1).default("0.0.0.0").describe("HTTP listen address"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment"),
  APP_NAME: z.string().default("CamWatch").describe("Application name"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),

  // ==========================================================================
  // Watcher Configuration
  // ==========================================================================
  MONITOR_CONFIG_PATH: z
    .string()
    .min(1)
    .default("./config/monitor.json")
    .describe("JSON file with watch directory, camera probe and ntfy settings"),
  AUTO_START: envBoolean(true).describe(
    "Start the watcher as soon as the service is up",
  ),
  STOP_TIMEOUT_MS: z.coerce
    .number()
    .positive()
    .max(2_147_483_647)
    .default(5000)
    .describe("How long POST /stop and shutdown wait for the loop to exit (ms)"),
});

// Parse at startup - crashes immediately if invalid
const parsed = ConfigSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config = parsed.data;

export type Config = z.infer<typeof ConfigSchema>;
