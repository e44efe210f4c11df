/**
 * Notifications Module - Service Layer
 *
 * ntfy integration for watcher events. Delivery failures come back as
 * Result values; nothing here throws into the monitor loop.
 */
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import { networkError, sendFailed } from "./errors.js";
import type { NotificationError } from "./errors.js";
import type {
  MonitorEventEmitter,
  NtfyConfig,
  NtfyRequest,
  TemplateVariables,
} from "./schema.js";
import { NTFY_TIMEOUT_MS } from "./schema.js";
import { buildNtfyRequest } from "./transform.js";

const log = createLogger("notifications");

// =============================================================================
// Core Send Function
// =============================================================================

/**
 * Publish a message to ntfy.
 *
 * @param request - Rendered URL, body and headers
 * @param timeoutMs - Abort the request after this long
 * @returns Result with void on success or error
 */
export async function sendNtfyMessage(
  request: NtfyRequest,
  timeoutMs: number = NTFY_TIMEOUT_MS,
): Promise<Result<void, NotificationError>> {
  log.debug({ url: request.url }, "Publishing ntfy message...");

  try {
    const response = await fetch(request.url, {
      method: "POST",
      headers: request.headers,
      body: request.body,
      signal: AbortSignal.timeout(timeoutMs),
    });

    if (!response.ok) {
      const errorText = await response.text().catch(() => "Unknown error");
      log.error(
        { statusCode: response.status, error: errorText },
        "ntfy request failed",
      );
      return err(
        sendFailed(
          `ntfy returned ${response.status}: ${errorText}`,
          response.status,
        ),
      );
    }

    return ok(undefined);
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown error";
    log.error({ error: message }, "Failed to publish ntfy message");
    return err(
      networkError(message, error instanceof Error ? error : undefined),
    );
  }
}

// =============================================================================
// Event Emitter
// =============================================================================

/**
 * Create the emitter that turns monitor events into ntfy messages.
 *
 * @param ntfy - Server, topic and templates
 * @param configVariables - Placeholder values taken from the monitor config
 * @param now - Clock used for the `{timestamp}` placeholder
 */
export function createEventEmitter(
  ntfy: NtfyConfig,
  configVariables: TemplateVariables,
  now: () => number = Date.now,
): MonitorEventEmitter {
  return {
    async emit(event) {
      const request = buildNtfyRequest(ntfy, event, configVariables, now());
      const result = await sendNtfyMessage(request);

      if (result.isOk()) {
        log.info({ event: event.type }, `ntfy(${event.type}) sent`);
      }

      return result;
    },
  };
}
