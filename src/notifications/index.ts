/**
 * Notifications Module - Public API
 *
 * Exports types, service functions, and transformations for the notifications module.
 */

// Types
export type {
  MonitorEvent,
  MonitorEventEmitter,
  MonitorEventType,
  NtfyConfig,
  NtfyRequest,
  NtfyTemplate,
  TemplateName,
  TemplateVariables,
} from "./schema.js";

export {
  DEFAULT_TEMPLATES,
  NTFY_TIMEOUT_MS,
  NtfyConfigSchema,
  TEMPLATE_NAMES,
} from "./schema.js";

// Error types
export type { NotificationError } from "./errors.js";

export {
  formatNotificationError,
  networkError,
  sendFailed,
  templateError,
} from "./errors.js";

// Service functions
export { createEventEmitter, sendNtfyMessage } from "./service.js";

// Pure transformations (for testing and external use)
export {
  buildNtfyHeaders,
  buildNtfyRequest,
  buildNtfyUrl,
  encodeHeaderValue,
  eventVariables,
  formatTags,
  renderOrFallback,
  renderTemplate,
  resolveTemplate,
  selectTemplateName,
} from "./transform.js";
