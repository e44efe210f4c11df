/**
 * Notifications Module - Pure Transformations
 *
 * Template selection, placeholder rendering and ntfy request building.
 * No side effects, no I/O - just data in, data out.
 */
import { type Result, err, ok } from "neverthrow";

import type { NotificationError } from "./errors.js";
import { templateError } from "./errors.js";
import type {
  MonitorEvent,
  NtfyConfig,
  NtfyRequest,
  NtfyTemplate,
  TemplateName,
  TemplateVariables,
} from "./schema.js";
import { DEFAULT_TEMPLATES } from "./schema.js";

// =============================================================================
// Template Selection
// =============================================================================

/**
 * Pick the template for an event. A clear that left files behind (or
 * could not list them) uses `cleared_partial`.
 */
export function selectTemplateName(event: MonitorEvent): TemplateName {
  if (
    event.type === "cleared" &&
    (event.failedCount > 0 || event.error !== undefined)
  ) {
    return "cleared_partial";
  }
  return event.type;
}

/**
 * Layer built-in template, configured defaults and configured template
 * (later wins).
 */
export function resolveTemplate(ntfy: NtfyConfig, name: TemplateName): NtfyTemplate {
  return {
    ...DEFAULT_TEMPLATES[name],
    ...ntfy.defaults,
    ...ntfy.templates[name],
  };
}

// =============================================================================
// Placeholder Rendering
// =============================================================================

const PLACEHOLDER = /\{\{|\}\}|\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Replace `{name}` placeholders. `{{` and `}}` produce literal braces.
 *
 * @returns Rendered text, or TEMPLATE_ERROR listing unknown placeholders
 *
 * @example
 * renderTemplate("{count} new", { count: "2" }) // ok("2 new")
 */
export function renderTemplate(
  template: string,
  variables: TemplateVariables,
): Result<string, NotificationError> {
  const missing: string[] = [];

  const text = template.replace(
    PLACEHOLDER,
    (match: string, name: string | undefined) => {
      if (match === "{{") return "{";
      if (match === "}}") return "}";
      if (name === undefined) return match;

      const value = Object.hasOwn(variables, name) ? variables[name] : undefined;
      if (value === undefined) {
        missing.push(name);
        return match;
      }
      return value;
    },
  );

  return missing.length === 0 ? ok(text) : err(templateError(missing));
}

/**
 * Render, falling back to the raw template with an error note so the
 * notification still goes out.
 */
export function renderOrFallback(
  template: string,
  variables: TemplateVariables,
): string {
  return renderTemplate(template, variables).match(
    (text) => text,
    (error) => `${template} (format error: ${error.message})`,
  );
}

/**
 * Placeholder values contributed by an event.
 */
export function eventVariables(
  event: MonitorEvent,
  now: number,
): TemplateVariables {
  const base = {
    event: event.type,
    timestamp: new Date(now).toISOString(),
  };

  switch (event.type) {
    case "motion":
      return {
        ...base,
        files: event.filenames.join(", "),
        count: String(event.filenames.length),
      };
    case "cleared":
      return {
        ...base,
        deleted: String(event.deletedCount),
        failed: String(event.failedCount),
        error: event.error ?? "",
      };
    default:
      return base;
  }
}

// =============================================================================
// ntfy Request Building
// =============================================================================

/**
 * Topic URL: server without trailing slash, topic without surrounding slashes.
 *
 * @example
 * buildNtfyUrl("https://ntfy.sh/", "/cam-alerts/") // "https://ntfy.sh/cam-alerts"
 */
export function buildNtfyUrl(server: string, topic: string): string {
  const base = server.replace(/\/+$/, "");
  const path = topic.trim().replace(/^\/+|\/+$/g, "");
  return `${base}/${path}`;
}

/**
 * HTTP header values must be ASCII; anything else is sent as an
 * RFC 2047 encoded word, which ntfy decodes.
 */
export function encodeHeaderValue(value: string): string {
  if (/^[\x20-\x7e]*$/.test(value)) {
    return value;
  }
  return `=?UTF-8?B?${Buffer.from(value, "utf8").toString("base64")}?=`;
}

/**
 * Comma-separated tag list, or undefined when there are no tags.
 */
export function formatTags(tags: NtfyTemplate["tags"]): string | undefined {
  if (tags === undefined) return undefined;
  const list = (Array.isArray(tags) ? tags : [tags])
    .map((tag) => tag.trim())
    .filter((tag) => tag !== "");
  return list.length > 0 ? list.join(",") : undefined;
}

/**
 * Build ntfy publish headers from a resolved template.
 */
export function buildNtfyHeaders(
  template: NtfyTemplate,
  variables: TemplateVariables,
): Record<string, string> {
  const headers: Record<string, string> = {};

  if (template.title) {
    headers["Title"] = encodeHeaderValue(renderOrFallback(template.title, variables));
  }
  if (template.priority !== undefined) {
    headers["Priority"] = String(template.priority);
  }
  const tags = formatTags(template.tags);
  if (tags !== undefined) {
    headers["Tags"] = encodeHeaderValue(tags);
  }

  return headers;
}

/**
 * Build the complete publish request for an event.
 */
export function buildNtfyRequest(
  ntfy: NtfyConfig,
  event: MonitorEvent,
  configVariables: TemplateVariables,
  now: number,
): NtfyRequest {
  const template = resolveTemplate(ntfy, selectTemplateName(event));
  const variables = { ...configVariables, ...eventVariables(event, now) };

  return {
    url: buildNtfyUrl(ntfy.server, ntfy.topic),
    body: renderOrFallback(template.message ?? "", variables).trim(),
    headers: buildNtfyHeaders(template, variables),
  };
}
