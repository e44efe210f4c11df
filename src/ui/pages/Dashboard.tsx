/**
 * Watcher Dashboard
 *
 * Server-rendered page; HTMX polls the status panel and posts the
 * control actions to the JSON endpoints.
 */
import type { FC } from "hono/jsx";

import type { StatusSnapshot } from "../../monitoring/index.js";
import { StatusPanel } from "../components/StatusPanel.js";
import { BaseLayout } from "../layouts/Base.js";

/**
 * Button posting to one control endpoint; the JSON reply lands in #action-result.
 */
const ActionButton: FC<{ path: string; label: string; variant?: string }> = ({
  path,
  label,
  variant = "outline",
}) => (
  <button
    type="button"
    class={variant}
    hx-post={path}
    hx-target="#action-result"
    hx-swap="innerHTML"
  >
    {label}
  </button>
);

type DashboardProps = {
  appName: string;
  status: StatusSnapshot;
};

export const Dashboard: FC<DashboardProps> = ({ appName, status }) => (
  <BaseLayout title={appName}>
    <h1>{appName}</h1>

    <StatusPanel status={status} />

    <div class="grid" style={{ marginTop: "1.5rem" }}>
      <ActionButton path="/start" label="Start" />
      <ActionButton path="/stop" label="Stop" />
      <ActionButton path="/test_notify" label="Test notification" variant="secondary outline" />
      <ActionButton path="/clear_images" label="Clear images" variant="contrast outline" />
    </div>

    <pre id="action-result" style={{ marginTop: "1rem", fontSize: "0.8rem" }} />
  </BaseLayout>
);
