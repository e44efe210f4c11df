/**
 * HTTP application: middleware, error boundary and routes around one monitor.
 */
import { Hono } from "hono";

import type { Monitor } from "../monitoring/index.js";
import { errorHandler } from "./errorHandler.js";
import { requestIdMiddleware } from "./middleware/requestId.js";
import { type RoutesOptions, createRoutes } from "./routes.js";

export function createApp(monitor: Monitor, options: RoutesOptions): Hono {
  const app = new Hono();

  app.use("*", requestIdMiddleware);
  app.onError(errorHandler);
  app.route("/", createRoutes(monitor, options));

  return app;
}
