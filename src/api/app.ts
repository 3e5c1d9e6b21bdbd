/**
 * Bridge application: middleware, error boundary and routes around one
 * device client.
 */
import { Hono } from "hono";

import type { EnergyMeterClient } from "../client/index.js";
import { errorHandler } from "./errorHandler.js";
import { requestIdMiddleware } from "./middleware/requestId.js";
import { createRoutes } from "./routes.js";

export function createApp(client: EnergyMeterClient): Hono {
  const app = new Hono();

  // Global middleware
  app.use("*", requestIdMiddleware);

  // Error handler
  app.onError(errorHandler);

  app.route("/", createRoutes(client));
  app.notFound((c) =>
    c.json(
      {
        error: {
          type: "NOT_FOUND",
          message: `No route for ${c.req.method} ${c.req.path}`,
        },
        requestId: c.get("requestId"),
      },
      404,
    ),
  );

  return app;
}
