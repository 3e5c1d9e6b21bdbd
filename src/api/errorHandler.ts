/**
 * Global error boundary - catches anything a route throws.
 * Device failures never reach here; they come back as Result values.
 */
import type { ErrorHandler } from "hono";

import { config } from "../config.js";
import { createLogger } from "../logger.js";

const log = createLogger("api");

/**
 * Logs the error with request context and answers 500 with the same
 * envelope as device errors.
 */
export const errorHandler: ErrorHandler = (err, c) => {
  const requestId = c.get("requestId") ?? "unknown";

  log.error(
    {
      operation: "unhandledError",
      requestId,
      error: err.message,
      stack: err.stack,
      path: c.req.path,
      method: c.req.method,
    },
    "❌ Unhandled error",
  );

  // Don't expose internal errors in production
  const message =
    config.NODE_ENV === "production" ? "Internal server error" : err.message;

  return c.json(
    {
      error: { type: "INTERNAL_ERROR", message },
      requestId,
    },
    500,
  );
};
