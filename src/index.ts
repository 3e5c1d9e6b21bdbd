/**
 * Energy Meter Bridge - Application Entry Point
 *
 * Sets up the Hono server with:
 * - Health check endpoint
 * - Device routes for the configured energy meter
 * - Request ID tracing
 * - Global error handling
 */
import { serve } from "@hono/node-server";

import { createApp } from "./api/app.js";
import { EnergyMeterClient } from "./client/index.js";
import { config, getDeviceConfig } from "./config.js";
import { createLogger } from "./logger.js";

const log = createLogger("api");

// =============================================================================
// CONFIGURATION
// =============================================================================

// Log configuration summary
log.info(
  {
    port: config.PORT,
    env: config.NODE_ENV,
    deviceHost: config.DEVICE_HOST ?? null,
    requestTimeoutMs: config.REQUEST_TIMEOUT_MS,
  },
  "Configuration loaded",
);

const deviceConfig = getDeviceConfig();
if (!deviceConfig) {
  log.fatal("DEVICE_HOST is not set; nothing to bridge to");
  process.exit(1);
}

const client = new EnergyMeterClient({
  host: deviceConfig.host,
  timeoutMs: deviceConfig.timeoutMs,
});

// =============================================================================
// START SERVER
// =============================================================================

const app = createApp(client);

const server = serve(
  {
    fetch: app.fetch,
    port: config.PORT,
    hostname: "0.0.0.0", // Bind to all interfaces for remote access
  },
  (info) => {
    log.info(
      { port: info.port, env: config.NODE_ENV, appName: config.APP_NAME },
      `🚀 ${config.APP_NAME} listening on port ${info.port}`,
    );
  },
);

// Identify the device up front so capability problems show in the log early
client
  .fetchDevice()
  .then((result) => {
    if (result.isErr()) {
      log.warn(
        { host: client.host, error: result.error.message },
        "Device not reachable at startup",
      );
    }
  })
  .catch((error: unknown) => {
    log.error({ error }, "Startup device lookup crashed");
  });

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

const shutdown = (signal: string) => {
  log.info({ signal }, `${signal} received. Shutting down gracefully...`);

  server.close(() => {
    client
      .close()
      .then(() => {
        log.info("Shutdown complete");
        process.exit(0);
      })
      .catch((error: unknown) => {
        log.error({ error }, "Error while closing the device client");
        process.exit(1);
      });
  });
};

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
