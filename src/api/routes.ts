/**
 * API routes for the energy meter bridge.
 *
 * Routes map one-to-one onto client operations:
 * - /api/health - Health check
 * - /api/device - Identity and capabilities
 * - /api/data - Metered data
 * - /api/state, /api/system, /api/identify, /api/decryption - Device settings
 */
import { type Context, Hono } from "hono";
import { type Result, err, ok } from "neverthrow";
import { z } from "zod";

import type { EnergyMeterClient } from "../client/index.js";
import { getProductName } from "../features/index.js";
import { createLogger } from "../logger.js";
import {
  type EnergyApiError,
  type EnergyApiErrorType,
  formatEnergyApiError,
} from "../request/index.js";

const log = createLogger("api");

// =============================================================================
// Request Bodies
// =============================================================================

const SwitchStateBodySchema = z.object({
  powerOn: z.boolean().optional(),
  switchLock: z.boolean().optional(),
  brightness: z.number().int().min(0).max(255).optional(),
});

const SystemSettingsBodySchema = z.object({
  cloudEnabled: z.boolean().optional(),
});

const DecryptionKeysBodySchema = z.object({
  key: z.string().optional(),
  aad: z.string().optional(),
});

const DecryptionResetBodySchema = z.object({
  key: z.boolean().optional(),
  aad: z.boolean().optional(),
});

type BodyError = Readonly<{ message: string; issues: z.ZodIssue[] }>;

/**
 * Read and validate a JSON body. An empty body reads as `{}`.
 */
async function parseBody<Out>(
  c: Context,
  schema: z.ZodType<Out, z.ZodTypeDef, unknown>,
): Promise<Result<Out, BodyError>> {
  const text = await c.req.text();

  let json: unknown = {};
  if (text.trim() !== "") {
    try {
      json = JSON.parse(text);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return err({ message: `Malformed JSON body: ${message}`, issues: [] });
    }
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    return err({ message: "Invalid request body", issues: parsed.error.issues });
  }
  return ok(parsed.data);
}

// =============================================================================
// Error Responses
// =============================================================================

const ERROR_STATUS = {
  INVALID_ARGUMENT: 400,
  UNSUPPORTED: 409,
  UNSUPPORTED_API_VERSION: 502,
  TRANSPORT_ERROR: 502,
  UNEXPECTED_STATUS: 502,
  API_DISABLED: 503,
  TIMEOUT: 504,
} as const satisfies Record<EnergyApiErrorType, number>;

function errorResponse(c: Context, error: EnergyApiError) {
  const requestId = c.get("requestId");
  log.warn(
    { requestId, path: c.req.path, error: formatEnergyApiError(error) },
    "Device operation failed",
  );

  const hint =
    error.type === "INVALID_ARGUMENT" && error.hint !== undefined
      ? { hint: error.hint }
      : {};

  return c.json(
    { error: { type: error.type, message: error.message, ...hint }, requestId },
    ERROR_STATUS[error.type],
  );
}

function badBodyResponse(c: Context, error: BodyError) {
  return c.json(
    {
      error: {
        type: "INVALID_BODY",
        message: error.message,
        issues: error.issues.map((issue) => ({
          path: issue.path.join("."),
          message: issue.message,
        })),
      },
      requestId: c.get("requestId"),
    },
    400,
  );
}

// =============================================================================
// Routes
// =============================================================================

/**
 * Build the bridge routes for one device client.
 */
export function createRoutes(client: EnergyMeterClient): Hono {
  const routes = new Hono();

  /**
   * Health endpoint - makes no device request.
   */
  routes.get("/api/health", (c) => {
    const requestId = c.get("requestId");
    log.debug({ requestId }, "Health check");

    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      requestId,
      device: { host: client.host },
    });
  });

  // ---------------------------------------------------------------------------
  // Identity
  // ---------------------------------------------------------------------------

  routes.get("/api/device", async (c) => {
    const requestId = c.get("requestId");
    log.info({ requestId }, "GET /api/device");

    const device = await client.fetchDevice();
    if (device.isErr()) {
      return errorResponse(c, device.error);
    }

    const features = await client.fetchFeatures();
    if (features.isErr()) {
      return errorResponse(c, features.error);
    }

    return c.json({
      device: device.value,
      modelName: getProductName(device.value.productType),
      features: features.value,
      requestId,
    });
  });

  // ---------------------------------------------------------------------------
  // Measurements
  // ---------------------------------------------------------------------------

  routes.get("/api/data", async (c) => {
    const requestId = c.get("requestId");

    const result = await client.fetchMeteredData();
    if (result.isErr()) {
      return errorResponse(c, result.error);
    }

    return c.json({ data: result.value, requestId });
  });

  // ---------------------------------------------------------------------------
  // Switch State
  // ---------------------------------------------------------------------------

  routes.get("/api/state", async (c) => {
    const requestId = c.get("requestId");

    const result = await client.fetchSwitchState();
    if (result.isErr()) {
      return errorResponse(c, result.error);
    }

    return c.json({ ...result.value, requestId });
  });

  routes.put("/api/state", async (c) => {
    const requestId = c.get("requestId");
    log.info({ requestId }, "PUT /api/state");

    const body = await parseBody(c, SwitchStateBodySchema);
    if (body.isErr()) {
      return badBodyResponse(c, body.error);
    }

    const result = await client.setSwitchState(body.value);
    if (result.isErr()) {
      return errorResponse(c, result.error);
    }

    return c.json({ success: true, requestId });
  });

  // ---------------------------------------------------------------------------
  // System Settings
  // ---------------------------------------------------------------------------

  routes.get("/api/system", async (c) => {
    const requestId = c.get("requestId");

    const result = await client.fetchSystemSettings();
    if (result.isErr()) {
      return errorResponse(c, result.error);
    }

    return c.json({ system: result.value, requestId });
  });

  routes.put("/api/system", async (c) => {
    const requestId = c.get("requestId");
    log.info({ requestId }, "PUT /api/system");

    const body = await parseBody(c, SystemSettingsBodySchema);
    if (body.isErr()) {
      return badBodyResponse(c, body.error);
    }

    const result = await client.setSystemSettings(body.value);
    if (result.isErr()) {
      return errorResponse(c, result.error);
    }

    return c.json({ success: true, requestId });
  });

  // ---------------------------------------------------------------------------
  // Identify
  // ---------------------------------------------------------------------------

  routes.put("/api/identify", async (c) => {
    const requestId = c.get("requestId");
    log.info({ requestId }, "PUT /api/identify");

    const result = await client.identify();
    if (result.isErr()) {
      return errorResponse(c, result.error);
    }

    return c.json({ success: true, requestId });
  });

  // ---------------------------------------------------------------------------
  // Decryption
  // ---------------------------------------------------------------------------

  routes.get("/api/decryption", async (c) => {
    const requestId = c.get("requestId");

    const result = await client.fetchDecryptionStatus();
    if (result.isErr()) {
      return errorResponse(c, result.error);
    }

    return c.json({ decryption: result.value, requestId });
  });

  routes.put("/api/decryption", async (c) => {
    const requestId = c.get("requestId");
    log.info({ requestId }, "PUT /api/decryption");

    const body = await parseBody(c, DecryptionKeysBodySchema);
    if (body.isErr()) {
      return badBodyResponse(c, body.error);
    }

    const result = await client.setDecryptionKeys(body.value);
    if (result.isErr()) {
      return errorResponse(c, result.error);
    }

    return c.json({ success: true, requestId });
  });

  routes.delete("/api/decryption", async (c) => {
    const requestId = c.get("requestId");
    log.info({ requestId }, "DELETE /api/decryption");

    const body = await parseBody(c, DecryptionResetBodySchema);
    if (body.isErr()) {
      return badBodyResponse(c, body.error);
    }

    const result = await client.resetDecryptionKeys(body.value);
    if (result.isErr()) {
      return errorResponse(c, result.error);
    }

    return c.json({ success: true, requestId });
  });

  return routes;
}
