/**
 * Typed configuration - all config lives in .env, parsed with Zod at startup.
 * App crashes immediately on invalid config - fail fast.
 *
 * Energy meter bridge configuration covering:
 * - Server settings
 * - Target device (host, request timeout)
 */
import { z } from "zod";

/**
 * Parse optional host - empty string becomes undefined
 */
const optionalHost = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== "" ? val.trim() : undefined));

export const ConfigSchema = z.object({
  // ==========================================================================
  // Server Configuration
  // ==========================================================================
  PORT: z.coerce.number().default(8085).describe("HTTP server port"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment"),
  APP_NAME: z.string().default("EnergyMeterBridge").describe("Application name"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),

  // ==========================================================================
  // Device Configuration
  // ==========================================================================
  DEVICE_HOST: optionalHost.describe(
    "IP address or hostname of the energy meter on the local network",
  ),
  REQUEST_TIMEOUT_MS: z.coerce
    .number()
    .positive()
    .default(10000)
    .describe("Deadline for a single device request (ms)"),
});

// Type export for use elsewhere
export type Config = z.infer<typeof ConfigSchema>;

// Parse at startup - crashes immediately if invalid
const parsed = ConfigSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config: Config = parsed.data;

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * Device connection settings for the client.
 * Returns null if no device host is configured.
 */
export function getDeviceConfig(): Readonly<{
  host: string;
  timeoutMs: number;
}> | null {
  if (!config.DEVICE_HOST) {
    return null;
  }

  return {
    host: config.DEVICE_HOST,
    timeoutMs: config.REQUEST_TIMEOUT_MS,
  };
}
