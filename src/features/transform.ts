/**
 * Features Module - Pure Transformations
 *
 * Static capability lookup from product type and firmware version.
 * No probing: the device is never asked what it supports.
 */
import {
  type Capability,
  type CapabilityRule,
  type FeatureSet,
  NO_FEATURES,
  PRODUCTS,
  type ProductDefinition,
} from "./schema.js";

// =============================================================================
// Firmware Versions
// =============================================================================

const VERSION_PATTERN = /^\d+(\.\d+)*$/;

/**
 * Split a firmware version into numeric components.
 *
 * @returns the components, or null if the version is not dot-separated digits
 *
 * @example
 * parseFirmwareVersion("4.19"); // [4, 19]
 * parseFirmwareVersion("4.19-beta"); // null
 */
export function parseFirmwareVersion(
  version: string | null,
): ReadonlyArray<number> | null {
  if (version === null) {
    return null;
  }
  const trimmed = version.trim();
  if (!VERSION_PATTERN.test(trimmed)) {
    return null;
  }
  return trimmed.split(".").map(Number);
}

/**
 * Compare two parsed versions component by component.
 * Missing trailing components count as zero, so "3" equals "3.0".
 *
 * @returns negative if a < b, zero if equal, positive if a > b
 */
export function compareVersions(
  a: ReadonlyArray<number>,
  b: ReadonlyArray<number>,
): number {
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    if (diff !== 0) {
      return diff;
    }
  }
  return 0;
}

/**
 * Check a firmware-gated rule. An unparsable version fails closed.
 */
function satisfies(
  rule: CapabilityRule | undefined,
  firmware: ReadonlyArray<number> | null,
): boolean {
  if (rule === undefined) {
    return false;
  }
  if (rule.since === "always") {
    return true;
  }
  const required = parseFirmwareVersion(rule.minFirmware);
  if (firmware === null || required === null) {
    return false;
  }
  return compareVersions(firmware, required) >= 0;
}

// =============================================================================
// Resolution
// =============================================================================

function findProduct(productType: string | null): ProductDefinition | null {
  if (productType === null) {
    return null;
  }
  if (!Object.prototype.hasOwnProperty.call(PRODUCTS, productType)) {
    return null;
  }
  return PRODUCTS[productType] ?? null;
}

/**
 * Derive the capability set for a device.
 * Unknown product types get no capabilities, which keeps reads possible and
 * refuses every write.
 *
 * @example
 * resolveFeatures("HWE-SKT", "3.01");
 * // { hasState: true, hasSystem: true, hasIdentify: true, hasDecryption: false }
 */
export function resolveFeatures(
  productType: string | null,
  firmwareVersion: string | null,
): FeatureSet {
  const product = findProduct(productType);
  if (product === null) {
    return NO_FEATURES;
  }

  const firmware = parseFirmwareVersion(firmwareVersion);
  const has = (capability: Capability): boolean =>
    satisfies(product.capabilities[capability], firmware);

  return {
    hasState: has("hasState"),
    hasSystem: has("hasSystem"),
    hasIdentify: has("hasIdentify"),
    hasDecryption: has("hasDecryption"),
  };
}

/**
 * Human-readable model name for a product type, or null if unknown.
 */
export function getProductName(productType: string | null): string | null {
  return findProduct(productType)?.name ?? null;
}

/**
 * Format a feature set for logging: "state, identify" or "none".
 */
export function formatFeatureSet(features: FeatureSet): string {
  const enabled = [
    features.hasState ? "state" : null,
    features.hasSystem ? "system" : null,
    features.hasIdentify ? "identify" : null,
    features.hasDecryption ? "decryption" : null,
  ].filter((name): name is string => name !== null);

  return enabled.length > 0 ? enabled.join(", ") : "none";
}
