/**
 * Features Module - Public API
 */

// Types
export type {
  Capability,
  CapabilityRule,
  FeatureSet,
  ProductDefinition,
} from "./schema.js";

export { NO_FEATURES, PRODUCTS } from "./schema.js";

// Pure transformations
export {
  compareVersions,
  formatFeatureSet,
  getProductName,
  parseFirmwareVersion,
  resolveFeatures,
} from "./transform.js";
