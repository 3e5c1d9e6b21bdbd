/**
 * Models Module - Public API
 *
 * Typed records for every device endpoint and their decoders.
 */

// Types
export type {
  DecryptionStatus,
  Device,
  ExternalDevice,
  ExternalDeviceType,
  KnownExternalDeviceType,
  MeteredData,
  SwitchState,
  SystemSettings,
} from "./schema.js";

export { EXTERNAL_DEVICE_TYPES } from "./schema.js";

// Pure transformations
export {
  formatCompactTimestamp,
  parseCompactTimestamp,
  parseDecryptionStatus,
  parseDevice,
  parseExternalDevice,
  parseExternalDevices,
  parseMeteredData,
  parseSwitchState,
  parseSystemSettings,
  toExternalDeviceType,
} from "./transform.js";
