/**
 * Client Module - Public API
 */

// Types
export type {
  ClientOptions,
  DecryptionKeys,
  DecryptionReset,
  DeviceSnapshot,
  SwitchStateResult,
  SwitchStateUpdate,
  SystemSettingsUpdate,
} from "./schema.js";

// Client
export {
  DEFAULT_TIMEOUT_MS,
  EnergyMeterClient,
  SUPPORTED_API_VERSION,
} from "./service.js";

// Pure transformations
export {
  AAD_LENGTH,
  KEY_LENGTH,
  buildDecryptionKeysPayload,
  buildDecryptionResetPayload,
  buildSwitchStatePayload,
  buildSystemSettingsPayload,
} from "./transform.js";

// Re-exported for library consumers
export type { FeatureSet } from "../features/index.js";
export type {
  DecryptionStatus,
  Device,
  ExternalDevice,
  ExternalDeviceType,
  MeteredData,
  SwitchState,
  SystemSettings,
} from "../models/index.js";
export type { EnergyApiError, Transport } from "../request/index.js";
export { formatEnergyApiError, isRetryable } from "../request/index.js";
