/**
 * Client Module - Schemas and Types
 *
 * Inputs accepted by the device client and the shapes it hands back.
 */
import type { FeatureSet } from "../features/index.js";
import type { Device, SwitchState } from "../models/index.js";
import type { Transport } from "../request/index.js";

export type ClientOptions = Readonly<{
  /** IP address or hostname of the device */
  host: string;
  /** Deadline per request; defaults to 10 seconds */
  timeoutMs?: number;
  /** Supplied transports are never closed by the client */
  transport?: Transport;
}>;

/**
 * Partial switch update. At least one field must be set.
 */
export type SwitchStateUpdate = Readonly<{
  powerOn?: boolean;
  switchLock?: boolean;
  /** 0-255 */
  brightness?: number;
}>;

export type SystemSettingsUpdate = Readonly<{
  cloudEnabled?: boolean;
}>;

/**
 * Hex strings forwarded verbatim: key is 32 characters, AAD 34.
 */
export type DecryptionKeys = Readonly<{
  key?: string;
  aad?: string;
}>;

export type DecryptionReset = Readonly<{
  key?: boolean;
  aad?: boolean;
}>;

export type SwitchStateResult =
  | { readonly supported: true; readonly state: SwitchState }
  | { readonly supported: false };

/**
 * What the client caches after the first successful `api` call.
 */
export type DeviceSnapshot = Readonly<{
  device: Device;
  features: FeatureSet;
}>;

// Wire bodies sent to the device

export type SwitchStatePayload = Readonly<{
  power_on?: boolean;
  switch_lock?: boolean;
  brightness?: number;
}>;

export type SystemSettingsPayload = Readonly<{
  cloud_enabled?: boolean;
}>;

export type DecryptionKeysPayload = Readonly<{
  key?: string;
  aad?: string;
}>;

export type DecryptionResetPayload = Readonly<{
  key: boolean;
  aad: boolean;
}>;
