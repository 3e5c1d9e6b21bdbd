/**
 * Client Module - Pure Transformations
 *
 * Argument validation and wire-body construction. No I/O.
 */
import { type Result, err, ok } from "neverthrow";

import { type EnergyApiError, invalidArgument } from "../request/index.js";
import type {
  DecryptionKeys,
  DecryptionKeysPayload,
  DecryptionReset,
  DecryptionResetPayload,
  SwitchStatePayload,
  SwitchStateUpdate,
  SystemSettingsPayload,
  SystemSettingsUpdate,
} from "./schema.js";

export const KEY_LENGTH = 32;
export const AAD_LENGTH = 34;

const AAD_PREFIX_HINT = "Try prefixing AAD with '30', e.g. '30<AAD>'";

const HEX = /^[0-9a-fA-F]*$/;

// =============================================================================
// Switch State
// =============================================================================

export function buildSwitchStatePayload(
  update: SwitchStateUpdate,
): Result<SwitchStatePayload, EnergyApiError> {
  const payload: SwitchStatePayload = {
    ...(update.powerOn !== undefined ? { power_on: update.powerOn } : {}),
    ...(update.switchLock !== undefined
      ? { switch_lock: update.switchLock }
      : {}),
    ...(update.brightness !== undefined
      ? { brightness: update.brightness }
      : {}),
  };

  if (Object.keys(payload).length === 0) {
    return err(
      invalidArgument(
        "state",
        "NO_FIELDS_PROVIDED",
        "At least one state field must be provided",
      ),
    );
  }

  return ok(payload);
}

// =============================================================================
// System Settings
// =============================================================================

export function buildSystemSettingsPayload(
  update: SystemSettingsUpdate,
): Result<SystemSettingsPayload, EnergyApiError> {
  const payload: SystemSettingsPayload =
    update.cloudEnabled !== undefined
      ? { cloud_enabled: update.cloudEnabled }
      : {};

  if (Object.keys(payload).length === 0) {
    return err(
      invalidArgument(
        "system",
        "NO_FIELDS_PROVIDED",
        "At least one system setting must be provided",
      ),
    );
  }

  return ok(payload);
}

// =============================================================================
// Decryption
// =============================================================================

/**
 * Check one hex value: length first, then content.
 */
function validateHex(
  name: "key" | "aad",
  value: string,
  expectedLength: number,
): Result<void, EnergyApiError> {
  const label = name === "key" ? "Key" : "AAD";

  if (value.length !== expectedLength) {
    const hint =
      name === "aad" && value.length === KEY_LENGTH ? AAD_PREFIX_HINT : undefined;
    return err(
      invalidArgument(
        "decryption",
        "INVALID_LENGTH",
        `${label} must be ${expectedLength} characters, got ${value.length}`,
        hint,
      ),
    );
  }

  if (!HEX.test(value)) {
    return err(
      invalidArgument(
        "decryption",
        "NOT_HEXADECIMAL",
        `${label} must be hexadecimal`,
      ),
    );
  }

  return ok(undefined);
}

export function buildDecryptionKeysPayload(
  keys: DecryptionKeys,
): Result<DecryptionKeysPayload, EnergyApiError> {
  if (keys.key === undefined && keys.aad === undefined) {
    return err(
      invalidArgument(
        "decryption",
        "NO_FIELDS_PROVIDED",
        "Key or AAD must be provided",
      ),
    );
  }

  if (keys.key !== undefined) {
    const key = validateHex("key", keys.key, KEY_LENGTH);
    if (key.isErr()) {
      return err(key.error);
    }
  }

  if (keys.aad !== undefined) {
    const aad = validateHex("aad", keys.aad, AAD_LENGTH);
    if (aad.isErr()) {
      return err(aad.error);
    }
  }

  return ok({
    ...(keys.key !== undefined ? { key: keys.key } : {}),
    ...(keys.aad !== undefined ? { aad: keys.aad } : {}),
  });
}

export function buildDecryptionResetPayload(
  reset: DecryptionReset,
): DecryptionResetPayload {
  return { key: reset.key ?? false, aad: reset.aad ?? false };
}
