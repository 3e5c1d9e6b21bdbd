/**
 * Models Module - Pure Transformations
 *
 * Decoders from loosely-typed endpoint payloads into typed records.
 * No side effects, no I/O - just data in, data out. None of these fail:
 * whatever the device omits or garbles comes back as null.
 */
import type { z } from "zod";

import {
  type DecryptionStatus,
  DecryptionStatusWireSchema,
  type Device,
  DeviceWireSchema,
  EXTERNAL_DEVICE_TYPES,
  type ExternalDevice,
  type ExternalDeviceType,
  ExternalDeviceWireSchema,
  type KnownExternalDeviceType,
  type MeteredData,
  MeteredDataWireSchema,
  type SwitchState,
  SwitchStateWireSchema,
  type SystemSettings,
  SystemSettingsWireSchema,
} from "./schema.js";

// =============================================================================
// Payload parsing
// =============================================================================

/**
 * Parse a payload against a wire schema, treating anything that is not an
 * object (array, string, null) as an empty object.
 */
function parseWire<T extends z.ZodTypeAny>(
  schema: T,
  payload: unknown,
): z.infer<T> {
  const parsed = schema.safeParse(payload);
  if (parsed.success) {
    return parsed.data;
  }
  return schema.parse({});
}

// =============================================================================
// Compact timestamps (yyMMddHHmmss)
// =============================================================================

const COMPACT_TIMESTAMP_PATTERN = /^\d{12}$/;

/**
 * Two-digit years below this pivot belong to the 2000s, the rest to the 1900s.
 */
const CENTURY_PIVOT = 69;

/**
 * Decode a compact `yyMMddHHmmss` timestamp.
 *
 * The digits are the meter's wall-clock time without a zone; they are carried
 * in the UTC fields of the returned Date. Integers are left-padded to twelve
 * digits, since the device drops the leading zero of years 2000-2009.
 *
 * @example
 * parseCompactTimestamp("230125140000"); // 2023-01-25T14:00:00.000Z
 * parseCompactTimestamp("231301000000"); // null (month 13)
 */
export function parseCompactTimestamp(
  value: string | number | null | undefined,
): Date | null {
  if (value === null || value === undefined) {
    return null;
  }

  let digits: string;
  if (typeof value === "number") {
    if (!Number.isSafeInteger(value) || value < 0) {
      return null;
    }
    digits = String(value).padStart(12, "0");
  } else {
    digits = value;
  }

  if (!COMPACT_TIMESTAMP_PATTERN.test(digits)) {
    return null;
  }

  const part = (index: number): number =>
    Number(digits.slice(index * 2, index * 2 + 2));
  const yy = part(0);
  const month = part(1);
  const day = part(2);
  const hour = part(3);
  const minute = part(4);
  const second = part(5);

  const year = yy < CENTURY_PIVOT ? 2000 + yy : 1900 + yy;
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));

  // Date.UTC rolls over out-of-range parts (Feb 30 -> Mar 2); reject those.
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    return null;
  }

  return date;
}

const pad2 = (value: number): string => String(value).padStart(2, "0");

/**
 * Format a Date back into the compact `yyMMddHHmmss` form, reading the UTC
 * fields. Inverse of parseCompactTimestamp.
 */
export function formatCompactTimestamp(date: Date): string {
  return [
    date.getUTCFullYear() % 100,
    date.getUTCMonth() + 1,
    date.getUTCDate(),
    date.getUTCHours(),
    date.getUTCMinutes(),
    date.getUTCSeconds(),
  ]
    .map(pad2)
    .join("");
}

// =============================================================================
// External devices
// =============================================================================

const isKnownExternalDeviceType = (
  value: string,
): value is KnownExternalDeviceType =>
  Object.prototype.hasOwnProperty.call(EXTERNAL_DEVICE_TYPES, value);

/**
 * Map the wire `type` string onto the closed set of sub-meter kinds.
 * Total: anything unrecognised is the `unknown` variant, keeping the raw value.
 */
export function toExternalDeviceType(
  value: string | null,
): ExternalDeviceType {
  if (value !== null && isKnownExternalDeviceType(value)) {
    return { kind: value, code: EXTERNAL_DEVICE_TYPES[value] };
  }
  return { kind: "unknown", code: -1, raw: value };
}

export function parseExternalDevice(payload: unknown): ExternalDevice {
  const wire = parseWire(ExternalDeviceWireSchema, payload);
  return {
    uniqueId: wire.unique_id,
    meterType: toExternalDeviceType(wire.type),
    value: wire.value,
    unit: wire.unit,
    timestamp: parseCompactTimestamp(wire.timestamp),
  };
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Decode the `external` list, keeping device order. Entries that are not
 * objects carry nothing to decode and are skipped.
 */
export function parseExternalDevices(
  entries: ReadonlyArray<unknown>,
): ReadonlyArray<ExternalDevice> {
  return entries.filter(isRecord).map(parseExternalDevice);
}

// =============================================================================
// Endpoint decoders
// =============================================================================

export function parseDevice(payload: unknown): Device {
  const wire = parseWire(DeviceWireSchema, payload);
  return {
    productName: wire.product_name,
    productType: wire.product_type,
    serial: wire.serial,
    apiVersion: wire.api_version,
    firmwareVersion: wire.firmware_version,
  };
}

export function parseMeteredData(payload: unknown): MeteredData {
  const wire = parseWire(MeteredDataWireSchema, payload);
  return {
    wifiSsid: wire.wifi_ssid,
    wifiStrength: wire.wifi_strength,

    smrVersion: wire.smr_version,
    meterModel: wire.meter_model,
    uniqueMeterId: wire.unique_id,

    activeTariff: wire.active_tariff,

    totalPowerImportKwh: wire.total_power_import_kwh,
    totalPowerImportT1Kwh: wire.total_power_import_t1_kwh,
    totalPowerImportT2Kwh: wire.total_power_import_t2_kwh,
    totalPowerImportT3Kwh: wire.total_power_import_t3_kwh,
    totalPowerImportT4Kwh: wire.total_power_import_t4_kwh,
    totalPowerExportKwh: wire.total_power_export_kwh,
    totalPowerExportT1Kwh: wire.total_power_export_t1_kwh,
    totalPowerExportT2Kwh: wire.total_power_export_t2_kwh,
    totalPowerExportT3Kwh: wire.total_power_export_t3_kwh,
    totalPowerExportT4Kwh: wire.total_power_export_t4_kwh,

    activePowerW: wire.active_power_w,
    activePowerL1W: wire.active_power_l1_w,
    activePowerL2W: wire.active_power_l2_w,
    activePowerL3W: wire.active_power_l3_w,

    activeVoltageL1V: wire.active_voltage_l1_v,
    activeVoltageL2V: wire.active_voltage_l2_v,
    activeVoltageL3V: wire.active_voltage_l3_v,

    activeCurrentL1A: wire.active_current_l1_a,
    activeCurrentL2A: wire.active_current_l2_a,
    activeCurrentL3A: wire.active_current_l3_a,

    activeFrequencyHz: wire.active_frequency_hz,

    voltageSagL1Count: wire.voltage_sag_l1_count,
    voltageSagL2Count: wire.voltage_sag_l2_count,
    voltageSagL3Count: wire.voltage_sag_l3_count,

    voltageSwellL1Count: wire.voltage_swell_l1_count,
    voltageSwellL2Count: wire.voltage_swell_l2_count,
    voltageSwellL3Count: wire.voltage_swell_l3_count,

    anyPowerFailCount: wire.any_power_fail_count,
    longPowerFailCount: wire.long_power_fail_count,

    activePowerAverageW: wire.active_power_average_w,
    monthlyPowerPeakW: wire.monthly_power_peak_w ?? wire.montly_power_peak_w,
    monthlyPowerPeakTimestamp: parseCompactTimestamp(
      wire.monthly_power_peak_timestamp ?? wire.montly_power_peak_timestamp,
    ),

    totalGasM3: wire.total_gas_m3,
    gasTimestamp: parseCompactTimestamp(wire.gas_timestamp),
    gasUniqueId: wire.gas_unique_id,

    activeLiterLpm: wire.active_liter_lpm,
    totalLiterM3: wire.total_liter_m3,

    externalDevices: parseExternalDevices(wire.external),
  };
}

export function parseSwitchState(payload: unknown): SwitchState {
  const wire = parseWire(SwitchStateWireSchema, payload);
  return {
    powerOn: wire.power_on,
    switchLock: wire.switch_lock,
    brightness: wire.brightness,
  };
}

export function parseSystemSettings(payload: unknown): SystemSettings {
  const wire = parseWire(SystemSettingsWireSchema, payload);
  return {
    cloudEnabled: wire.cloud_enabled,
  };
}

export function parseDecryptionStatus(payload: unknown): DecryptionStatus {
  const wire = parseWire(DecryptionStatusWireSchema, payload);
  return {
    keySet: wire.key,
    aadSet: wire.aad,
  };
}
