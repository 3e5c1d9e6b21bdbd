/**
 * Models Module - Schemas and Types
 *
 * Wire schemas for every device endpoint and the typed records they decode
 * into. Every recognised key is listed explicitly; unknown keys are stripped.
 * A missing key, a null, or a value of the wrong JSON type becomes `null`
 * instead of failing the whole payload.
 */
import { z } from "zod";

// =============================================================================
// Lenient field helpers
// =============================================================================

/**
 * Wrap a field schema so anything it rejects decodes to null.
 */
const lenient = <T extends z.ZodTypeAny>(schema: T) =>
  schema.nullable().catch(null);

const str = lenient(z.string());
const num = lenient(z.number());
const int = lenient(z.number().int());
const bool = lenient(z.boolean());

/**
 * Compact `yyMMddHHmmss` timestamp. Firmware sends it as a string on some
 * endpoints and as a bare integer on others.
 */
const compactTimestamp = lenient(z.union([z.string(), z.number()]));

// =============================================================================
// Device (GET api)
// =============================================================================

export const DeviceWireSchema = z.object({
  product_name: str,
  product_type: str,
  serial: str,
  api_version: str,
  firmware_version: str,
});

export type DeviceWire = z.infer<typeof DeviceWireSchema>;

/**
 * Identity of the device, as reported by the basic `api` endpoint.
 */
export type Device = Readonly<{
  productName: string | null;
  productType: string | null;
  serial: string | null;
  apiVersion: string | null;
  firmwareVersion: string | null;
}>;

// =============================================================================
// External devices
// =============================================================================

/**
 * Sub-meter kinds relayed through the P1 meter. The code is the OMS device
 * type from OMS Specification Vol. 2, table 2.
 */
export const EXTERNAL_DEVICE_TYPES = {
  gas_meter: 3,
  heat_meter: 4,
  warm_water_meter: 6,
  water_meter: 7,
  inlet_heat_meter: 12,
} as const;

export type KnownExternalDeviceType = keyof typeof EXTERNAL_DEVICE_TYPES;

export type ExternalDeviceType =
  | {
      readonly kind: KnownExternalDeviceType;
      readonly code: (typeof EXTERNAL_DEVICE_TYPES)[KnownExternalDeviceType];
    }
  | { readonly kind: "unknown"; readonly code: -1; readonly raw: string | null };

export const ExternalDeviceWireSchema = z.object({
  unique_id: str,
  type: str,
  value: num,
  unit: str,
  timestamp: compactTimestamp,
});

export type ExternalDeviceWire = z.infer<typeof ExternalDeviceWireSchema>;

export type ExternalDevice = Readonly<{
  uniqueId: string | null;
  meterType: ExternalDeviceType;
  value: number | null;
  unit: string | null;
  timestamp: Date | null;
}>;

// =============================================================================
// Metered data (GET api/v1/data)
// =============================================================================

export const MeteredDataWireSchema = z.object({
  wifi_ssid: str,
  wifi_strength: num,

  smr_version: int,
  meter_model: str,
  unique_id: str,

  active_tariff: int,

  total_power_import_kwh: num,
  total_power_import_t1_kwh: num,
  total_power_import_t2_kwh: num,
  total_power_import_t3_kwh: num,
  total_power_import_t4_kwh: num,
  total_power_export_kwh: num,
  total_power_export_t1_kwh: num,
  total_power_export_t2_kwh: num,
  total_power_export_t3_kwh: num,
  total_power_export_t4_kwh: num,

  active_power_w: num,
  active_power_l1_w: num,
  active_power_l2_w: num,
  active_power_l3_w: num,

  active_voltage_l1_v: num,
  active_voltage_l2_v: num,
  active_voltage_l3_v: num,

  active_current_l1_a: num,
  active_current_l2_a: num,
  active_current_l3_a: num,

  active_frequency_hz: num,

  voltage_sag_l1_count: int,
  voltage_sag_l2_count: int,
  voltage_sag_l3_count: int,

  voltage_swell_l1_count: int,
  voltage_swell_l2_count: int,
  voltage_swell_l3_count: int,

  any_power_fail_count: int,
  long_power_fail_count: int,

  active_power_average_w: num,
  // Firmware spells these without the "h"; the corrected keys are accepted too.
  montly_power_peak_w: num,
  montly_power_peak_timestamp: compactTimestamp,
  monthly_power_peak_w: num,
  monthly_power_peak_timestamp: compactTimestamp,

  total_gas_m3: num,
  gas_timestamp: compactTimestamp,
  gas_unique_id: str,

  active_liter_lpm: num,
  total_liter_m3: num,

  // Entries are decoded one by one so a single bad entry cannot drop the list.
  external: z.array(z.unknown()).catch([]),
});

export type MeteredDataWire = z.infer<typeof MeteredDataWireSchema>;

export type MeteredData = Readonly<{
  wifiSsid: string | null;
  wifiStrength: number | null;

  smrVersion: number | null;
  meterModel: string | null;
  uniqueMeterId: string | null;

  activeTariff: number | null;

  totalPowerImportKwh: number | null;
  totalPowerImportT1Kwh: number | null;
  totalPowerImportT2Kwh: number | null;
  totalPowerImportT3Kwh: number | null;
  totalPowerImportT4Kwh: number | null;
  totalPowerExportKwh: number | null;
  totalPowerExportT1Kwh: number | null;
  totalPowerExportT2Kwh: number | null;
  totalPowerExportT3Kwh: number | null;
  totalPowerExportT4Kwh: number | null;

  activePowerW: number | null;
  activePowerL1W: number | null;
  activePowerL2W: number | null;
  activePowerL3W: number | null;

  activeVoltageL1V: number | null;
  activeVoltageL2V: number | null;
  activeVoltageL3V: number | null;

  activeCurrentL1A: number | null;
  activeCurrentL2A: number | null;
  activeCurrentL3A: number | null;

  activeFrequencyHz: number | null;

  voltageSagL1Count: number | null;
  voltageSagL2Count: number | null;
  voltageSagL3Count: number | null;

  voltageSwellL1Count: number | null;
  voltageSwellL2Count: number | null;
  voltageSwellL3Count: number | null;

  anyPowerFailCount: number | null;
  longPowerFailCount: number | null;

  activePowerAverageW: number | null;
  monthlyPowerPeakW: number | null;
  monthlyPowerPeakTimestamp: Date | null;

  totalGasM3: number | null;
  gasTimestamp: Date | null;
  gasUniqueId: string | null;

  activeLiterLpm: number | null;
  totalLiterM3: number | null;

  externalDevices: ReadonlyArray<ExternalDevice>;
}>;

// =============================================================================
// Switch state (GET/PUT api/v1/state)
// =============================================================================

export const SwitchStateWireSchema = z.object({
  power_on: bool,
  switch_lock: bool,
  brightness: int,
});

export type SwitchStateWire = z.infer<typeof SwitchStateWireSchema>;

export type SwitchState = Readonly<{
  powerOn: boolean | null;
  switchLock: boolean | null;
  brightness: number | null;
}>;

// =============================================================================
// System settings (GET/PUT api/v1/system)
// =============================================================================

export const SystemSettingsWireSchema = z.object({
  cloud_enabled: bool,
});

export type SystemSettingsWire = z.infer<typeof SystemSettingsWireSchema>;

export type SystemSettings = Readonly<{
  cloudEnabled: boolean | null;
}>;

// =============================================================================
// Decryption status (GET api/v1/decryption)
// =============================================================================

export const DecryptionStatusWireSchema = z.object({
  key: bool,
  aad: bool,
});

export type DecryptionStatusWire = z.infer<typeof DecryptionStatusWireSchema>;

export type DecryptionStatus = Readonly<{
  keySet: boolean | null;
  aadSet: boolean | null;
}>;
