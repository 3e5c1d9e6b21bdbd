/**
 * Features Module - Schemas and Types
 *
 * Capability flags per device model and the static table they come from.
 */

/**
 * Which optional API operations a device exposes.
 */
export type FeatureSet = Readonly<{
  /** GET/PUT api/v1/state (switch, lock, brightness) */
  hasState: boolean;
  /** PUT api/v1/system */
  hasSystem: boolean;
  /** PUT api/v1/identify */
  hasIdentify: boolean;
  /** PUT/DELETE api/v1/decryption */
  hasDecryption: boolean;
}>;

export type Capability = keyof FeatureSet;

/**
 * Feature set for hardware we know nothing about: reads only.
 */
export const NO_FEATURES: FeatureSet = {
  hasState: false,
  hasSystem: false,
  hasIdentify: false,
  hasDecryption: false,
};

/**
 * How a product gets a capability: unconditionally, or from a minimum
 * firmware version onward.
 */
export type CapabilityRule =
  | { readonly since: "always" }
  | { readonly since: "firmware"; readonly minFirmware: string };

export type ProductDefinition = Readonly<{
  name: string;
  capabilities: Readonly<Partial<Record<Capability, CapabilityRule>>>;
}>;

const firmware = (minFirmware: string): CapabilityRule => ({
  since: "firmware",
  minFirmware,
});

const KWH_METER: ProductDefinition["capabilities"] = {
  hasSystem: firmware("3.0"),
};

/**
 * Known product types. Capabilities not listed are absent.
 */
export const PRODUCTS: Readonly<Record<string, ProductDefinition>> = {
  "HWE-P1": {
    name: "Wi-Fi P1 Meter",
    capabilities: {
      hasSystem: firmware("3.0"),
      hasIdentify: firmware("3.0"),
      hasDecryption: firmware("4.19"),
    },
  },
  "HWE-SKT": {
    name: "Wi-Fi Energy Socket",
    capabilities: {
      hasState: { since: "always" },
      hasSystem: firmware("3.0"),
      hasIdentify: firmware("3.0"),
    },
  },
  "HWE-WTR": {
    name: "Wi-Fi Watermeter",
    capabilities: {
      hasSystem: firmware("2.0"),
    },
  },
  "HWE-KWH1": { name: "Wi-Fi kWh Meter 1-phase", capabilities: KWH_METER },
  "HWE-KWH3": { name: "Wi-Fi kWh Meter 3-phase", capabilities: KWH_METER },
  "SDM230-wifi": { name: "Wi-Fi kWh Meter 1-phase", capabilities: KWH_METER },
  "SDM630-wifi": { name: "Wi-Fi kWh Meter 3-phase", capabilities: KWH_METER },
};
