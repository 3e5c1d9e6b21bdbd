/**
 * Client Module - Service Layer
 *
 * EnergyMeterClient: one instance per device. Every operation returns a
 * Result; nothing is thrown across this boundary.
 */
import { type Result, err, ok } from "neverthrow";

import {
  type Capability,
  type FeatureSet,
  formatFeatureSet,
  resolveFeatures,
} from "../features/index.js";
import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import {
  type DecryptionStatus,
  type Device,
  type MeteredData,
  type SystemSettings,
  parseDecryptionStatus,
  parseDevice,
  parseMeteredData,
  parseSwitchState,
  parseSystemSettings,
} from "../models/index.js";
import {
  type EnergyApiError,
  type HttpMethod,
  type RawResult,
  type Transport,
  FetchTransport,
  executeRequest,
  formatEnergyApiError,
  unsupported,
  unsupportedApiVersion,
} from "../request/index.js";
import { DeviceCache } from "./cache.js";
import type {
  ClientOptions,
  DecryptionKeys,
  DecryptionReset,
  DeviceSnapshot,
  SwitchStateResult,
  SwitchStateUpdate,
  SystemSettingsUpdate,
} from "./schema.js";
import {
  buildDecryptionKeysPayload,
  buildDecryptionResetPayload,
  buildSwitchStatePayload,
  buildSystemSettingsPayload,
} from "./transform.js";

const log = createLogger("client");

export const SUPPORTED_API_VERSION = "v1";
export const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * Anything but a JSON body reads as an empty record.
 */
const payloadOf = (raw: RawResult): unknown =>
  raw.kind === "json" ? raw.value : {};

export class EnergyMeterClient {
  private readonly deviceHost: string;
  private readonly timeoutMs: number;
  private readonly transport: Transport;
  private readonly ownsTransport: boolean;
  private readonly cache = new DeviceCache();

  constructor(options: ClientOptions) {
    this.deviceHost = options.host;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.ownsTransport = options.transport === undefined;
    this.transport = options.transport ?? new FetchTransport();
  }

  get host(): string {
    return this.deviceHost;
  }

  // ===========================================================================
  // Device Identity
  // ===========================================================================

  /**
   * GET api. Refreshes the cached device and feature set when the device
   * speaks a supported API version.
   */
  async fetchDevice(): Promise<Result<Device, EnergyApiError>> {
    const snapshot = await this.loadSnapshot();
    return snapshot.map((s) => s.device);
  }

  /**
   * Re-read the device identity, replacing whatever is cached.
   */
  async refreshDevice(): Promise<Result<Device, EnergyApiError>> {
    return this.fetchDevice();
  }

  /**
   * Capability set of the device, fetching `api` on first use.
   */
  async fetchFeatures(): Promise<Result<FeatureSet, EnergyApiError>> {
    const snapshot = await this.ensureSnapshot();
    return snapshot.map((s) => s.features);
  }

  // ===========================================================================
  // Measurements
  // ===========================================================================

  async fetchMeteredData(): Promise<Result<MeteredData, EnergyApiError>> {
    const result = await this.call("fetchMeteredData", "GET", "api/v1/data");
    return result.map((raw) => parseMeteredData(payloadOf(raw)));
  }

  // ===========================================================================
  // Switch State
  // ===========================================================================

  /**
   * Switch state, or `{ supported: false }` without a request when the
   * device has no switch.
   */
  async fetchSwitchState(): Promise<Result<SwitchStateResult, EnergyApiError>> {
    const snapshot = await this.ensureSnapshot();
    if (snapshot.isErr()) {
      return err(snapshot.error);
    }
    if (!snapshot.value.features.hasState) {
      const unsupportedState: SwitchStateResult = { supported: false };
      return ok(unsupportedState);
    }

    const result = await this.call("fetchSwitchState", "GET", "api/v1/state");
    return result.map(
      (raw): SwitchStateResult => ({
        supported: true,
        state: parseSwitchState(payloadOf(raw)),
      }),
    );
  }

  async setSwitchState(
    update: SwitchStateUpdate,
  ): Promise<Result<true, EnergyApiError>> {
    const allowed = await this.requireCapability("hasState", "setSwitchState");
    if (allowed.isErr()) {
      return err(allowed.error);
    }

    const payload = buildSwitchStatePayload(update);
    if (payload.isErr()) {
      return err(payload.error);
    }

    const result = await this.call(
      "setSwitchState",
      "PUT",
      "api/v1/state",
      payload.value,
    );
    return result.map(() => true as const);
  }

  // ===========================================================================
  // System Settings
  // ===========================================================================

  async fetchSystemSettings(): Promise<Result<SystemSettings, EnergyApiError>> {
    const result = await this.call(
      "fetchSystemSettings",
      "GET",
      "api/v1/system",
    );
    return result.map((raw) => parseSystemSettings(payloadOf(raw)));
  }

  async setSystemSettings(
    update: SystemSettingsUpdate,
  ): Promise<Result<true, EnergyApiError>> {
    const allowed = await this.requireCapability(
      "hasSystem",
      "setSystemSettings",
    );
    if (allowed.isErr()) {
      return err(allowed.error);
    }

    const payload = buildSystemSettingsPayload(update);
    if (payload.isErr()) {
      return err(payload.error);
    }

    const result = await this.call(
      "setSystemSettings",
      "PUT",
      "api/v1/system",
      payload.value,
    );
    return result.map(() => true as const);
  }

  // ===========================================================================
  // Identify
  // ===========================================================================

  /**
   * Blink the device's status light.
   */
  async identify(): Promise<Result<true, EnergyApiError>> {
    const allowed = await this.requireCapability("hasIdentify", "identify");
    if (allowed.isErr()) {
      return err(allowed.error);
    }

    const result = await this.call("identify", "PUT", "api/v1/identify");
    return result.map(() => true as const);
  }

  // ===========================================================================
  // Decryption
  // ===========================================================================

  async fetchDecryptionStatus(): Promise<
    Result<DecryptionStatus, EnergyApiError>
  > {
    const result = await this.call(
      "fetchDecryptionStatus",
      "GET",
      "api/v1/decryption",
    );
    return result.map((raw) => parseDecryptionStatus(payloadOf(raw)));
  }

  async setDecryptionKeys(
    keys: DecryptionKeys,
  ): Promise<Result<true, EnergyApiError>> {
    const allowed = await this.requireCapability(
      "hasDecryption",
      "setDecryptionKeys",
    );
    if (allowed.isErr()) {
      return err(allowed.error);
    }

    const payload = buildDecryptionKeysPayload(keys);
    if (payload.isErr()) {
      return err(payload.error);
    }

    const result = await this.call(
      "setDecryptionKeys",
      "PUT",
      "api/v1/decryption",
      payload.value,
    );
    return result.map(() => true as const);
  }

  async resetDecryptionKeys(
    reset: DecryptionReset = {},
  ): Promise<Result<true, EnergyApiError>> {
    const allowed = await this.requireCapability(
      "hasDecryption",
      "resetDecryptionKeys",
    );
    if (allowed.isErr()) {
      return err(allowed.error);
    }

    const result = await this.call(
      "resetDecryptionKeys",
      "DELETE",
      "api/v1/decryption",
      buildDecryptionResetPayload(reset),
    );
    return result.map(() => true as const);
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Release the transport if this client created it.
   */
  async close(): Promise<void> {
    if (this.ownsTransport && this.transport.close) {
      await this.transport.close();
    }
    log.debug({ host: this.deviceHost }, "Client closed");
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private async call(
    operation: string,
    method: HttpMethod,
    path: string,
    body?: unknown,
  ): Promise<Result<RawResult, EnergyApiError>> {
    const startTime = Date.now();
    logOperationStart(log, operation, { host: this.deviceHost });

    const result = await executeRequest(this.transport, {
      host: this.deviceHost,
      path,
      method,
      timeoutMs: this.timeoutMs,
      ...(body !== undefined ? { body } : {}),
    });

    if (result.isOk()) {
      logOperationComplete(log, operation, startTime, { host: this.deviceHost });
    } else {
      logOperationFailed(log, operation, formatEnergyApiError(result.error), {
        host: this.deviceHost,
      });
    }

    return result;
  }

  private async loadSnapshot(): Promise<
    Result<DeviceSnapshot, EnergyApiError>
  > {
    const result = await this.call("fetchDevice", "GET", "api");
    if (result.isErr()) {
      return err(result.error);
    }

    const device = parseDevice(payloadOf(result.value));
    if (device.apiVersion !== SUPPORTED_API_VERSION) {
      // Capabilities of the previous device no longer apply
      this.cache.invalidate();
      log.warn(
        {
          host: this.deviceHost,
          expected: SUPPORTED_API_VERSION,
          actual: device.apiVersion,
        },
        "Device reports an unsupported API version",
      );
      return err(unsupportedApiVersion(SUPPORTED_API_VERSION, device.apiVersion));
    }

    const features = resolveFeatures(device.productType, device.firmwareVersion);
    const snapshot: DeviceSnapshot = { device, features };
    this.cache.set(snapshot);

    log.info(
      {
        host: this.deviceHost,
        productType: device.productType,
        firmwareVersion: device.firmwareVersion,
        features: formatFeatureSet(features),
      },
      "Device identified",
    );

    return ok(snapshot);
  }

  private ensureSnapshot(): Promise<Result<DeviceSnapshot, EnergyApiError>> {
    return this.cache.getOrLoad(() => this.loadSnapshot());
  }

  private async requireCapability(
    capability: Capability,
    operation: string,
  ): Promise<Result<void, EnergyApiError>> {
    const snapshot = await this.ensureSnapshot();
    if (snapshot.isErr()) {
      return err(snapshot.error);
    }

    if (!snapshot.value.features[capability]) {
      log.debug({ host: this.deviceHost, operation }, "Operation not supported");
      return err(unsupported(operation));
    }

    return ok(undefined);
  }
}
