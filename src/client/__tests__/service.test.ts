/**
 * Energy Meter Client Tests
 *
 * Exercises every operation against in-process transport stubs.
 */
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

// Mock logger to reduce noise in tests
vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
  logOperationStart: vi.fn(),
  logOperationComplete: vi.fn(),
  logOperationFailed: vi.fn(),
}));

// Import after mocks
import {
  DEVICE_PAYLOADS,
  createHangingTransport,
  createStubTransport,
  jsonResponse,
  textResponse,
} from "../../test/transport.js";
import { EnergyMeterClient } from "../service.js";

const HOST = "192.168.1.60";
const AAD = "30" + "00112233445566778899aabbccddeeff";

describe("EnergyMeterClient", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.unstubAllGlobals();
  });

  // ===========================================================================
  // Device Identity
  // ===========================================================================

  describe("fetchDevice", () => {
    test("decodes the device from GET api", async () => {
      // Arrange
      const transport = createStubTransport(jsonResponse(DEVICE_PAYLOADS.p1));
      const client = new EnergyMeterClient({ host: HOST, transport });

      // Act
      const result = await client.fetchDevice();

      // Assert
      expect(result._unsafeUnwrap()).toEqual({
        productName: "P1 meter",
        productType: "HWE-P1",
        serial: "3c39e7aabbcc",
        apiVersion: "v1",
        firmwareVersion: "4.19",
      });
      const sent = transport.request.mock.calls[0]?.[0];
      expect(sent?.method).toBe("GET");
      expect(sent?.url).toBe("http://192.168.1.60/api");
    });

    test("caches features so later lookups make no request", async () => {
      // Arrange
      const transport = createStubTransport(jsonResponse(DEVICE_PAYLOADS.p1));
      const client = new EnergyMeterClient({ host: HOST, transport });
      await client.fetchDevice();

      // Act
      const features = await client.fetchFeatures();

      // Assert
      expect(features._unsafeUnwrap()).toEqual({
        hasState: false,
        hasSystem: true,
        hasIdentify: true,
        hasDecryption: true,
      });
      expect(transport.request).toHaveBeenCalledTimes(1);
    });

    test("returns UNSUPPORTED_API_VERSION for a v2 device", async () => {
      // Arrange
      const transport = createStubTransport(
        jsonResponse({ ...DEVICE_PAYLOADS.socket, api_version: "v2" }),
      );
      const client = new EnergyMeterClient({ host: HOST, transport });

      // Act
      const result = await client.fetchDevice();

      // Assert
      expect(result._unsafeUnwrapErr()).toEqual({
        type: "UNSUPPORTED_API_VERSION",
        message: "Unsupported API version, expected version 'v1'",
        expected: "v1",
        actual: "v2",
      });
    });

    test("does not cache an incompatible device", async () => {
      // Arrange
      const v2 = jsonResponse({ ...DEVICE_PAYLOADS.socket, api_version: "v2" });
      const transport = createStubTransport(v2, v2);
      const client = new EnergyMeterClient({ host: HOST, transport });
      await client.fetchDevice();

      // Act
      const result = await client.setSwitchState({ powerOn: true });

      // Assert
      expect(result._unsafeUnwrapErr().type).toBe("UNSUPPORTED_API_VERSION");
      expect(transport.request).toHaveBeenCalledTimes(2);
      expect(transport.request.mock.calls[1]?.[0].url).toBe(
        "http://192.168.1.60/api",
      );
    });

    test("drops cached capabilities when a re-read reports another API version", async () => {
      // Arrange
      const transport = createStubTransport(
        jsonResponse(DEVICE_PAYLOADS.socket),
        jsonResponse({ ...DEVICE_PAYLOADS.socket, api_version: "v2" }),
        jsonResponse({ ...DEVICE_PAYLOADS.socket, api_version: "v2" }),
      );
      const client = new EnergyMeterClient({ host: HOST, transport });
      await client.fetchDevice();
      const refetch = await client.refreshDevice();

      // Act
      const result = await client.setSwitchState({ powerOn: true });

      // Assert
      expect(refetch._unsafeUnwrapErr().type).toBe("UNSUPPORTED_API_VERSION");
      expect(result._unsafeUnwrapErr()).toEqual({
        type: "UNSUPPORTED_API_VERSION",
        message: "Unsupported API version, expected version 'v1'",
        expected: "v1",
        actual: "v2",
      });
      expect(transport.request).toHaveBeenCalledTimes(3);
      const methods = transport.request.mock.calls.map(([req]) => req.method);
      expect(methods).toEqual(["GET", "GET", "GET"]);
    });

    test("treats a text body as a device with no fields", async () => {
      // Arrange
      const transport = createStubTransport(textResponse("hello"));
      const client = new EnergyMeterClient({ host: HOST, transport });

      // Act
      const result = await client.fetchDevice();

      // Assert
      expect(result._unsafeUnwrapErr()).toEqual({
        type: "UNSUPPORTED_API_VERSION",
        message: "Unsupported API version, expected version 'v1'",
        expected: "v1",
        actual: null,
      });
    });

    test("refreshDevice re-reads the device", async () => {
      // Arrange
      const transport = createStubTransport(
        jsonResponse(DEVICE_PAYLOADS.oldSocket),
        jsonResponse(DEVICE_PAYLOADS.socket),
      );
      const client = new EnergyMeterClient({ host: HOST, transport });
      await client.fetchDevice();

      // Act
      const device = await client.refreshDevice();
      const features = await client.fetchFeatures();

      // Assert
      expect(device._unsafeUnwrap().firmwareVersion).toBe("3.03");
      expect(features._unsafeUnwrap().hasIdentify).toBe(true);
      expect(transport.request).toHaveBeenCalledTimes(2);
    });

    test("concurrent first lookups share one device request", async () => {
      // Arrange
      const transport = createStubTransport(
        jsonResponse(DEVICE_PAYLOADS.socket),
      );
      const client = new EnergyMeterClient({ host: HOST, transport });

      // Act
      const [a, b, c] = await Promise.all([
        client.fetchFeatures(),
        client.fetchFeatures(),
        client.fetchFeatures(),
      ]);

      // Assert
      expect(transport.request).toHaveBeenCalledTimes(1);
      expect(a._unsafeUnwrap()).toEqual(b._unsafeUnwrap());
      expect(c._unsafeUnwrap().hasState).toBe(true);
    });

    test("an unknown product gets no features", async () => {
      // Arrange
      const transport = createStubTransport(
        jsonResponse(DEVICE_PAYLOADS.unknown),
      );
      const client = new EnergyMeterClient({ host: HOST, transport });

      // Act
      const features = await client.fetchFeatures();

      // Assert
      expect(features._unsafeUnwrap()).toEqual({
        hasState: false,
        hasSystem: false,
        hasIdentify: false,
        hasDecryption: false,
      });
    });
  });

  // ===========================================================================
  // Measurements
  // ===========================================================================

  describe("fetchMeteredData", () => {
    test("decodes readings and defaults external devices to empty", async () => {
      // Arrange
      const transport = createStubTransport(
        jsonResponse({ wifi_ssid: "home", active_power_w: -123.5 }),
      );
      const client = new EnergyMeterClient({ host: HOST, transport });

      // Act
      const result = await client.fetchMeteredData();

      // Assert
      const data = result._unsafeUnwrap();
      expect(data.wifiSsid).toBe("home");
      expect(data.activePowerW).toBe(-123.5);
      expect(data.externalDevices).toEqual([]);
      expect(transport.request.mock.calls[0]?.[0].url).toBe(
        "http://192.168.1.60/api/v1/data",
      );
    });

    test("needs no device lookup", async () => {
      // Arrange
      const transport = createStubTransport(jsonResponse({}));
      const client = new EnergyMeterClient({ host: HOST, transport });

      // Act
      await client.fetchMeteredData();

      // Assert
      expect(transport.request).toHaveBeenCalledTimes(1);
    });

    test("returns API_DISABLED on 403", async () => {
      // Arrange
      const transport = createStubTransport(textResponse("", 403));
      const client = new EnergyMeterClient({ host: HOST, transport });

      // Act
      const result = await client.fetchMeteredData();

      // Assert
      expect(result._unsafeUnwrapErr().type).toBe("API_DISABLED");
    });

    test("applies the configured timeout", async () => {
      // Arrange
      vi.useFakeTimers();
      const transport = createHangingTransport();
      const client = new EnergyMeterClient({
        host: HOST,
        timeoutMs: 50,
        transport,
      });

      // Act
      const pending = client.fetchMeteredData();
      await vi.advanceTimersByTimeAsync(50);
      const result = await pending;

      // Assert
      expect(result._unsafeUnwrapErr()).toEqual({
        type: "TIMEOUT",
        message: "Timeout occurred while connecting to the energy meter",
        timeoutMs: 50,
      });
    });
  });

  // ===========================================================================
  // Switch State
  // ===========================================================================

  describe("switch state", () => {
    test("fetchSwitchState decodes the state of a socket", async () => {
      // Arrange
      const transport = createStubTransport(
        jsonResponse(DEVICE_PAYLOADS.socket),
        jsonResponse({ power_on: true, switch_lock: false, brightness: 255 }),
      );
      const client = new EnergyMeterClient({ host: HOST, transport });

      // Act
      const result = await client.fetchSwitchState();

      // Assert
      expect(result._unsafeUnwrap()).toEqual({
        supported: true,
        state: { powerOn: true, switchLock: false, brightness: 255 },
      });
      expect(transport.request.mock.calls[1]?.[0].url).toBe(
        "http://192.168.1.60/api/v1/state",
      );
    });

    test("fetchSwitchState reports unsupported without a state request", async () => {
      // Arrange
      const transport = createStubTransport(jsonResponse(DEVICE_PAYLOADS.p1));
      const client = new EnergyMeterClient({ host: HOST, transport });

      // Act
      const result = await client.fetchSwitchState();

      // Assert
      expect(result._unsafeUnwrap()).toEqual({ supported: false });
      expect(transport.request).toHaveBeenCalledTimes(1);
    });

    test("setSwitchState sends a partial PUT and returns true", async () => {
      // Arrange
      const transport = createStubTransport(
        jsonResponse(DEVICE_PAYLOADS.socket),
        jsonResponse({ power_on: true }),
      );
      const client = new EnergyMeterClient({ host: HOST, transport });

      // Act
      const result = await client.setSwitchState({ powerOn: true });

      // Assert
      expect(result._unsafeUnwrap()).toBe(true);
      const sent = transport.request.mock.calls[1]?.[0];
      expect(sent?.method).toBe("PUT");
      expect(sent?.url).toBe("http://192.168.1.60/api/v1/state");
      expect(sent?.body).toBe('{"power_on":true}');
    });

    test("setSwitchState accepts an empty JSON reply", async () => {
      // Arrange
      const transport = createStubTransport(
        jsonResponse(DEVICE_PAYLOADS.socket),
        {
          status: 200,
          headers: { "content-type": "application/json" },
          body: "",
        },
      );
      const client = new EnergyMeterClient({ host: HOST, transport });

      // Act
      const result = await client.setSwitchState({ powerOn: false });

      // Assert
      expect(result._unsafeUnwrap()).toBe(true);
      expect(transport.request).toHaveBeenCalledTimes(2);
    });

    test("setSwitchState({}) fails without a network call", async () => {
      // Arrange
      const transport = createStubTransport(
        jsonResponse(DEVICE_PAYLOADS.socket),
      );
      const client = new EnergyMeterClient({ host: HOST, transport });
      await client.fetchDevice();
      transport.request.mockClear();

      // Act
      const result = await client.setSwitchState({});

      // Assert
      expect(result._unsafeUnwrapErr()).toEqual({
        type: "INVALID_ARGUMENT",
        message: "At least one state field must be provided",
        field: "state",
        reason: "NO_FIELDS_PROVIDED",
      });
      expect(transport.request).not.toHaveBeenCalled();
    });

    test("setSwitchState is UNSUPPORTED on a device without a switch", async () => {
      // Arrange
      const transport = createStubTransport(jsonResponse(DEVICE_PAYLOADS.p1));
      const client = new EnergyMeterClient({ host: HOST, transport });
      await client.fetchDevice();
      transport.request.mockClear();

      // Act
      const result = await client.setSwitchState({ powerOn: true });

      // Assert
      expect(result._unsafeUnwrapErr()).toEqual({
        type: "UNSUPPORTED",
        message: "setSwitchState is not supported by this device",
        operation: "setSwitchState",
      });
      expect(transport.request).not.toHaveBeenCalled();
    });

    test("capability is checked before arguments", async () => {
      // Arrange
      const transport = createStubTransport(jsonResponse(DEVICE_PAYLOADS.p1));
      const client = new EnergyMeterClient({ host: HOST, transport });

      // Act
      const result = await client.setSwitchState({});

      // Assert
      expect(result._unsafeUnwrapErr().type).toBe("UNSUPPORTED");
    });
  });

  // ===========================================================================
  // System Settings
  // ===========================================================================

  describe("system settings", () => {
    test("fetchSystemSettings decodes cloud_enabled", async () => {
      // Arrange
      const transport = createStubTransport(
        jsonResponse({ cloud_enabled: false }),
      );
      const client = new EnergyMeterClient({ host: HOST, transport });

      // Act
      const result = await client.fetchSystemSettings();

      // Assert
      expect(result._unsafeUnwrap()).toEqual({ cloudEnabled: false });
    });

    test("setSystemSettings sends cloud_enabled", async () => {
      // Arrange
      const transport = createStubTransport(
        jsonResponse(DEVICE_PAYLOADS.waterMeter),
        jsonResponse({ cloud_enabled: true }),
      );
      const client = new EnergyMeterClient({ host: HOST, transport });

      // Act
      const result = await client.setSystemSettings({ cloudEnabled: true });

      // Assert
      expect(result._unsafeUnwrap()).toBe(true);
      expect(transport.request.mock.calls[1]?.[0].body).toBe(
        '{"cloud_enabled":true}',
      );
    });

    test("setSystemSettings is UNSUPPORTED on old firmware", async () => {
      // Arrange
      const transport = createStubTransport(
        jsonResponse(DEVICE_PAYLOADS.oldSocket),
      );
      const client = new EnergyMeterClient({ host: HOST, transport });

      // Act
      const result = await client.setSystemSettings({ cloudEnabled: true });

      // Assert
      expect(result._unsafeUnwrapErr().type).toBe("UNSUPPORTED");
      expect(transport.request).toHaveBeenCalledTimes(1);
    });
  });

  // ===========================================================================
  // Identify
  // ===========================================================================

  describe("identify", () => {
    test("sends PUT api/v1/identify", async () => {
      // Arrange
      const transport = createStubTransport(
        jsonResponse(DEVICE_PAYLOADS.socket),
        jsonResponse({ identify: "ok" }),
      );
      const client = new EnergyMeterClient({ host: HOST, transport });

      // Act
      const result = await client.identify();

      // Assert
      expect(result._unsafeUnwrap()).toBe(true);
      const sent = transport.request.mock.calls[1]?.[0];
      expect(sent?.method).toBe("PUT");
      expect(sent?.url).toBe("http://192.168.1.60/api/v1/identify");
      expect(sent?.body).toBeUndefined();
    });

    test("is UNSUPPORTED on a water meter", async () => {
      // Arrange
      const transport = createStubTransport(
        jsonResponse(DEVICE_PAYLOADS.waterMeter),
      );
      const client = new EnergyMeterClient({ host: HOST, transport });

      // Act
      const result = await client.identify();

      // Assert
      expect(result._unsafeUnwrapErr()).toEqual({
        type: "UNSUPPORTED",
        message: "identify is not supported by this device",
        operation: "identify",
      });
    });
  });

  // ===========================================================================
  // Decryption
  // ===========================================================================

  describe("decryption", () => {
    test("fetchDecryptionStatus decodes key and aad flags", async () => {
      // Arrange
      const transport = createStubTransport(
        jsonResponse({ key: true, aad: false }),
      );
      const client = new EnergyMeterClient({ host: HOST, transport });

      // Act
      const result = await client.fetchDecryptionStatus();

      // Assert
      expect(result._unsafeUnwrap()).toEqual({ keySet: true, aadSet: false });
    });

    test("setDecryptionKeys forwards a prefixed AAD verbatim", async () => {
      // Arrange
      const transport = createStubTransport(
        jsonResponse(DEVICE_PAYLOADS.p1),
        jsonResponse({}),
      );
      const client = new EnergyMeterClient({ host: HOST, transport });

      // Act
      const result = await client.setDecryptionKeys({ aad: AAD });

      // Assert
      expect(result._unsafeUnwrap()).toBe(true);
      const sent = transport.request.mock.calls[1]?.[0];
      expect(sent?.method).toBe("PUT");
      expect(sent?.url).toBe("http://192.168.1.60/api/v1/decryption");
      expect(sent?.body).toBe(`{"aad":"${AAD}"}`);
    });

    test("setDecryptionKeys rejects a 32-character AAD with a hint", async () => {
      // Arrange
      const transport = createStubTransport(jsonResponse(DEVICE_PAYLOADS.p1));
      const client = new EnergyMeterClient({ host: HOST, transport });

      // Act
      const result = await client.setDecryptionKeys({
        aad: "00112233445566778899aabbccddeeff",
      });

      // Assert
      const error = result._unsafeUnwrapErr();
      expect(error.type === "INVALID_ARGUMENT" && error.hint).toBe(
        "Try prefixing AAD with '30', e.g. '30<AAD>'",
      );
      expect(transport.request).toHaveBeenCalledTimes(1);
    });

    test("resetDecryptionKeys sends DELETE with both flags", async () => {
      // Arrange
      const transport = createStubTransport(
        jsonResponse(DEVICE_PAYLOADS.p1),
        jsonResponse({}),
      );
      const client = new EnergyMeterClient({ host: HOST, transport });

      // Act
      const result = await client.resetDecryptionKeys({ key: true });

      // Assert
      expect(result._unsafeUnwrap()).toBe(true);
      const sent = transport.request.mock.calls[1]?.[0];
      expect(sent?.method).toBe("DELETE");
      expect(sent?.body).toBe('{"key":true,"aad":false}');
    });

    test("decryption writes are UNSUPPORTED before P1 firmware 4.19", async () => {
      // Arrange
      const transport = createStubTransport(
        jsonResponse({ ...DEVICE_PAYLOADS.p1, firmware_version: "4.18" }),
      );
      const client = new EnergyMeterClient({ host: HOST, transport });

      // Act
      const result = await client.resetDecryptionKeys();

      // Assert
      expect(result._unsafeUnwrapErr().type).toBe("UNSUPPORTED");
    });
  });

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  describe("close", () => {
    test("exposes the host", () => {
      const client = new EnergyMeterClient({
        host: HOST,
        transport: createStubTransport(),
      });

      expect(client.host).toBe(HOST);
    });

    test("never closes a supplied transport", async () => {
      // Arrange
      const transport = createStubTransport();
      const client = new EnergyMeterClient({ host: HOST, transport });

      // Act
      await client.close();

      // Assert
      expect(transport.close).not.toHaveBeenCalled();
    });

    test("closes its own transport so later calls fail without fetching", async () => {
      // Arrange
      const fetchMock = vi.fn(async () => new Response("{}", { status: 200 }));
      vi.stubGlobal("fetch", fetchMock);
      const client = new EnergyMeterClient({ host: HOST });

      // Act
      await client.close();
      const result = await client.fetchMeteredData();

      // Assert
      const error = result._unsafeUnwrapErr();
      expect(error.type).toBe("TRANSPORT_ERROR");
      expect(error.type === "TRANSPORT_ERROR" && error.cause.message).toBe(
        "Transport is closed",
      );
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });
});
