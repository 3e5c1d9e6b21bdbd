/**
 * Request Module - Public API
 */

// Types
export type {
  DeviceRequest,
  HttpMethod,
  RawResult,
  Transport,
  TransportRequest,
  TransportResponse,
} from "./schema.js";

// Errors
export type {
  EnergyApiError,
  EnergyApiErrorType,
  InvalidArgumentReason,
} from "./errors.js";
export {
  apiDisabled,
  formatEnergyApiError,
  invalidArgument,
  isRetryable,
  timeout,
  transportError,
  unexpectedStatus,
  unsupported,
  unsupportedApiVersion,
} from "./errors.js";

// Transport
export { FetchTransport, TransportClosedError } from "./transport.js";

// Service functions
export { executeRequest } from "./service.js";
