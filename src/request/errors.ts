/**
 * Request Module - Error Types
 *
 * Typed error union for every energy meter operation.
 * Errors are values, not exceptions.
 */

/**
 * Why a caller-supplied argument was refused.
 */
export type InvalidArgumentReason =
  | "NO_FIELDS_PROVIDED"
  | "INVALID_LENGTH"
  | "NOT_HEXADECIMAL";

/**
 * All possible errors from talking to an energy meter.
 */
export type EnergyApiError =
  | {
      readonly type: "TIMEOUT";
      readonly message: string;
      readonly timeoutMs: number;
    }
  | {
      readonly type: "TRANSPORT_ERROR";
      readonly message: string;
      readonly cause: Error;
    }
  | {
      readonly type: "API_DISABLED";
      readonly message: string;
    }
  | {
      readonly type: "UNEXPECTED_STATUS";
      readonly message: string;
      readonly status: number;
    }
  | {
      readonly type: "UNSUPPORTED";
      readonly message: string;
      readonly operation: string;
    }
  | {
      readonly type: "UNSUPPORTED_API_VERSION";
      readonly message: string;
      readonly expected: string;
      readonly actual: string | null;
    }
  | {
      readonly type: "INVALID_ARGUMENT";
      readonly message: string;
      readonly field: string;
      readonly reason: InvalidArgumentReason;
      readonly hint?: string;
    };

export type EnergyApiErrorType = EnergyApiError["type"];

// =============================================================================
// Error Factory Functions
// =============================================================================

export function timeout(timeoutMs: number): EnergyApiError {
  return {
    type: "TIMEOUT",
    message: "Timeout occurred while connecting to the energy meter",
    timeoutMs,
  };
}

export function transportError(message: string, cause: Error): EnergyApiError {
  return { type: "TRANSPORT_ERROR", message, cause };
}

export function apiDisabled(): EnergyApiError {
  return {
    type: "API_DISABLED",
    message: "Local API is disabled. Enable it in the energy meter app",
  };
}

export function unexpectedStatus(status: number): EnergyApiError {
  return {
    type: "UNEXPECTED_STATUS",
    message: `API request error (${status})`,
    status,
  };
}

export function unsupported(operation: string): EnergyApiError {
  return {
    type: "UNSUPPORTED",
    message: `${operation} is not supported by this device`,
    operation,
  };
}

export function unsupportedApiVersion(
  expected: string,
  actual: string | null,
): EnergyApiError {
  return {
    type: "UNSUPPORTED_API_VERSION",
    message: `Unsupported API version, expected version '${expected}'`,
    expected,
    actual,
  };
}

export function invalidArgument(
  field: string,
  reason: InvalidArgumentReason,
  message: string,
  hint?: string,
): EnergyApiError {
  return hint !== undefined
    ? { type: "INVALID_ARGUMENT", message, field, reason, hint }
    : { type: "INVALID_ARGUMENT", message, field, reason };
}

// =============================================================================
// Error Utilities
// =============================================================================

/**
 * Format error for logging/display.
 */
export function formatEnergyApiError(error: EnergyApiError): string {
  switch (error.type) {
    case "TIMEOUT":
      return `Timeout after ${error.timeoutMs}ms: ${error.message}`;
    case "TRANSPORT_ERROR":
      return `Transport error: ${error.message} (${error.cause.message})`;
    case "API_DISABLED":
      return `API disabled: ${error.message}`;
    case "UNEXPECTED_STATUS":
      return `Unexpected status ${error.status}: ${error.message}`;
    case "UNSUPPORTED":
      return `Unsupported: ${error.message}`;
    case "UNSUPPORTED_API_VERSION":
      return `${error.message}, got '${error.actual ?? "none"}'`;
    case "INVALID_ARGUMENT":
      return error.hint !== undefined
        ? `Invalid ${error.field}: ${error.message}. ${error.hint}`
        : `Invalid ${error.field}: ${error.message}`;
  }
}

/**
 * Whether repeating the same call unchanged may succeed.
 * Only network-level failures qualify.
 */
export function isRetryable(error: EnergyApiError): boolean {
  return error.type === "TIMEOUT" || error.type === "TRANSPORT_ERROR";
}
