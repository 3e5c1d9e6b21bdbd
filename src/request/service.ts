/**
 * Request Module - Service Layer
 *
 * Side effects happen here: one HTTP call to the device per request, bounded
 * by a deadline, with every failure classified into an EnergyApiError.
 * No retries.
 */
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import {
  type EnergyApiError,
  apiDisabled,
  timeout,
  transportError,
  unexpectedStatus,
} from "./errors.js";
import type {
  DeviceRequest,
  RawResult,
  Transport,
  TransportResponse,
} from "./schema.js";

const log = createLogger("request");

// =============================================================================
// Deadline
// =============================================================================

class DeadlineExceededError extends Error {
  constructor(timeoutMs: number) {
    super(`Deadline of ${timeoutMs}ms exceeded`);
    this.name = "TimeoutError";
  }
}

/**
 * Run `start` under a hard deadline. On expiry the signal handed to `start`
 * aborts and the returned promise rejects at once, whether or not the
 * underlying call ever settles.
 */
function withDeadline<T>(
  start: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const controller = new AbortController();
    const timer = setTimeout(() => {
      const error = new DeadlineExceededError(timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);

    let pending: Promise<T>;
    try {
      pending = start(controller.signal);
    } catch (error) {
      clearTimeout(timer);
      reject(error);
      return;
    }

    pending.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}

// =============================================================================
// Response Handling
// =============================================================================

const isJsonContentType = (headers: TransportResponse["headers"]): boolean =>
  (headers["content-type"] ?? "").includes("application/json");

function decodeBody(
  response: TransportResponse,
): Result<RawResult, EnergyApiError> {
  if (!isJsonContentType(response.headers)) {
    return ok({ kind: "text", value: response.body });
  }

  // Writes may answer 200 with a JSON content type and nothing in the body
  if (response.body.trim() === "") {
    return ok({ kind: "json", value: null });
  }

  try {
    const value: unknown = JSON.parse(response.body);
    return ok({ kind: "json", value });
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    return err(transportError("Malformed JSON response from the energy meter", cause));
  }
}

// =============================================================================
// Request Execution
// =============================================================================

/**
 * Execute one request against the device.
 *
 * @returns Result with the decoded body (JSON or text) or a classified error
 */
export async function executeRequest(
  transport: Transport,
  request: DeviceRequest,
): Promise<Result<RawResult, EnergyApiError>> {
  const url = `http://${request.host}/${request.path}`;
  const headers: Record<string, string> = {};
  let body: string | undefined;
  if (request.body !== undefined) {
    headers["Content-Type"] = "application/json";
    body = JSON.stringify(request.body);
  }

  log.debug({ method: request.method, url, body: request.body }, "→ Request");

  let response: TransportResponse;
  try {
    response = await withDeadline(
      (signal) =>
        transport.request({
          method: request.method,
          url,
          headers,
          signal,
          ...(body !== undefined ? { body } : {}),
        }),
      request.timeoutMs,
    );
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));

    // Handle timeout specifically
    if (cause.name === "TimeoutError") {
      log.warn(
        { method: request.method, url, timeoutMs: request.timeoutMs },
        "✗ Request timed out",
      );
      return err(timeout(request.timeoutMs));
    }

    log.warn(
      { method: request.method, url, error: cause.message },
      "✗ Request failed",
    );
    return err(
      transportError(
        "Error occurred while communicating with the energy meter",
        cause,
      ),
    );
  }

  log.debug(
    { method: request.method, url, status: response.status, body: response.body },
    "← Response",
  );

  if (response.status === 403) {
    // Known case: local API switched off in the app
    return err(apiDisabled());
  }

  if (response.status !== 200) {
    return err(unexpectedStatus(response.status));
  }

  return decodeBody(response);
}
