/**
 * Request Module - Default Transport
 *
 * Transport over the global fetch. Tracks in-flight calls so close() can
 * abort them; a closed transport refuses new requests.
 */
import type {
  Transport,
  TransportRequest,
  TransportResponse,
} from "./schema.js";

export class TransportClosedError extends Error {
  constructor() {
    super("Transport is closed");
    this.name = "TransportClosedError";
  }
}

export class FetchTransport implements Transport {
  private readonly inFlight = new Set<AbortController>();
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  async request(request: TransportRequest): Promise<TransportResponse> {
    if (this.closed) {
      throw new TransportClosedError();
    }

    // Own controller per call: aborted by the caller's deadline or by close()
    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort(request.signal.reason);
    if (request.signal.aborted) {
      forwardAbort();
    } else {
      request.signal.addEventListener("abort", forwardAbort, { once: true });
    }
    this.inFlight.add(controller);

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: { ...request.headers },
        signal: controller.signal,
        ...(request.body !== undefined ? { body: request.body } : {}),
      });

      const body = await response.text();
      const headers: Record<string, string> = {};
      response.headers.forEach((value, name) => {
        headers[name.toLowerCase()] = value;
      });

      return { status: response.status, headers, body };
    } finally {
      request.signal.removeEventListener("abort", forwardAbort);
      this.inFlight.delete(controller);
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    for (const controller of this.inFlight) {
      controller.abort(new TransportClosedError());
    }
    this.inFlight.clear();
  }
}
