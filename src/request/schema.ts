/**
 * Request Module - Schemas and Types
 *
 * Shapes crossing the transport boundary and the pipeline's own input/output.
 */

export type HttpMethod = "GET" | "PUT" | "DELETE";

/**
 * A single HTTP exchange as the transport sees it.
 * The transport must stop work and reject once `signal` aborts.
 */
export type TransportRequest = Readonly<{
  method: HttpMethod;
  url: string;
  headers: Readonly<Record<string, string>>;
  body?: string;
  signal: AbortSignal;
}>;

export type TransportResponse = Readonly<{
  status: number;
  /** Header names are lower-case. */
  headers: Readonly<Record<string, string>>;
  body: string;
}>;

/**
 * Anything that can perform an HTTP request against the device.
 * `close` releases connections the transport holds, if any.
 */
export interface Transport {
  request(request: TransportRequest): Promise<TransportResponse>;
  close?(): Promise<void>;
}

/**
 * One call through the request pipeline.
 */
export type DeviceRequest = Readonly<{
  host: string;
  path: string;
  method: HttpMethod;
  body?: unknown;
  timeoutMs: number;
}>;

/**
 * A successful (200) response body.
 */
export type RawResult =
  | { readonly kind: "json"; readonly value: unknown }
  | { readonly kind: "text"; readonly value: string };
