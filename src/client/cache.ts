/**
 * Client Module - Device Cache
 *
 * Holds the identity and capability set of one device. Concurrent first-use
 * lookups share a single in-flight load.
 */
import { type Result, ok } from "neverthrow";

import type { EnergyApiError } from "../request/index.js";
import type { DeviceSnapshot } from "./schema.js";

type Loader = () => Promise<Result<DeviceSnapshot, EnergyApiError>>;

export class DeviceCache {
  private snapshot: DeviceSnapshot | null = null;
  private pending: Promise<Result<DeviceSnapshot, EnergyApiError>> | null =
    null;

  set(snapshot: DeviceSnapshot): void {
    this.snapshot = snapshot;
  }

  invalidate(): void {
    this.snapshot = null;
  }

  /**
   * Return the cached snapshot, or run `load` once for all callers waiting
   * on it. A failed first load leaves the cache empty.
   */
  getOrLoad(load: Loader): Promise<Result<DeviceSnapshot, EnergyApiError>> {
    if (this.snapshot !== null) {
      return Promise.resolve(ok(this.snapshot));
    }

    if (this.pending === null) {
      this.pending = load().finally(() => {
        this.pending = null;
      });
    }

    return this.pending;
  }
}
