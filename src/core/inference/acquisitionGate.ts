import { ModelIdentifier } from "./types";

/**
 * Collapses concurrent acquisitions of the same model into one call.
 *
 * While a pull for a model is in flight, later callers get the same
 * promise. The entry is dropped once it settles, so a failed pull is
 * retried by the next request rather than cached.
 */
export class AcquisitionGate {
  private inFlight = new Map<ModelIdentifier, Promise<void>>();

  acquire(id: ModelIdentifier, start: () => Promise<void>): Promise<void> {
    const existing = this.inFlight.get(id);
    if (existing) return existing;

    const pending = start().finally(() => {
      this.inFlight.delete(id);
    });
    this.inFlight.set(id, pending);
    return pending;
  }

  isAcquiring(id: ModelIdentifier): boolean {
    return this.inFlight.has(id);
  }

  get size(): number {
    return this.inFlight.size;
  }
}
