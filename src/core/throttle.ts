import { setTimeout as delay } from "timers/promises";
import type { JobStore } from "../storage/jobStore";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export interface ThrottleOptions {
  now?: () => number;
  sleep?: Sleep;
}

/**
 * Spaces browser actions at least `minIntervalMs` apart. Slots are reserved in the
 * job store, so every caller sharing the store shares the spacing.
 */
export class ActionThrottle {
  private readonly store: JobStore;
  private readonly minIntervalMs: number;
  private readonly now: () => number;
  private readonly sleep: Sleep;

  constructor(store: JobStore, minIntervalMs: number, options: ThrottleOptions = {}) {
    this.store = store;
    this.minIntervalMs = minIntervalMs;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleep;
  }

  async wait(signal?: AbortSignal): Promise<number> {
    signal?.throwIfAborted();
    if (this.minIntervalMs <= 0) {
      return 0;
    }
    const waitMs = await this.store.reserveActionSlot(this.minIntervalMs, this.now());
    if (waitMs > 0) {
      await this.sleep(waitMs, signal);
    }
    return waitMs;
  }
}
