import { setTimeout as sleep } from "node:timers/promises";

import type { Duration } from "@tariff-monitor/domain";
import { RefreshCancelledError } from "@tariff-monitor/domain";

export type WaitFn = (delay: Duration, signal?: AbortSignal) => Promise<void>;

/** Injection token for the pause used between retry attempts. */
export const RETRY_WAIT = Symbol("RETRY_WAIT");

export const cancellableWait: WaitFn = async (delay, signal) => {
  if (signal?.aborted) {
    throw new RefreshCancelledError();
  }
  try {
    await sleep(delay.milliseconds, undefined, {signal});
  } catch (error) {
    if (signal?.aborted) {
      throw new RefreshCancelledError();
    }
    throw error;
  }
};
