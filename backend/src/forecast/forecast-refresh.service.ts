import { Inject, Injectable, Logger } from "@nestjs/common";

import type { ForecastSnapshot } from "@tariff-monitor/domain";
import {
  describeError,
  ForecastRequestError,
  ForecastValidationError,
  RefreshCancelledError,
  RefreshExhaustedError,
} from "@tariff-monitor/domain";
import type { RetryTier, SourceSettings } from "../config/source-settings.factory";
import { SOURCE_SETTINGS } from "../config/source-settings.factory";
import type { ForecastSource } from "./forecast.client";
import { ForecastClient } from "./forecast.client";
import type { WaitFn } from "./wait";
import { RETRY_WAIT } from "./wait";

export type RefreshOutcome =
  | { status: "fresh"; snapshot: ForecastSnapshot; attempts: number }
  | { status: "stale"; snapshot: ForecastSnapshot; attempts: number; error: RefreshExhaustedError }
  | { status: "failed"; attempts: number; error: RefreshExhaustedError };

type FailureKind = "network" | "validation" | "unexpected";

function classifyFailure(error: unknown): FailureKind {
  if (error instanceof ForecastRequestError) {
    return "network";
  }
  if (error instanceof ForecastValidationError) {
    return "validation";
  }
  return "unexpected";
}

/**
 * Drives the acquisition state machine: the fast tier, then the extended
 * tier, then either the previous snapshot (stale serve) or a terminal
 * failure. Individual attempt errors never escape; only the final outcome
 * does, plus {@link RefreshCancelledError} when `signal` aborts.
 */
@Injectable()
export class ForecastRefreshService {
  private readonly logger = new Logger(ForecastRefreshService.name);

  constructor(
    @Inject(ForecastClient) private readonly source: ForecastSource,
    @Inject(SOURCE_SETTINGS) private readonly settings: Pick<SourceSettings, "retryTiers">,
    @Inject(RETRY_WAIT) private readonly wait: WaitFn,
  ) {
  }

  async refresh(previous: ForecastSnapshot | null, signal?: AbortSignal): Promise<RefreshOutcome> {
    let attempts = 0;
    let lastError: unknown = null;

    for (const [tierIndex, tier] of this.settings.retryTiers.entries()) {
      if (tierIndex > 0) {
        this.logger.log(
          `Entering ${tier.name} retry tier: up to ${tier.attempts} attempts every ${tier.interval.toString()}`,
        );
      }
      for (let attempt = 1; attempt <= tier.attempts; attempt += 1) {
        attempts += 1;
        try {
          const snapshot = await this.source.fetchSnapshot(signal);
          this.logger.log(`Forecast refreshed on ${tier.name} attempt ${attempt}/${tier.attempts}`);
          return {status: "fresh", snapshot, attempts};
        } catch (error) {
          if (error instanceof RefreshCancelledError) {
            throw error;
          }
          lastError = error;
          this.logAttemptFailure(tier, attempt, error);
        }
        if (attempt < tier.attempts) {
          await this.wait(tier.interval, signal);
        }
      }
    }

    const exhausted = new RefreshExhaustedError(attempts, lastError);
    if (previous) {
      this.logger.warn(
        `All ${attempts} attempts failed; serving cached forecast fetched at ${previous.fetchedAt}`,
      );
      return {status: "stale", snapshot: previous, attempts, error: exhausted};
    }
    this.logger.error(`${exhausted.message}; no cached forecast available`);
    return {status: "failed", attempts, error: exhausted};
  }

  private logAttemptFailure(tier: RetryTier, attempt: number, error: unknown): void {
    const kind = classifyFailure(error);
    const message = `${tier.name} attempt ${attempt}/${tier.attempts} failed (${kind}): ${describeError(error)}`;
    this.logger.warn(message);
    if (kind === "unexpected" && error instanceof Error && error.stack) {
      this.logger.debug(error.stack);
    }
  }
}
