import { Inject, Injectable, Logger, OnModuleDestroy } from "@nestjs/common";

import { describeError, RefreshCancelledError } from "@tariff-monitor/domain";
import type { SourceSettings } from "../config/source-settings.factory";
import { SOURCE_SETTINGS } from "../config/source-settings.factory";
import type { RefreshOutcome } from "./forecast-refresh.service";
import { ForecastRefreshService } from "./forecast-refresh.service";
import { SnapshotStoreService } from "./snapshot-store.service";

@Injectable()
export class RefreshSchedulerService implements OnModuleDestroy {
  private readonly logger = new Logger(RefreshSchedulerService.name);
  private schedulerTimer: ReturnType<typeof setTimeout> | null = null;
  private inFlight: AbortController | null = null;
  private active = false;

  constructor(
    @Inject(ForecastRefreshService) private readonly refresher: Pick<ForecastRefreshService, "refresh">,
    @Inject(SnapshotStoreService) private readonly store: Pick<SnapshotStoreService, "getSnapshot" | "publish">,
    @Inject(SOURCE_SETTINGS) private readonly settings: Pick<SourceSettings, "refreshInterval">,
  ) {
  }

  /**
   * Runs the first refresh right away; while started, each completed run
   * schedules the next one after the refresh interval.
   */
  start(): void {
    this.active = true;
    this.refreshNow().catch((error) => this.logger.error(`Initial refresh failed: ${describeError(error)}`));
  }

  isRunning(): boolean {
    return this.inFlight !== null;
  }

  /**
   * Single flight: a call while a refresh is running returns `null` without
   * starting another. Cancellation through {@link onModuleDestroy} also yields
   * `null` and publishes nothing.
   */
  async refreshNow(): Promise<RefreshOutcome | null> {
    if (this.inFlight) {
      this.logger.warn("Forecast refresh already running; skipping new request.");
      return null;
    }
    const controller = new AbortController();
    this.inFlight = controller;
    try {
      const outcome = await this.refresher.refresh(this.store.getSnapshot(), controller.signal);
      this.store.publish(outcome);
      this.logger.log(`Refresh finished with status ${outcome.status} after ${outcome.attempts} attempt(s)`);
      return outcome;
    } catch (error) {
      if (error instanceof RefreshCancelledError) {
        this.logger.log("Forecast refresh cancelled");
        return null;
      }
      this.logger.error(`Forecast refresh failed: ${describeError(error)}`);
      throw error;
    } finally {
      this.inFlight = null;
      this.scheduleNextRun();
    }
  }

  onModuleDestroy(): void {
    this.active = false;
    this.inFlight?.abort();
    if (this.schedulerTimer) {
      clearTimeout(this.schedulerTimer);
      this.schedulerTimer = null;
    }
  }

  private scheduleNextRun(): void {
    if (this.schedulerTimer) {
      clearTimeout(this.schedulerTimer);
      this.schedulerTimer = null;
    }
    if (!this.active) {
      return;
    }
    const delayMs = Math.max(1, this.settings.refreshInterval.milliseconds);
    this.schedulerTimer = setTimeout(() => {
      this.refreshNow().catch((error) => this.logger.error(`Scheduled refresh failed: ${describeError(error)}`));
    }, delayMs);
    this.logger.log(`Next forecast refresh scheduled in ${(delayMs / 60000).toFixed(2)} minutes`);
  }
}
