import { Inject, Injectable, Logger } from "@nestjs/common";

import type {
  ForecastSnapshot,
  PriceLevel,
  PriceWindow,
  PriceWindowJson,
  RawDayForecast,
  ResolvedState,
} from "@tariff-monitor/domain";
import {
  buildChartSeries,
  describeNextChange,
  formatRemaining,
  resolveState,
  summarizeSchedule,
  toLocalInstant,
} from "@tariff-monitor/domain";
import type { SourceSettings } from "../config/source-settings.factory";
import { SOURCE_SETTINGS } from "../config/source-settings.factory";
import { RefreshSchedulerService } from "../forecast/refresh-scheduler.service";
import { SnapshotStoreService } from "../forecast/snapshot-store.service";
import type {
  CurrentPriceResponse,
  PriceLabel,
  PriceStateResponse,
  RemainingResponse,
  ScheduleResponse,
  StatusResponse,
} from "./price-state.types";

function toLabel(price: PriceLevel): PriceLabel {
  return price === "high" ? "HIGH" : "LOW";
}

function toRows(windows: readonly PriceWindow[]): PriceWindowJson[] {
  return windows.map((window) => window.toJSON());
}

function copyForecasts(snapshot: ForecastSnapshot): RawDayForecast[] {
  return snapshot.raw.map((day) => ({date: day.date, forecast: day.forecast.map((row) => ({...row}))}));
}

interface ReadCycle {
  snapshot: ForecastSnapshot;
  state: ResolvedState;
  stale: boolean;
}

/**
 * Read model over the latest snapshot. Each call samples the store once and
 * resolves against `at`, so values move with the clock between fetches.
 */
@Injectable()
export class PriceStateService {
  private readonly logger = new Logger(PriceStateService.name);

  constructor(
    @Inject(SnapshotStoreService) private readonly store: Pick<SnapshotStoreService, "read">,
    @Inject(RefreshSchedulerService) private readonly scheduler: Pick<RefreshSchedulerService, "isRunning">,
    @Inject(SOURCE_SETTINGS) private readonly settings: Pick<SourceSettings, "timeZone" | "url">,
  ) {
  }

  getState(at: Date = new Date()): PriceStateResponse {
    const cycle = this.readCycle(at);
    if (!cycle) {
      return {
        available: false,
        stale: false,
        current_price: null,
        forecasts: [],
        last_updated: null,
        current_period: null,
        next_change: null,
        today_schedule: [],
        tomorrow_schedule: [],
      };
    }
    const {snapshot, state, stale} = cycle;
    const window = state.currentWindow;
    return {
      available: true,
      stale,
      current_price: snapshot.currentPrice,
      forecasts: copyForecasts(snapshot),
      last_updated: snapshot.fetchedAt,
      current_period: window ? {start: window.startLabel, end: window.endLabel, price: window.price} : null,
      next_change: state.nextChange,
      today_schedule: toRows(state.today),
      tomorrow_schedule: toRows(state.tomorrow),
    };
  }

  getCurrentPrice(at: Date = new Date()): CurrentPriceResponse {
    const cycle = this.readCycle(at);
    const calculatedAt = at.toISOString();
    if (!cycle) {
      return {
        available: false,
        value: null,
        current_range: null,
        next_change: null,
        last_updated: null,
        last_calculated: calculatedAt,
      };
    }
    const {snapshot, state} = cycle;
    this.logger.debug(`Computed current price: ${state.currentPrice ?? "none"}`);
    return {
      available: true,
      value: state.currentPrice ? toLabel(state.currentPrice) : null,
      current_range: state.currentWindow ? state.currentWindow.hourRange : null,
      next_change: state.nextChange ? describeNextChange(state.nextChange) : null,
      last_updated: snapshot.fetchedAt,
      last_calculated: calculatedAt,
    };
  }

  getRemaining(at: Date = new Date()): RemainingResponse {
    const cycle = this.readCycle(at);
    const calculatedAt = at.toISOString();
    const remaining = cycle?.state.remainingMinutes ?? null;
    const run = cycle?.state.mergedRun ?? null;
    if (remaining !== null) {
      this.logger.debug(`Merged remaining time: ${remaining} minutes`);
    }
    return {
      available: cycle !== null,
      value: remaining,
      unit: "min",
      remaining_formatted: remaining !== null ? formatRemaining(remaining) : null,
      merged_until: run ? `${run.endDate} ${run.endTime}` : null,
      merged_price: run ? toLabel(run.price) : null,
      last_calculated: calculatedAt,
    };
  }

  getSchedule(at: Date = new Date()): ScheduleResponse {
    const cycle = this.readCycle(at);
    if (!cycle) {
      return {
        available: false,
        summary: "No data",
        today_schedule: [],
        tomorrow_schedule: [],
        forecasts: [],
        last_updated: null,
        chart_data: [],
      };
    }
    const {snapshot, state} = cycle;
    return {
      available: true,
      summary: summarizeSchedule(state.today, state.tomorrow),
      today_schedule: toRows(state.today),
      tomorrow_schedule: toRows(state.tomorrow),
      forecasts: copyForecasts(snapshot),
      last_updated: snapshot.fetchedAt,
      chart_data: buildChartSeries(snapshot),
    };
  }

  getStatus(): StatusResponse {
    const {snapshot, status} = this.store.read();
    return {
      available: status.available,
      stale: status.stale,
      refreshing: this.scheduler.isRunning(),
      last_updated: snapshot?.fetchedAt ?? null,
      last_error: status.last_error,
      last_attempt_at: status.last_attempt_at,
      last_attempts: status.last_attempts,
      source_url: this.settings.url,
      time_zone: this.settings.timeZone,
    };
  }

  private readCycle(at: Date): ReadCycle | null {
    const {snapshot, status} = this.store.read();
    if (!snapshot || !status.available) {
      return null;
    }
    const instant = toLocalInstant(at, this.settings.timeZone);
    return {snapshot, state: resolveState(snapshot, instant), stale: status.stale};
  }
}
