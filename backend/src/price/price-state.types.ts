import type { ChartPoint, NextChange, PriceLevel, PriceWindowJson, RawDayForecast } from "@tariff-monitor/domain";

export type PriceLabel = "LOW" | "HIGH";

export interface CurrentPeriod {
  start: string;
  end: string;
  price: PriceLevel;
}

export interface PriceStateResponse {
  available: boolean;
  stale: boolean;
  current_price: PriceLevel | null;
  forecasts: RawDayForecast[];
  last_updated: string | null;
  current_period: CurrentPeriod | null;
  next_change: NextChange | null;
  today_schedule: PriceWindowJson[];
  tomorrow_schedule: PriceWindowJson[];
}

export interface CurrentPriceResponse {
  available: boolean;
  value: PriceLabel | null;
  current_range: string | null;
  next_change: string | null;
  last_updated: string | null;
  last_calculated: string;
}

export interface RemainingResponse {
  available: boolean;
  value: number | null;
  unit: "min";
  remaining_formatted: string | null;
  merged_until: string | null;
  merged_price: PriceLabel | null;
  last_calculated: string;
}

export interface ScheduleResponse {
  available: boolean;
  summary: string;
  today_schedule: PriceWindowJson[];
  tomorrow_schedule: PriceWindowJson[];
  forecasts: RawDayForecast[];
  last_updated: string | null;
  chart_data: ChartPoint[];
}

export interface StatusResponse {
  available: boolean;
  stale: boolean;
  refreshing: boolean;
  last_updated: string | null;
  last_error: string | null;
  last_attempt_at: string | null;
  last_attempts: number;
  source_url: string;
  time_zone: string;
}
