import type { LocalInstant } from "./calendar";
import type { PriceLevel } from "./price-level";
import type { PriceWindow } from "./price-window";

export interface RawForecastWindow {
  hour_range: string;
  price: PriceLevel;
}

export interface RawDayForecast {
  date: string;
  forecast: RawForecastWindow[];
}

/** Wire shape of the upstream endpoint after validation. */
export interface ForecastPayload {
  current_price: PriceLevel;
  forecasts: RawDayForecast[];
}

export interface DayForecast {
  readonly date: string;
  readonly windows: readonly PriceWindow[];
}

export interface ForecastSnapshot {
  readonly fetchedAt: string;
  readonly currentPrice: PriceLevel;
  readonly days: readonly DayForecast[];
  readonly raw: readonly RawDayForecast[];
}

export interface NextChange {
  time: string;
  price: PriceLevel;
  date: string;
}

/**
 * End of the run of contiguous same-price windows starting at the current
 * window. `endMinute` counts from today's midnight and exceeds 1440 when the
 * run continues into tomorrow.
 */
export interface MergedRun {
  price: PriceLevel;
  endMinute: number;
  endDate: string;
  endTime: string;
}

export interface ResolvedState {
  instant: LocalInstant;
  currentWindow: PriceWindow | null;
  currentPrice: PriceLevel | null;
  mergedRun: MergedRun | null;
  remainingMinutes: number | null;
  nextChange: NextChange | null;
  today: readonly PriceWindow[];
  tomorrow: readonly PriceWindow[];
}

export interface SnapshotInput {
  fetchedAt: string;
  currentPrice: PriceLevel;
  days: DayForecast[];
  raw?: RawDayForecast[];
}

/**
 * Freezes a snapshot so it can be shared by reference between readers.
 * Later records for an already-seen date are dropped.
 */
export function createSnapshot(input: SnapshotInput): ForecastSnapshot {
  const seen = new Set<string>();
  const days: DayForecast[] = [];
  for (const day of input.days) {
    if (seen.has(day.date)) {
      continue;
    }
    seen.add(day.date);
    days.push(Object.freeze({date: day.date, windows: Object.freeze([...day.windows])}));
  }
  const raw = input.raw ?? days.map((day) => ({
    date: day.date,
    forecast: day.windows.map((window) => window.toJSON()),
  }));
  return Object.freeze({
    fetchedAt: input.fetchedAt,
    currentPrice: input.currentPrice,
    days: Object.freeze(days),
    raw: Object.freeze(raw.map((day) => Object.freeze({...day, forecast: day.forecast.map((row) => ({...row}))}))),
  });
}

export function findDay(snapshot: ForecastSnapshot, date: string): DayForecast | null {
  return snapshot.days.find((day) => day.date === date) ?? null;
}

export function snapshotToPayload(snapshot: ForecastSnapshot): ForecastPayload {
  return {
    current_price: snapshot.currentPrice,
    forecasts: snapshot.raw.map((day) => ({
      date: day.date,
      forecast: day.forecast.map((row) => ({...row})),
    })),
  };
}
