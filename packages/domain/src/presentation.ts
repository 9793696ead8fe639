import type { ForecastSnapshot, NextChange } from "./forecast";
import type { PriceLevel } from "./price-level";
import { priceLevelValue } from "./price-level";
import type { PriceWindow } from "./price-window";

export interface ChartPoint {
  date: string;
  start_time: string;
  end_time: string;
  price: PriceLevel;
  price_value: 0 | 1;
  timestamp: string;
}

/** Flat series over every day of the snapshot, one point per window. */
export function buildChartSeries(snapshot: ForecastSnapshot): ChartPoint[] {
  return snapshot.days.flatMap((day) =>
    day.windows.map((window) => ({
      date: day.date,
      start_time: window.startLabel,
      end_time: window.endLabel,
      price: window.price,
      price_value: priceLevelValue(window.price),
      timestamp: `${day.date}T${window.startLabel}:00`,
    })),
  );
}

export function formatRemaining(minutes: number): string {
  if (minutes >= 60) {
    return `${Math.floor(minutes / 60)}h ${minutes % 60}m`;
  }
  return `${minutes}m`;
}

export function summarizeSchedule(today: readonly PriceWindow[], tomorrow: readonly PriceWindow[]): string {
  const summary = `Today: ${today.length} periods`;
  return tomorrow.length ? `${summary}, Tomorrow: ${tomorrow.length} periods` : summary;
}

export function describeNextChange(change: NextChange): string {
  return `${change.date} ${change.time} (${change.price.toUpperCase()})`;
}
