import type { LocalInstant } from "./calendar";
import { formatClockMinutes, MINUTES_PER_DAY } from "./clock";
import type { ForecastSnapshot, MergedRun, NextChange, ResolvedState } from "./forecast";
import { findDay } from "./forecast";
import type { PriceLevel } from "./price-level";
import type { PriceWindow } from "./price-window";

// Every function here is pure: the snapshot is read, never written, and a
// missing day or window yields null rather than an error.

export function daySchedule(snapshot: ForecastSnapshot, date: string): readonly PriceWindow[] {
  return findDay(snapshot, date)?.windows ?? [];
}

export function currentWindow(snapshot: ForecastSnapshot, now: LocalInstant): PriceWindow | null {
  for (const window of daySchedule(snapshot, now.date)) {
    if (window.contains(now.minuteOfDay)) {
      return window;
    }
  }
  return null;
}

export function currentPrice(snapshot: ForecastSnapshot, now: LocalInstant): PriceLevel | null {
  return currentWindow(snapshot, now)?.price ?? null;
}

function sortedSchedule(snapshot: ForecastSnapshot, date: string): PriceWindow[] {
  return [...daySchedule(snapshot, date)].sort((a, b) => a.startMinute - b.startMinute);
}

/** Follows contiguous same-price windows from `fromIndex`; a gap or a price change ends the run. */
function extendRun(windows: PriceWindow[], fromIndex: number, boundary: number, price: PriceLevel): number {
  let end = boundary;
  for (let index = fromIndex; index < windows.length; index += 1) {
    const next = windows[index];
    if (next.startMinute !== end || next.price !== price) {
      break;
    }
    end = next.endMinute;
  }
  return end;
}

export function mergedRun(snapshot: ForecastSnapshot, now: LocalInstant): MergedRun | null {
  const today = sortedSchedule(snapshot, now.date);
  const index = today.findIndex((window) => window.contains(now.minuteOfDay));
  if (index < 0) {
    return null;
  }
  const current = today[index];
  const price = current.price;
  let endMinute = extendRun(today, index + 1, current.endMinute, price);

  // Crossing midnight looks at tomorrow only; the chain never reaches a third day.
  if (endMinute >= MINUTES_PER_DAY) {
    const tomorrow = sortedSchedule(snapshot, now.tomorrow);
    if (tomorrow.length > 0 && tomorrow[0].startMinute === 0 && tomorrow[0].price === price) {
      endMinute = MINUTES_PER_DAY + extendRun(tomorrow, 1, tomorrow[0].endMinute, price);
    }
  }

  const endsToday = endMinute < MINUTES_PER_DAY;
  return {
    price,
    endMinute,
    endDate: endsToday ? now.date : now.tomorrow,
    endTime: formatClockMinutes(endsToday ? endMinute : endMinute - MINUTES_PER_DAY),
  };
}

export function mergedRemainingMinutes(snapshot: ForecastSnapshot, now: LocalInstant): number | null {
  const run = mergedRun(snapshot, now);
  if (!run) {
    return null;
  }
  return Math.max(0, run.endMinute - now.minuteOfDay);
}

/**
 * The next scheduled window, not the next price flip: when today has nothing
 * left, tomorrow's first window is returned even if its price is unchanged.
 */
export function nextChange(snapshot: ForecastSnapshot, now: LocalInstant): NextChange | null {
  for (const window of daySchedule(snapshot, now.date)) {
    if (window.startMinute > now.minuteOfDay) {
      return {time: window.startLabel, price: window.price, date: now.date};
    }
  }
  const tomorrow = daySchedule(snapshot, now.tomorrow);
  if (tomorrow.length === 0) {
    return null;
  }
  const first = tomorrow[0];
  return {time: first.startLabel, price: first.price, date: now.tomorrow};
}

export function resolveState(snapshot: ForecastSnapshot, now: LocalInstant): ResolvedState {
  const window = currentWindow(snapshot, now);
  const run = mergedRun(snapshot, now);
  return {
    instant: now,
    currentWindow: window,
    currentPrice: window?.price ?? null,
    mergedRun: run,
    remainingMinutes: run ? Math.max(0, run.endMinute - now.minuteOfDay) : null,
    nextChange: nextChange(snapshot, now),
    today: daySchedule(snapshot, now.date),
    tomorrow: daySchedule(snapshot, now.tomorrow),
  };
}
