export const MINUTES_PER_DAY = 24 * 60;

/** Upstream marks the last window of a day with this end label instead of 24:00. */
export const END_OF_DAY_LABEL = "23:59";

export const HOUR_RANGE_SEPARATOR = " - ";

const INTEGER_TOKEN = /^\s*[+-]?\d+\s*$/;

export interface ParsedHourRange {
  startLabel: string;
  endLabel: string;
  startMinute: number;
  endMinute: number;
}

/**
 * Minutes since midnight for an `HH:MM` label.
 *
 * Anything that is not two integer fields separated by a colon resolves to
 * minute 0 instead of failing; results are clamped into `[0, 1440]`.
 */
export function parseClockMinutes(label: string): number {
  const parts = label.split(":");
  if (parts.length !== 2) {
    return 0;
  }
  const [hoursToken, minutesToken] = parts;
  if (!INTEGER_TOKEN.test(hoursToken) || !INTEGER_TOKEN.test(minutesToken)) {
    return 0;
  }
  const total = Number.parseInt(hoursToken, 10) * 60 + Number.parseInt(minutesToken, 10);
  return Math.min(Math.max(total, 0), MINUTES_PER_DAY);
}

export function formatClockMinutes(minute: number): string {
  const hours = Math.floor(minute / 60);
  const minutes = minute % 60;
  return `${hours.toString().padStart(2, "0")}:${minutes.toString().padStart(2, "0")}`;
}

/**
 * Splits `"HH:MM - HH:MM"` into labels and minute bounds. Returns `null` when
 * the separator is missing, which callers treat as a row without a range.
 */
export function parseHourRange(range: string): ParsedHourRange | null {
  const parts = range.split(HOUR_RANGE_SEPARATOR);
  if (parts.length !== 2) {
    return null;
  }
  const [startLabel, endLabel] = parts;
  return {
    startLabel,
    endLabel,
    startMinute: parseClockMinutes(startLabel),
    endMinute: endLabel === END_OF_DAY_LABEL ? MINUTES_PER_DAY : parseClockMinutes(endLabel),
  };
}
