export { Duration } from "./duration";
export { PriceWindow } from "./price-window";
export type { PriceWindowJson } from "./price-window";
export {
  PRICE_LEVELS,
  isPriceLevel,
  normalizePriceLevel,
  priceLevelValue,
} from "./price-level";
export type { PriceLevel } from "./price-level";
export {
  END_OF_DAY_LABEL,
  HOUR_RANGE_SEPARATOR,
  MINUTES_PER_DAY,
  formatClockMinutes,
  parseClockMinutes,
  parseHourRange,
} from "./clock";
export type { ParsedHourRange } from "./clock";
export {
  addDays,
  isCalendarDate,
  isValidTimeZone,
  localInstantOf,
  toLocalInstant,
} from "./calendar";
export type { LocalInstant } from "./calendar";
export { createSnapshot, findDay, snapshotToPayload } from "./forecast";
export type {
  DayForecast,
  ForecastPayload,
  ForecastSnapshot,
  MergedRun,
  NextChange,
  RawDayForecast,
  RawForecastWindow,
  ResolvedState,
  SnapshotInput,
} from "./forecast";
export * from "./parsing";
export * from "./schedule";
export * from "./presentation";
export * from "./errors";
