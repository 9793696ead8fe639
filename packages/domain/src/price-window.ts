import { END_OF_DAY_LABEL, formatClockMinutes, HOUR_RANGE_SEPARATOR, MINUTES_PER_DAY, parseHourRange } from "./clock";
import type { PriceLevel } from "./price-level";

export interface PriceWindowJson {
  hour_range: string;
  price: PriceLevel;
}

export class PriceWindow {
  readonly startMinute: number;
  readonly endMinute: number;
  readonly price: PriceLevel;
  readonly startLabel: string;
  readonly endLabel: string;

  private constructor(
    startMinute: number,
    endMinute: number,
    price: PriceLevel,
    startLabel: string,
    endLabel: string,
  ) {
    this.startMinute = startMinute;
    this.endMinute = endMinute;
    this.price = price;
    this.startLabel = startLabel;
    this.endLabel = endLabel;
    Object.freeze(this);
  }

  static fromMinutes(startMinute: number, endMinute: number, price: PriceLevel): PriceWindow {
    PriceWindow.assertMinute(startMinute, "start");
    PriceWindow.assertMinute(endMinute, "end");
    if (endMinute <= startMinute) {
      throw new RangeError("Price window end must be after start");
    }
    return new PriceWindow(
      startMinute,
      endMinute,
      price,
      formatClockMinutes(startMinute),
      endMinute === MINUTES_PER_DAY ? END_OF_DAY_LABEL : formatClockMinutes(endMinute),
    );
  }

  /**
   * Builds a window from an upstream `hour_range`. Malformed clock tokens fall
   * back to midnight, so the resulting window may be empty; it then simply
   * never contains any minute.
   */
  static fromHourRange(range: string, price: PriceLevel): PriceWindow | null {
    const parsed = parseHourRange(range);
    if (!parsed) {
      return null;
    }
    return new PriceWindow(parsed.startMinute, parsed.endMinute, price, parsed.startLabel, parsed.endLabel);
  }

  get durationMinutes(): number {
    return Math.max(0, this.endMinute - this.startMinute);
  }

  get hourRange(): string {
    return `${this.startLabel}${HOUR_RANGE_SEPARATOR}${this.endLabel}`;
  }

  contains(minuteOfDay: number): boolean {
    return this.startMinute <= minuteOfDay && minuteOfDay < this.endMinute;
  }

  toJSON(): PriceWindowJson {
    return {hour_range: this.hourRange, price: this.price};
  }

  private static assertMinute(value: number, field: string): void {
    if (!Number.isInteger(value) || value < 0 || value > MINUTES_PER_DAY) {
      throw new RangeError(`Price window ${field} must be an integer minute within [0, ${MINUTES_PER_DAY}]`);
    }
  }
}
