const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/** A query instant projected onto the wall clock of one timezone. */
export interface LocalInstant {
  readonly date: string;
  readonly tomorrow: string;
  readonly minuteOfDay: number;
}

export function isCalendarDate(value: string): boolean {
  const match = CALENDAR_DATE.exec(value);
  if (!match) {
    return false;
  }
  const [, year, month, day] = match;
  const parsed = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  return parsed.getUTCFullYear() === Number(year)
    && parsed.getUTCMonth() === Number(month) - 1
    && parsed.getUTCDate() === Number(day);
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", {timeZone});
    return true;
  } catch {
    return false;
  }
}

export function addDays(date: string, days: number): string {
  const match = CALENDAR_DATE.exec(date);
  if (!match) {
    throw new RangeError(`Expected a YYYY-MM-DD date, received '${date}'`);
  }
  const [, year, month, day] = match;
  const shifted = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day) + days));
  return shifted.toISOString().slice(0, 10);
}

export function localInstantOf(date: string, minuteOfDay: number): LocalInstant {
  return {date, tomorrow: addDays(date, 1), minuteOfDay};
}

export function toLocalInstant(at: Date, timeZone: string): LocalInstant {
  const parts = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23",
  }).formatToParts(at);
  const field = (type: Intl.DateTimeFormatPartTypes): string => {
    const part = parts.find((candidate) => candidate.type === type);
    if (!part) {
      throw new RangeError(`Unable to resolve '${type}' for ${at.toISOString()} in ${timeZone}`);
    }
    return part.value;
  };
  const date = `${field("year")}-${field("month")}-${field("day")}`;
  const minuteOfDay = Number(field("hour")) * 60 + Number(field("minute"));
  return localInstantOf(date, minuteOfDay);
}
