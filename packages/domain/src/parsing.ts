import { z } from "zod";

import { isCalendarDate } from "./calendar";
import { ForecastValidationError } from "./errors";
import type { DayForecast, ForecastPayload, ForecastSnapshot } from "./forecast";
import { createSnapshot } from "./forecast";
import { normalizePriceLevel, PRICE_LEVELS } from "./price-level";
import { PriceWindow } from "./price-window";

const priceLabelSchema = z.string().transform((value, ctx) => {
  const level = normalizePriceLevel(value);
  if (!level) {
    ctx.addIssue({code: z.ZodIssueCode.custom, message: `unrecognised price label '${value}'`});
    return z.NEVER;
  }
  return level;
});

const forecastWindowSchema = z.object({
  hour_range: z.string(),
  price: priceLabelSchema,
});

const dayForecastSchema = z.object({
  date: z.string().refine(isCalendarDate, {message: "expected a YYYY-MM-DD date"}),
  forecast: z.array(forecastWindowSchema).default([]),
});

export const forecastPayloadSchema = z.object({
  current_price: z.enum(PRICE_LEVELS),
  forecasts: z.array(dayForecastSchema),
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}

export function parseForecastPayload(payload: unknown): ForecastPayload {
  const result = forecastPayloadSchema.safeParse(payload);
  if (!result.success) {
    throw new ForecastValidationError(formatIssues(result.error));
  }
  return result.data;
}

/**
 * Maps a validated payload onto a snapshot. Rows whose `hour_range` lacks the
 * `" - "` separator carry no usable bounds and are left out of the windows,
 * but stay in the raw pass-through.
 */
export function snapshotFromPayload(payload: ForecastPayload, fetchedAt: string): ForecastSnapshot {
  const days: DayForecast[] = payload.forecasts.map((day) => ({
    date: day.date,
    windows: day.forecast.flatMap((row) => {
      const window = PriceWindow.fromHourRange(row.hour_range, row.price);
      return window ? [window] : [];
    }),
  }));
  return createSnapshot({
    fetchedAt,
    currentPrice: payload.current_price,
    days,
    raw: payload.forecasts,
  });
}

export function parseForecastSnapshot(payload: unknown, fetchedAt: string): ForecastSnapshot {
  return snapshotFromPayload(parseForecastPayload(payload), fetchedAt);
}
