import { describe, expect, it } from "vitest";

import {
  buildChartSeries,
  describeNextChange,
  Duration,
  formatRemaining,
  parseForecastSnapshot,
  PriceWindow,
  summarizeSchedule,
} from "@tariff-monitor/domain";

describe("formatRemaining", () => {
  it("uses hours once an hour or more remains", () => {
    expect(formatRemaining(420)).toBe("7h 0m");
    expect(formatRemaining(125)).toBe("2h 5m");
    expect(formatRemaining(60)).toBe("1h 0m");
  });

  it("uses minutes below an hour", () => {
    expect(formatRemaining(59)).toBe("59m");
    expect(formatRemaining(0)).toBe("0m");
  });
});

describe("summarizeSchedule", () => {
  const window = PriceWindow.fromMinutes(0, 1440, "low");

  it("mentions tomorrow only when it has windows", () => {
    expect(summarizeSchedule([window], [])).toBe("Today: 1 periods");
    expect(summarizeSchedule([window], [window, window])).toBe("Today: 1 periods, Tomorrow: 2 periods");
  });
});

describe("describeNextChange", () => {
  it("formats date, time and upper-cased price", () => {
    expect(describeNextChange({date: "2024-06-16", time: "06:00", price: "high"})).toBe("2024-06-16 06:00 (HIGH)");
  });
});

describe("buildChartSeries", () => {
  it("emits one point per window with a numeric price level", () => {
    const snapshot = parseForecastSnapshot(
      {
        current_price: "low",
        forecasts: [
          {
            date: "2024-06-15",
            forecast: [
              {hour_range: "00:00 - 06:00", price: "low"},
              {hour_range: "06:00 - 23:59", price: "high"},
            ],
          },
        ],
      },
      "2024-06-15T00:00:00.000Z",
    );

    expect(buildChartSeries(snapshot)).toEqual([
      {
        date: "2024-06-15",
        start_time: "00:00",
        end_time: "06:00",
        price: "low",
        price_value: 0,
        timestamp: "2024-06-15T00:00:00",
      },
      {
        date: "2024-06-15",
        start_time: "06:00",
        end_time: "23:59",
        price: "high",
        price_value: 1,
        timestamp: "2024-06-15T06:00:00",
      },
    ]);
  });
});

describe("Duration", () => {
  it("prints the coarsest whole unit", () => {
    expect(Duration.fromHours(2).toString()).toBe("2h");
    expect(Duration.fromMinutes(10).toString()).toBe("10m");
    expect(Duration.fromSeconds(15).toString()).toBe("15s");
    expect(Duration.fromMilliseconds(250).toString()).toBe("250ms");
  });

  it("rejects negative lengths", () => {
    expect(() => Duration.fromSeconds(-1)).toThrow();
  });
});
