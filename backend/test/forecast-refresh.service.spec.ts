import { describe, expect, it, vi } from "vitest";

import type { ForecastSnapshot } from "@tariff-monitor/domain";
import {
  Duration,
  ForecastRequestError,
  ForecastValidationError,
  parseForecastSnapshot,
  RefreshCancelledError,
  RefreshExhaustedError,
} from "@tariff-monitor/domain";
import type { SourceSettings } from "../src/config/source-settings.factory";
import type { ForecastSource } from "../src/forecast/forecast.client";
import { ForecastRefreshService } from "../src/forecast/forecast-refresh.service";
import type { WaitFn } from "../src/forecast/wait";

const FAST_INTERVAL = Duration.fromMinutes(1);
const EXTENDED_INTERVAL = Duration.fromMinutes(10);

const settings: Pick<SourceSettings, "retryTiers"> = {
  retryTiers: [
    {name: "fast", attempts: 5, interval: FAST_INTERVAL},
    {name: "extended", attempts: 20, interval: EXTENDED_INTERVAL},
  ],
};

function sampleSnapshot(fetchedAt: string): ForecastSnapshot {
  return parseForecastSnapshot(
    {current_price: "low", forecasts: [{date: "2024-06-15", forecast: [{hour_range: "00:00 - 23:59", price: "low"}]}]},
    fetchedAt,
  );
}

function createHarness(fetchSnapshot: ForecastSource["fetchSnapshot"]) {
  const source = {fetchSnapshot: vi.fn(fetchSnapshot)};
  const wait = vi.fn<WaitFn>(async () => undefined);
  const service = new ForecastRefreshService(source, settings, wait);
  return {service, source, wait};
}

describe("ForecastRefreshService", () => {
  it("succeeds within the fast tier after four failures", async () => {
    const fresh = sampleSnapshot("2024-06-15T10:00:00.000Z");
    let calls = 0;
    const {service, source, wait} = createHarness(async () => {
      calls += 1;
      if (calls < 5) {
        throw new ForecastRequestError("connection refused");
      }
      return fresh;
    });

    const outcome = await service.refresh(null);

    expect(outcome).toEqual({status: "fresh", snapshot: fresh, attempts: 5});
    expect(source.fetchSnapshot).toHaveBeenCalledTimes(5);
    expect(wait).toHaveBeenCalledTimes(4);
    expect(wait.mock.calls.every(([delay]) => delay.equals(FAST_INTERVAL))).toBe(true);
  });

  it("moves to the extended tier without an extra pause", async () => {
    const fresh = sampleSnapshot("2024-06-15T10:00:00.000Z");
    let calls = 0;
    const {service, wait} = createHarness(async () => {
      calls += 1;
      if (calls <= 5) {
        throw new ForecastValidationError(["current_price: Required"]);
      }
      return fresh;
    });

    const outcome = await service.refresh(null);

    expect(outcome.status).toBe("fresh");
    expect(outcome.attempts).toBe(6);
    expect(wait).toHaveBeenCalledTimes(4);
  });

  it("serves the previous snapshot as stale once both tiers are exhausted", async () => {
    const previous = sampleSnapshot("2024-06-14T10:00:00.000Z");
    const {service, source, wait} = createHarness(async () => {
      throw new ForecastRequestError("HTTP 503 Service Unavailable", 503);
    });

    const outcome = await service.refresh(previous);

    expect(outcome.status).toBe("stale");
    if (outcome.status !== "stale") {
      return;
    }
    expect(outcome.snapshot).toBe(previous);
    expect(outcome.attempts).toBe(25);
    expect(outcome.error).toBeInstanceOf(RefreshExhaustedError);
    expect(outcome.error.message).toBe("Forecast source unavailable after 25 attempts: HTTP 503 Service Unavailable");
    expect(source.fetchSnapshot).toHaveBeenCalledTimes(25);
    expect(wait).toHaveBeenCalledTimes(23);
    expect(wait.mock.calls.filter(([delay]) => delay.equals(FAST_INTERVAL))).toHaveLength(4);
    expect(wait.mock.calls.filter(([delay]) => delay.equals(EXTENDED_INTERVAL))).toHaveLength(19);
  });

  it("fails terminally when nothing was cached", async () => {
    const {service} = createHarness(async () => {
      throw new ForecastRequestError("connection refused");
    });

    const outcome = await service.refresh(null);

    expect(outcome.status).toBe("failed");
    expect(outcome.attempts).toBe(25);
  });

  it("counts unexpected errors as failed attempts", async () => {
    const fresh = sampleSnapshot("2024-06-15T10:00:00.000Z");
    let calls = 0;
    const {service} = createHarness(async () => {
      calls += 1;
      if (calls === 1) {
        throw new TypeError("boom");
      }
      return fresh;
    });

    await expect(service.refresh(null)).resolves.toEqual({status: "fresh", snapshot: fresh, attempts: 2});
  });

  it("stops immediately when cancelled", async () => {
    const {service, source, wait} = createHarness(async () => {
      throw new ForecastRequestError("connection refused");
    });
    wait.mockImplementationOnce(async () => {
      throw new RefreshCancelledError();
    });

    await expect(service.refresh(sampleSnapshot("2024-06-14T10:00:00.000Z"))).rejects.toBeInstanceOf(
      RefreshCancelledError,
    );
    expect(source.fetchSnapshot).toHaveBeenCalledTimes(1);
  });

  it("passes the abort signal to every attempt", async () => {
    const fresh = sampleSnapshot("2024-06-15T10:00:00.000Z");
    const {service, source} = createHarness(async () => fresh);
    const controller = new AbortController();

    await service.refresh(null, controller.signal);

    expect(source.fetchSnapshot).toHaveBeenCalledWith(controller.signal);
  });
});
