import { describe, expect, it, vi } from "vitest";

import { Duration, EndpointCheckError, ForecastRequestError } from "@tariff-monitor/domain";
import type { ForecastClient } from "../src/forecast/forecast.client";
import { EndpointCheckService, SOURCE_TITLE } from "../src/forecast/endpoint-check.service";

const DEFAULT_URL = "http://forecast.test/amb-data";

function createService(fetchJson: ForecastClient["fetchJson"]) {
  const client = {fetchJson: vi.fn(fetchJson)};
  const service = new EndpointCheckService(client, {url: DEFAULT_URL, timeout: Duration.fromSeconds(15)});
  return {service, client};
}

describe("EndpointCheckService", () => {
  it("accepts a source that returns a valid forecast", async () => {
    const {service, client} = createService(async () => ({current_price: "low", forecasts: []}));

    await expect(service.validate()).resolves.toEqual({ok: true, title: SOURCE_TITLE, url: DEFAULT_URL});
    expect(client.fetchJson).toHaveBeenCalledWith(DEFAULT_URL, Duration.fromSeconds(15));
  });

  it("checks a candidate URL instead of the configured one", async () => {
    const {service, client} = createService(async () => ({current_price: "high", forecasts: []}));

    const result = await service.validate("http://other.test/feed");

    expect(result.ok).toBe(true);
    expect(client.fetchJson.mock.calls[0][0]).toBe("http://other.test/feed");
  });

  it("maps request failures to cannot_connect", async () => {
    const {service} = createService(async () => {
      throw new ForecastRequestError("HTTP 404 Not Found", 404);
    });

    await expect(service.validate()).resolves.toEqual({
      ok: false,
      reason: "cannot_connect",
      url: DEFAULT_URL,
    });
  });

  it("maps malformed payloads to invalid_data", async () => {
    const {service} = createService(async () => ({forecasts: []}));

    await expect(service.validate()).resolves.toEqual({ok: false, reason: "invalid_data", url: DEFAULT_URL});
  });

  it("returns only the failure category for upstream content", async () => {
    const {service} = createService(async () => ({current_price: "internal-value-42", forecasts: []}));

    const result = await service.validate("http://127.0.0.1:9/admin");

    expect(result).toEqual({ok: false, reason: "invalid_data", url: "http://127.0.0.1:9/admin"});
    expect(Object.keys(result).sort()).toEqual(["ok", "reason", "url"]);
  });

  it("returns only the failure category for transport errors", async () => {
    const {service} = createService(async () => {
      throw new ForecastRequestError("HTTP 401 Unauthorized: realm=internal-admin", 401);
    });

    await expect(service.validate("http://10.0.0.5/status")).resolves.toEqual({
      ok: false,
      reason: "cannot_connect",
      url: "http://10.0.0.5/status",
    });
  });

  it("throws a typed error from assertReachable", async () => {
    const {service} = createService(async () => {
      throw new ForecastRequestError("Request failed: connection refused");
    });

    const error = await service.assertReachable().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(EndpointCheckError);
    expect(error).toMatchObject({
      reason: "cannot_connect",
      message: `${DEFAULT_URL}: Request failed: connection refused`,
    });
  });
});
