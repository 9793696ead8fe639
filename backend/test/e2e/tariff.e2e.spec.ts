import "reflect-metadata";
import cors from "@fastify/cors";
import type { FastifyCorsOptions } from "@fastify/cors";
import { createTRPCProxyClient, httpBatchLink } from "@trpc/client";
import { fastifyTRPCPlugin } from "@trpc/server/adapters/fastify";
import type { FastifyTRPCPluginOptions } from "@trpc/server/adapters/fastify";
import { Test } from "@nestjs/testing";
import { FastifyAdapter, NestFastifyApplication } from "@nestjs/platform-fastify";
import type { FastifyInstance } from "fastify";
import { afterAll, beforeAll, describe, expect, test, vi } from "vitest";

import type { Duration } from "@tariff-monitor/domain";
import { ForecastRequestError, parseForecastSnapshot } from "@tariff-monitor/domain";
import { AppModule } from "../../src/app.module";
import { setRuntimeConfig } from "../../src/config/runtime-config";
import type { ConfigDocument } from "../../src/config/schemas";
import { ForecastClient } from "../../src/forecast/forecast.client";
import { STORAGE_PATH_ENV } from "../../src/storage/storage.service";
import type { AppRouter } from "../../src/trpc/trpc.router";
import { TrpcRouter } from "../../src/trpc/trpc.router";

const TIME_ZONE = "Europe/Zurich";
const VALID_URL = "http://forecast.test/ok";

// 12:00 in Zurich; every query in this file resolves against this instant.
const NOW = new Date("2024-06-15T10:00:00.000Z");
const today = "2024-06-15";
const tomorrow = "2024-06-16";

const forecastBody = {
  current_price: "low",
  forecasts: [
    {date: today, forecast: [{hour_range: "00:00 - 23:59", price: "low"}]},
    {
      date: tomorrow,
      forecast: [
        {hour_range: "00:00 - 06:00", price: "low"},
        {hour_range: "06:00 - 23:59", price: "high"},
      ],
    },
  ],
};

const fakeForecastClient = {
  fetchSnapshot: async () => parseForecastSnapshot(forecastBody, new Date().toISOString()),
  fetchJson: async (url: string, _timeout: Duration) => {
    if (url !== VALID_URL) {
      throw new ForecastRequestError(`Request to ${url} failed: connection refused`);
    }
    return forecastBody;
  },
};

function toHeaderRecord(headers: ConstructorParameters<typeof Headers>[0]): Record<string, string> {
  return Object.fromEntries(new Headers(headers).entries());
}

describe("tariff tRPC", () => {
  let app: NestFastifyApplication;
  let client: ReturnType<typeof createTRPCProxyClient<AppRouter>>;
  let originalStoragePath: string | undefined;

  beforeAll(async () => {
    vi.useFakeTimers({toFake: ["Date"]});
    vi.setSystemTime(NOW);
    originalStoragePath = process.env[STORAGE_PATH_ENV];
    process.env[STORAGE_PATH_ENV] = ":memory:";
    const runtimeConfig: ConfigDocument = {
      timezone: TIME_ZONE,
      logging: {
        level: "info",
      },
    };
    setRuntimeConfig(runtimeConfig);

    const moduleRef = await Test.createTestingModule({
      imports: [AppModule],
    })
      .overrideProvider(ForecastClient)
      .useValue(fakeForecastClient)
      .compile();

    const adapter = new FastifyAdapter({logger: false});
    app = moduleRef.createNestApplication<NestFastifyApplication>(adapter);
    const fastify = app.getHttpAdapter().getInstance() as unknown as FastifyInstance;
    await fastify.register(cors, {origin: true} satisfies FastifyCorsOptions);
    const trpcRouter = app.get(TrpcRouter);
    await fastify.register(fastifyTRPCPlugin, {
      prefix: "/trpc",
      trpcOptions: {
        router: trpcRouter.router,
        createContext: () => trpcRouter.createContext(),
      },
    } satisfies FastifyTRPCPluginOptions<AppRouter>);
    await app.init();

    client = createTRPCProxyClient<AppRouter>({
      links: [
        httpBatchLink({
          url: "/trpc",
          fetch: async (input, init) => {
            let requestUrl: string | undefined;
            if (typeof input === "string") {
              requestUrl = input;
            } else if (input instanceof URL) {
              requestUrl = input.toString();
            } else if (input instanceof Request) {
              requestUrl = input.url;
            }
            if (!requestUrl) {
              throw new Error("Unsupported request input for tRPC client");
            }

            const method = init?.method === "GET" ? "GET" : "POST";
            const body = typeof init?.body === "string" ? init.body : undefined;
            const response = await fastify.inject({
              method,
              url: requestUrl,
              payload: body,
              headers: toHeaderRecord(init?.headers),
            });

            const headerEntries: [string, string][] = [];
            for (const [key, rawValue] of Object.entries(response.headers)) {
              if (rawValue === undefined) {
                continue;
              }
              headerEntries.push([key, Array.isArray(rawValue) ? rawValue.join(",") : String(rawValue)]);
            }

            return new Response(response.payload, {
              status: response.statusCode,
              headers: Object.fromEntries(headerEntries),
            });
          },
        }),
      ],
    });
  });

  afterAll(async () => {
    await app.close();
    vi.useRealTimers();
    if (originalStoragePath === undefined) {
      delete process.env[STORAGE_PATH_ENV];
    } else {
      process.env[STORAGE_PATH_ENV] = originalStoragePath;
    }
  });

  test("reports no data before the first refresh", async () => {
    const schedule = await client.tariff.schedule.query();
    expect(schedule.available).toBe(false);
    expect(schedule.summary).toBe("No data");

    const status = await client.tariff.status.query();
    expect(status.available).toBe(false);
    expect(status.time_zone).toBe(TIME_ZONE);
  });

  test("refreshes and resolves the current price", async () => {
    const refresh = await client.tariff.refresh.mutate();
    expect(refresh).toMatchObject({started: true, status: "fresh", attempts: 1, error: null});

    const current = await client.tariff.currentPrice.query();
    expect(current.value).toBe("LOW");
    expect(current.current_range).toBe("00:00 - 23:59");
    expect(current.next_change).toBe(`${tomorrow} 00:00 (LOW)`);

    const remaining = await client.tariff.remaining.query();
    expect(remaining.merged_until).toBe(`${tomorrow} 06:00`);
    expect(remaining.merged_price).toBe("LOW");
    expect(remaining.unit).toBe("min");

    const schedule = await client.tariff.schedule.query();
    expect(schedule.summary).toBe("Today: 1 periods, Tomorrow: 2 periods");
    expect(schedule.chart_data.map((point) => point.price_value)).toEqual([0, 0, 1]);

    const state = await client.tariff.state.query();
    expect(state.available).toBe(true);
    expect(state.current_period).toEqual({start: "00:00", end: "23:59", price: "low"});

    const status = await client.tariff.status.query();
    expect(status).toMatchObject({available: true, stale: false, refreshing: false, last_attempts: 1});
  });

  test("validates candidate sources", async () => {
    await expect(client.tariff.validateSource.mutate({url: VALID_URL})).resolves.toMatchObject({
      ok: true,
      url: VALID_URL,
    });
    await expect(client.tariff.validateSource.mutate({url: "http://forecast.test/down"})).resolves.toEqual({
      ok: false,
      reason: "cannot_connect",
      url: "http://forecast.test/down",
    });
  });

  test("rejects malformed source URLs", async () => {
    await expect(client.tariff.validateSource.mutate({url: "not a url"})).rejects.toMatchObject({
      data: {code: "BAD_REQUEST"},
    });
  });
});
