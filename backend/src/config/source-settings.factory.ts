import { Injectable } from "@nestjs/common";

import { Duration } from "@tariff-monitor/domain";
import type { ConfigDocument } from "./schemas";

export const DEFAULT_SOURCE_URL = "https://amb-dynamic-current-api.uschti.ch/amb-data";
export const DEFAULT_TIMEOUT = Duration.fromSeconds(15);
export const DEFAULT_REFRESH_INTERVAL = Duration.fromHours(2);
export const DEFAULT_TIME_ZONE = "Europe/Zurich";

export const DEFAULT_FAST_ATTEMPTS = 5;
export const DEFAULT_FAST_INTERVAL = Duration.fromMinutes(1);
export const DEFAULT_EXTENDED_ATTEMPTS = 20;
export const DEFAULT_EXTENDED_INTERVAL = Duration.fromMinutes(10);

/** Injection token for the resolved {@link SourceSettings}. */
export const SOURCE_SETTINGS = Symbol("SOURCE_SETTINGS");

export type RetryTierName = "fast" | "extended";

export interface RetryTier {
  name: RetryTierName;
  attempts: number;
  interval: Duration;
}

export interface SourceSettings {
  url: string;
  timeout: Duration;
  verifyOnStartup: boolean;
  refreshInterval: Duration;
  retryTiers: [RetryTier, RetryTier];
  timeZone: string;
}

@Injectable()
export class SourceSettingsFactory {
  create(config: ConfigDocument): SourceSettings {
    const source = config.source ?? {};
    const retry = config.retry ?? {};

    return {
      url: source.url ?? DEFAULT_SOURCE_URL,
      timeout: source.timeout_seconds != null ? Duration.fromSeconds(source.timeout_seconds) : DEFAULT_TIMEOUT,
      verifyOnStartup: source.verify_on_startup ?? false,
      refreshInterval:
        config.refresh?.interval_hours != null
          ? Duration.fromHours(config.refresh.interval_hours)
          : DEFAULT_REFRESH_INTERVAL,
      retryTiers: [
        {
          name: "fast",
          attempts: retry.fast?.attempts ?? DEFAULT_FAST_ATTEMPTS,
          interval:
            retry.fast?.interval_seconds != null
              ? Duration.fromSeconds(retry.fast.interval_seconds)
              : DEFAULT_FAST_INTERVAL,
        },
        {
          name: "extended",
          attempts: retry.extended?.attempts ?? DEFAULT_EXTENDED_ATTEMPTS,
          interval:
            retry.extended?.interval_seconds != null
              ? Duration.fromSeconds(retry.extended.interval_seconds)
              : DEFAULT_EXTENDED_INTERVAL,
        },
      ],
      timeZone: config.timezone ?? DEFAULT_TIME_ZONE,
    };
  }
}
