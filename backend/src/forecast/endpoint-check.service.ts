import { Inject, Injectable, Logger } from "@nestjs/common";

import type { EndpointCheckFailure } from "@tariff-monitor/domain";
import {
  describeError,
  EndpointCheckError,
  ForecastRequestError,
  parseForecastPayload,
} from "@tariff-monitor/domain";
import type { SourceSettings } from "../config/source-settings.factory";
import { SOURCE_SETTINGS } from "../config/source-settings.factory";
import { ForecastClient } from "./forecast.client";

export const SOURCE_TITLE = "Dynamic Energy Tariff";

export type EndpointCheckResult =
  | { ok: true; title: string; url: string }
  | { ok: false; reason: EndpointCheckFailure; url: string };

interface EndpointCheckDetail {
  result: EndpointCheckResult;
  message: string | null;
}

/**
 * One-shot connectivity check for a candidate source URL. No retries: every
 * failure is folded into `cannot_connect` or `invalid_data`. Upstream detail
 * stays in the log; callers only see the category.
 */
@Injectable()
export class EndpointCheckService {
  private readonly logger = new Logger(EndpointCheckService.name);

  constructor(
    @Inject(ForecastClient) private readonly client: Pick<ForecastClient, "fetchJson">,
    @Inject(SOURCE_SETTINGS) private readonly settings: Pick<SourceSettings, "url" | "timeout">,
  ) {
  }

  async validate(url: string = this.settings.url): Promise<EndpointCheckResult> {
    const {result} = await this.check(url);
    return result;
  }

  /** Throws {@link EndpointCheckError} unless the source validates. */
  async assertReachable(url?: string): Promise<void> {
    const {result, message} = await this.check(url ?? this.settings.url);
    if (!result.ok) {
      throw new EndpointCheckError(result.reason, `${result.url}: ${message ?? result.reason}`);
    }
  }

  private async check(url: string): Promise<EndpointCheckDetail> {
    try {
      const payload = await this.client.fetchJson(url, this.settings.timeout);
      parseForecastPayload(payload);
      this.logger.log(`Forecast source ${url} passed validation`);
      return {result: {ok: true, title: SOURCE_TITLE, url}, message: null};
    } catch (error) {
      const reason = this.classify(error);
      const message = describeError(error);
      this.logger.error(`Forecast source ${url} failed validation (${reason}): ${message}`);
      return {result: {ok: false, reason, url}, message};
    }
  }

  private classify(error: unknown): EndpointCheckFailure {
    // Schema failures and unexpected errors both count as invalid data.
    return error instanceof ForecastRequestError ? "cannot_connect" : "invalid_data";
  }
}
