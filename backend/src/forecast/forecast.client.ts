import { Inject, Injectable, Logger } from "@nestjs/common";

import type { Duration, ForecastSnapshot } from "@tariff-monitor/domain";
import {
  describeError,
  ForecastRequestError,
  ForecastValidationError,
  parseForecastSnapshot,
  RefreshCancelledError,
} from "@tariff-monitor/domain";
import type { SourceSettings } from "../config/source-settings.factory";
import { SOURCE_SETTINGS } from "../config/source-settings.factory";

/** One fetch-and-validate attempt against the configured source. */
export interface ForecastSource {
  fetchSnapshot(signal?: AbortSignal): Promise<ForecastSnapshot>;
}

@Injectable()
export class ForecastClient implements ForecastSource {
  private readonly logger = new Logger(ForecastClient.name);

  constructor(@Inject(SOURCE_SETTINGS) private readonly settings: SourceSettings) {
  }

  async fetchSnapshot(signal?: AbortSignal): Promise<ForecastSnapshot> {
    const payload = await this.fetchJson(this.settings.url, this.settings.timeout, signal);
    const snapshot = parseForecastSnapshot(payload, new Date().toISOString());
    this.logger.verbose(
      `Forecast parsed: current=${snapshot.currentPrice}, days=${snapshot.days.map((day) => day.date).join(",") || "none"}`,
    );
    return snapshot;
  }

  /**
   * Single bounded GET. Transport problems and non-2xx statuses surface as
   * {@link ForecastRequestError}, an unreadable body as
   * {@link ForecastValidationError}, and an abort from `signal` as
   * {@link RefreshCancelledError}.
   */
  async fetchJson(url: string, timeout: Duration, signal?: AbortSignal): Promise<unknown> {
    if (signal?.aborted) {
      throw new RefreshCancelledError();
    }
    this.logger.verbose(`GET ${url}`);
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeout.milliseconds);
    const forwardAbort = (): void => controller.abort();
    signal?.addEventListener("abort", forwardAbort, {once: true});

    try {
      let response: Response;
      try {
        response = await fetch(url, {signal: controller.signal, headers: {Accept: "application/json"}});
      } catch (error) {
        throw this.classifyTransportError(url, timeout, error, controller.signal, signal);
      }
      if (!response.ok) {
        throw new ForecastRequestError(`HTTP ${response.status} ${response.statusText}`.trim(), response.status);
      }
      try {
        const body: unknown = await response.json();
        return body;
      } catch (error) {
        if (controller.signal.aborted) {
          throw this.classifyTransportError(url, timeout, error, controller.signal, signal);
        }
        throw new ForecastValidationError([`response body is not JSON (${describeError(error)})`]);
      }
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", forwardAbort);
    }
  }

  private classifyTransportError(
    url: string,
    timeout: Duration,
    error: unknown,
    requestSignal: AbortSignal,
    callerSignal?: AbortSignal,
  ): Error {
    if (callerSignal?.aborted) {
      return new RefreshCancelledError();
    }
    if (requestSignal.aborted) {
      return new ForecastRequestError(`Request to ${url} timed out after ${timeout.toString()}`, null, {cause: error});
    }
    return new ForecastRequestError(`Request to ${url} failed: ${describeError(error)}`, null, {cause: error});
  }
}
