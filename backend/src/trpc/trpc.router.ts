import { Inject, Injectable } from "@nestjs/common";
import { initTRPC, TRPCError } from "@trpc/server";
import { z } from "zod";

import { EndpointCheckService } from "../forecast/endpoint-check.service";
import type { RefreshOutcome } from "../forecast/forecast-refresh.service";
import { RefreshSchedulerService } from "../forecast/refresh-scheduler.service";
import { PriceStateService } from "../price/price-state.service";

export interface TrpcContext {
  priceState: PriceStateService;
  scheduler: Pick<RefreshSchedulerService, "refreshNow">;
  endpointCheck: Pick<EndpointCheckService, "validate">;
}

export interface RefreshResult {
  started: boolean;
  status: RefreshOutcome["status"] | null;
  attempts: number;
  fetched_at: string | null;
  error: string | null;
}

const validateSourceInput = z.object({
  url: z.string().trim().url(),
});

const t = initTRPC.context<TrpcContext>().create();

function toRefreshResult(outcome: RefreshOutcome | null): RefreshResult {
  if (!outcome) {
    return {started: false, status: null, attempts: 0, fetched_at: null, error: null};
  }
  switch (outcome.status) {
    case "fresh":
      return {started: true, status: "fresh", attempts: outcome.attempts, fetched_at: outcome.snapshot.fetchedAt, error: null};
    case "stale":
      return {
        started: true,
        status: "stale",
        attempts: outcome.attempts,
        fetched_at: outcome.snapshot.fetchedAt,
        error: outcome.error.message,
      };
    case "failed":
      return {started: true, status: "failed", attempts: outcome.attempts, fetched_at: null, error: outcome.error.message};
  }
}

export const appRouter = t.router({
  tariff: t.router({
    state: t.procedure.query(({ctx}) => ctx.priceState.getState()),
    currentPrice: t.procedure.query(({ctx}) => ctx.priceState.getCurrentPrice()),
    remaining: t.procedure.query(({ctx}) => ctx.priceState.getRemaining()),
    schedule: t.procedure.query(({ctx}) => ctx.priceState.getSchedule()),
    status: t.procedure.query(({ctx}) => ctx.priceState.getStatus()),
    refresh: t.procedure.mutation(async ({ctx}) => {
      try {
        return toRefreshResult(await ctx.scheduler.refreshNow());
      } catch (error) {
        throw new TRPCError({code: "INTERNAL_SERVER_ERROR", message: "Forecast refresh failed", cause: error});
      }
    }),
    validateSource: t.procedure
      .input(validateSourceInput)
      .mutation(({ctx, input}) => ctx.endpointCheck.validate(input.url)),
  }),
});

export type AppRouter = typeof appRouter;

@Injectable()
export class TrpcRouter {
  readonly router = appRouter;

  constructor(
    @Inject(PriceStateService) private readonly priceState: PriceStateService,
    @Inject(RefreshSchedulerService) private readonly scheduler: RefreshSchedulerService,
    @Inject(EndpointCheckService) private readonly endpointCheck: EndpointCheckService,
  ) {
  }

  createContext(): TrpcContext {
    return {
      priceState: this.priceState,
      scheduler: this.scheduler,
      endpointCheck: this.endpointCheck,
    };
  }
}
