import { Inject, Injectable, Logger, OnModuleInit } from "@nestjs/common";

import type { ForecastSnapshot } from "@tariff-monitor/domain";
import { describeError, snapshotFromPayload, snapshotToPayload } from "@tariff-monitor/domain";
import { StorageService } from "../storage/storage.service";
import type { RefreshOutcome } from "./forecast-refresh.service";

export interface SourceStatus {
  available: boolean;
  stale: boolean;
  last_error: string | null;
  last_attempt_at: string | null;
  last_attempts: number;
}

/** What a reader sees: one snapshot reference and the status it was published with. */
export interface StoreView {
  snapshot: ForecastSnapshot | null;
  status: SourceStatus;
}

@Injectable()
export class SnapshotStoreService implements OnModuleInit {
  private readonly logger = new Logger(SnapshotStoreService.name);
  private view: StoreView = {
    snapshot: null,
    status: {available: false, stale: false, last_error: null, last_attempt_at: null, last_attempts: 0},
  };

  constructor(@Inject(StorageService) private readonly storage: StorageService) {
  }

  /**
   * Loads the persisted snapshot as a fallback for the retry controller. The
   * source stays unavailable until the first refresh publishes an outcome.
   */
  onModuleInit(): void {
    try {
      const record = this.storage.getLatestSnapshot();
      if (!record) {
        this.logger.verbose("No stored forecast found");
        return;
      }
      const snapshot = snapshotFromPayload(record.payload, record.fetchedAt);
      this.view = {...this.view, snapshot};
      this.logger.log(`Restored stored forecast fetched at ${record.fetchedAt}`);
    } catch (error) {
      this.logger.warn(`Ignoring unreadable stored forecast: ${describeError(error)}`);
    }
  }

  getSnapshot(): ForecastSnapshot | null {
    return this.view.snapshot;
  }

  read(): StoreView {
    return this.view;
  }

  publish(outcome: RefreshOutcome, at: Date = new Date()): void {
    const attemptAt = at.toISOString();
    switch (outcome.status) {
      case "fresh":
        this.view = {
          snapshot: outcome.snapshot,
          status: {available: true, stale: false, last_error: null, last_attempt_at: attemptAt, last_attempts: outcome.attempts},
        };
        try {
          this.storage.replaceSnapshot(outcome.snapshot.fetchedAt, snapshotToPayload(outcome.snapshot));
        } catch (error) {
          // The in-memory view already serves the new snapshot; only the restart fallback is lost.
          this.logger.warn(`Failed to persist forecast snapshot: ${describeError(error)}`);
        }
        return;
      case "stale":
        this.view = {
          snapshot: outcome.snapshot,
          status: {
            available: true,
            stale: true,
            last_error: outcome.error.message,
            last_attempt_at: attemptAt,
            last_attempts: outcome.attempts,
          },
        };
        return;
      case "failed":
        this.view = {
          snapshot: this.view.snapshot,
          status: {
            available: false,
            stale: false,
            last_error: outcome.error.message,
            last_attempt_at: attemptAt,
            last_attempts: outcome.attempts,
          },
        };
        return;
    }
  }
}
