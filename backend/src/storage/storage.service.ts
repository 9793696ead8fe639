import { mkdirSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { Injectable, Logger, OnModuleDestroy } from "@nestjs/common";
import type { Database } from "better-sqlite3";
import DatabaseConstructor from "better-sqlite3";

import type { ForecastPayload } from "@tariff-monitor/domain";
import { parseForecastPayload } from "@tariff-monitor/domain";

export const STORAGE_PATH_ENV = "TARIFF_MONITOR_STORAGE_PATH";
const IN_MEMORY = ":memory:";

export interface SnapshotRecord {
  id: number;
  fetchedAt: string;
  payload: ForecastPayload;
}

/** Keeps exactly one row: the payload of the most recent successful fetch. */
@Injectable()
export class StorageService implements OnModuleDestroy {
  private readonly dbPath: string;
  private readonly db: Database;
  private readonly logger = new Logger(StorageService.name);

  constructor() {
    const override = process.env[STORAGE_PATH_ENV]?.trim();
    if (override === IN_MEMORY) {
      this.dbPath = IN_MEMORY;
    } else {
      this.dbPath = override && override.length > 0
        ? resolve(process.cwd(), override)
        : join(process.cwd(), "..", "data", "db", "tariff-monitor.sqlite");
      mkdirSync(dirname(this.dbPath), {recursive: true});
    }
    this.db = new DatabaseConstructor(this.dbPath);
    if (this.dbPath !== IN_MEMORY) {
      this.db.pragma("journal_mode = WAL");
    }
    this.migrate();
    this.logger.log(`Storage initialised at ${this.dbPath}`);
  }

  onModuleDestroy(): void {
    this.db.close();
    this.logger.verbose("Storage connection closed");
  }

  replaceSnapshot(fetchedAt: string, payload: ForecastPayload): void {
    this.logger.log(`Replacing stored forecast with snapshot fetched at ${fetchedAt}`);
    const deleteStmt = this.db.prepare("DELETE FROM snapshots");
    const insertStmt = this.db.prepare("INSERT INTO snapshots (fetched_at, payload) VALUES (?, ?)");
    const txn = this.db.transaction(() => {
      deleteStmt.run();
      insertStmt.run(fetchedAt, JSON.stringify(payload));
    });
    txn();
  }

  getLatestSnapshot(): SnapshotRecord | null {
    this.logger.verbose("Fetching latest forecast snapshot from storage");
    const stmt = this.db.prepare("SELECT id, fetched_at, payload FROM snapshots ORDER BY fetched_at DESC LIMIT 1");
    const row = stmt.get() as { id: number; fetched_at: string; payload: string } | undefined;
    if (!row) {
      return null;
    }
    return {
      id: row.id,
      fetchedAt: row.fetched_at,
      payload: parseForecastPayload(JSON.parse(row.payload)),
    };
  }

  private migrate(): void {
    this.logger.verbose("Ensuring storage schema is up to date");
    this.db.exec(`
        CREATE TABLE IF NOT EXISTS snapshots
        (
            id         INTEGER PRIMARY KEY AUTOINCREMENT,
            fetched_at TEXT NOT NULL,
            payload    TEXT NOT NULL
        );
    `);
  }
}
