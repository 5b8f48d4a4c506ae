import Database from "better-sqlite3";
import dayjs from "dayjs";
import * as fs from "fs";
import * as path from "path";
import { JobApplication, RecentApplication } from "../types";
import { logger } from "../utils/logger";

const IN_MEMORY = ":memory:";

interface RecentRow {
  company: string;
  position: string;
  date_applied: string;
  confidence: number;
  processed_at: string;
}

/**
 * Remembers which emails were handled and which applications were already
 * recorded. Each write is committed immediately so a crash mid-run does not
 * cause re-processing.
 */
export class DedupeStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== IN_MEMORY) {
      fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }

    this.db = new Database(dbPath);
    this.initializeSchema();
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS processed_emails (
        email_id TEXT PRIMARY KEY,
        company TEXT NOT NULL,
        position TEXT NOT NULL,
        date_applied TEXT NOT NULL,
        confidence REAL NOT NULL,
        source TEXT,
        processed_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
      );

      CREATE INDEX IF NOT EXISTS idx_company_position_date
        ON processed_emails (company, position, date_applied);
    `);

    logger.debug("Dedupe database initialized");
  }

  isProcessed(emailId: string): boolean {
    const row = this.db
      .prepare<[string], { found: number }>(
        "SELECT 1 AS found FROM processed_emails WHERE email_id = ?"
      )
      .get(emailId);
    return row !== undefined;
  }

  /**
   * Same company and position (case-insensitive) recorded within a day of
   * `dateApplied`.
   */
  isDuplicate(company: string, position: string, dateApplied: string): boolean {
    const day = dayjs(dateApplied);
    const before = day.subtract(1, "day").format("YYYY-MM-DD");
    const after = day.add(1, "day").format("YYYY-MM-DD");

    const row = this.db
      .prepare<[string, string, string, string], { found: number }>(
        `SELECT 1 AS found FROM processed_emails
         WHERE LOWER(company) = LOWER(?)
           AND LOWER(position) = LOWER(?)
           AND date_applied BETWEEN ? AND ?`
      )
      .get(company, position, before, after);
    return row !== undefined;
  }

  markProcessed(emailId: string, app: JobApplication): void {
    this.db
      .prepare(
        `INSERT OR REPLACE INTO processed_emails
         (email_id, company, position, date_applied, confidence, source)
         VALUES (?, ?, ?, ?, ?, ?)`
      )
      .run(
        emailId,
        app.company,
        app.position,
        app.dateApplied,
        app.confidence,
        app.source ?? null
      );

    logger.debug(`Marked email ${emailId} as processed`);
  }

  getProcessedCount(): number {
    const row = this.db
      .prepare<[], { total: number }>(
        "SELECT COUNT(*) AS total FROM processed_emails"
      )
      .get();
    return row?.total ?? 0;
  }

  getRecentApplications(limit = 10): RecentApplication[] {
    return this.db
      .prepare<[number], RecentRow>(
        `SELECT company, position, date_applied, confidence, processed_at
         FROM processed_emails
         ORDER BY processed_at DESC, rowid DESC
         LIMIT ?`
      )
      .all(limit)
      .map((row) => ({
        company: row.company,
        position: row.position,
        dateApplied: row.date_applied,
        confidence: row.confidence,
        processedAt: row.processed_at,
      }));
  }

  close(): void {
    this.db.close();
  }
}
