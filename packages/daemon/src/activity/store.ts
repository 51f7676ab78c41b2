import fs from "fs";
import path from "path";
import Database from "better-sqlite3";
import type { ActivityEntry, ActivityEventType } from "@gatewarden/shared";

/** SQLite mirror of the in-memory activity log. */
export class ActivityStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ":memory:") fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.init();
  }

  private init(): void {
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS activity_entries (
        id INTEGER PRIMARY KEY,
        timestamp INTEGER NOT NULL,
        type TEXT NOT NULL,
        message TEXT NOT NULL,
        details TEXT NOT NULL,
        update_count INTEGER NOT NULL DEFAULT 0
      )
    `);
  }

  insert(entry: ActivityEntry): void {
    this.db
      .prepare(
        `INSERT OR REPLACE INTO activity_entries (id, timestamp, type, message, details, update_count) VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(
        entry.id,
        entry.timestamp,
        entry.type,
        entry.message,
        JSON.stringify(entry.details),
        entry.updateCount,
      );
  }

  update(entry: ActivityEntry): void {
    this.db
      .prepare(
        `UPDATE activity_entries SET timestamp = ?, message = ?, details = ?, update_count = ? WHERE id = ?`,
      )
      .run(entry.timestamp, entry.message, JSON.stringify(entry.details), entry.updateCount, entry.id);
  }

  /** Drop every entry with an id lower than `id`. */
  deleteBefore(id: number): void {
    this.db.prepare(`DELETE FROM activity_entries WHERE id < ?`).run(id);
  }

  clear(): void {
    this.db.prepare(`DELETE FROM activity_entries`).run();
  }

  /** The most recent `limit` entries, oldest first. */
  loadRecent(limit: number): ActivityEntry[] {
    const rows = this.db
      .prepare(
        `SELECT * FROM (SELECT * FROM activity_entries ORDER BY id DESC LIMIT ?) ORDER BY id ASC`,
      )
      .all(limit) as ActivityRow[];
    return rows.map(mapRow);
  }

  close(): void {
    this.db.close();
  }
}

interface ActivityRow {
  id: number;
  timestamp: number;
  type: ActivityEventType;
  message: string;
  details: string;
  update_count: number;
}

function mapRow(row: ActivityRow): ActivityEntry {
  return {
    id: row.id,
    timestamp: row.timestamp,
    type: row.type,
    message: row.message,
    details: parseDetails(row.details),
    updateCount: row.update_count,
  };
}

function parseDetails(raw: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
  } catch {
    // keep the entry, drop unparseable details
  }
  return {};
}
