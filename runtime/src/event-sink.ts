import Database from "better-sqlite3";
import { existsSync, mkdirSync } from "fs";
import { dirname } from "path";
import { z } from "zod";
import { SinkUnavailableError, errorMessage } from "./errors.js";

export interface EventReceipt {
  status: "success";
  id: number;
  timestamp: string;
}

export interface RecordedEvent {
  id: number;
  eventType: string;
  details: Record<string, unknown>;
  timestamp: string;
}

/**
 * Durable append of lifecycle events.
 */
export interface EventSink {
  record(eventType: string, details: Record<string, unknown>): Promise<EventReceipt>;
  recent(limit: number): Promise<RecordedEvent[]>;
  close(): void;
}

const eventRowSchema = z.object({
  id: z.number().int(),
  ts: z.string(),
  event_type: z.string(),
  details: z.string(),
});

/**
 * EventSink backed by a local SQLite file (`run_events` table).
 */
export class SqliteEventSink implements EventSink {
  private constructor(
    private readonly db: Database.Database,
    private readonly now: () => Date,
  ) {}

  static create(path: string, now: () => Date = () => new Date()): SqliteEventSink {
    const dir = dirname(path);
    if (path !== ":memory:" && dir && !existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }

    const db = new Database(path);
    db.pragma("journal_mode = WAL");

    const sink = new SqliteEventSink(db, now);
    sink.initializeSchema();
    return sink;
  }

  async record(eventType: string, details: Record<string, unknown>): Promise<EventReceipt> {
    const timestamp = this.now().toISOString();
    try {
      const info = this.db
        .prepare(`INSERT INTO run_events (ts, event_type, details) VALUES (?, ?, ?)`)
        .run(timestamp, eventType, JSON.stringify(details));
      return {
        status: "success",
        id: Number(info.lastInsertRowid),
        timestamp,
      };
    } catch (error) {
      throw new SinkUnavailableError(
        "event",
        `Failed to record event ${eventType}: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  async recent(limit: number): Promise<RecordedEvent[]> {
    let rows: unknown[];
    try {
      rows = this.db
        .prepare(`SELECT id, ts, event_type, details FROM run_events ORDER BY id DESC LIMIT ?`)
        .all(Math.max(0, Math.floor(limit)));
    } catch (error) {
      throw new SinkUnavailableError("event", `Failed to read events: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    return rows.map((raw) => {
      const row = eventRowSchema.parse(raw);
      return {
        id: row.id,
        eventType: row.event_type,
        details: parseDetails(row.details),
        timestamp: row.ts,
      };
    });
  }

  close(): void {
    if (this.db.open) this.db.close();
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS run_events (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        ts TEXT NOT NULL,
        event_type TEXT NOT NULL,
        details TEXT NOT NULL DEFAULT '{}',
        created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
      );

      CREATE INDEX IF NOT EXISTS idx_run_events_type ON run_events(event_type);
    `);
  }
}

function parseDetails(raw: string): Record<string, unknown> {
  const parsed = z.record(z.unknown()).safeParse(JSON.parse(raw));
  return parsed.success ? parsed.data : { value: raw };
}
