import Database from "better-sqlite3";
import type { SessionRecord } from "./types.js";
import type { SessionStorePort } from "./ports.js";
import { PrivacyError } from "./errors.js";
import { parseSessionRecord } from "./schemas.js";

interface SessionRow {
  record_json: string;
}

/**
 * Sessions in a single SQLite table, one JSON record per row.
 * Pass ":memory:" for a throwaway database, or an open handle to share one.
 */
export class SqliteSessionStore implements SessionStorePort {
  private readonly db: Database.Database;
  private readonly owned: boolean;

  constructor(pathOrDb: string | Database.Database) {
    if (typeof pathOrDb === "string") {
      this.db = new Database(pathOrDb);
      this.owned = true;
    } else {
      this.db = pathOrDb;
      this.owned = false;
    }
    if (this.db.name !== ":memory:") this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS privacy_sessions (
        session_id TEXT PRIMARY KEY,
        last_used TEXT NOT NULL,
        record_json TEXT NOT NULL
      )
    `);
  }

  async load(sessionId: string): Promise<SessionRecord | null> {
    const row = this.db
      .prepare<[string], SessionRow>("SELECT record_json FROM privacy_sessions WHERE session_id = ?")
      .get(sessionId);
    if (!row) return null;

    let json: unknown;
    try {
      json = JSON.parse(row.record_json);
    } catch (err) {
      throw new PrivacyError(`Stored session ${sessionId} is not valid JSON`, { sessionId }, { cause: err });
    }
    const parsed = parseSessionRecord(json);
    if (!parsed.ok) {
      throw new PrivacyError(`Stored session ${sessionId} is malformed: ${parsed.reason}`, { sessionId });
    }
    return parsed.record;
  }

  async save(record: SessionRecord): Promise<void> {
    this.db
      .prepare<[string, string, string]>(
        `INSERT INTO privacy_sessions (session_id, last_used, record_json) VALUES (?, ?, ?)
         ON CONFLICT(session_id) DO UPDATE SET last_used = excluded.last_used, record_json = excluded.record_json`
      )
      .run(record.session_id, record.last_used, JSON.stringify(record));
  }

  async delete(sessionId: string): Promise<boolean> {
    const info = this.db
      .prepare<[string]>("DELETE FROM privacy_sessions WHERE session_id = ?")
      .run(sessionId);
    return info.changes > 0;
  }

  async list(): Promise<string[]> {
    return this.db
      .prepare<[], { session_id: string }>("SELECT session_id FROM privacy_sessions ORDER BY session_id")
      .all()
      .map((r) => r.session_id);
  }

  /** Close the database if this store opened it. */
  close(): void {
    if (this.owned) this.db.close();
  }
}
