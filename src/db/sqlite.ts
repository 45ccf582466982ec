/**
 * SQLite database backend using better-sqlite3.
 */
import Database from "better-sqlite3";
import type { Database as SqliteDatabase } from "better-sqlite3";
import type { SqlValue } from "../core/types.js";
import type { DatabaseBackend } from "./backend.js";
import { SQLITE_SCHEMA_SQL } from "./schema.js";

/** SQLite has no boolean type; it binds 1/0. */
function bind(params: SqlValue[]): Array<string | number | null> {
  return params.map((p) => (typeof p === "boolean" ? (p ? 1 : 0) : p));
}

export class SQLiteBackend implements DatabaseBackend {
  private db: SqliteDatabase;

  constructor(path: string = ":memory:") {
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
  }

  async initialize(): Promise<void> {
    this.db.exec(SQLITE_SCHEMA_SQL);
  }

  async execute(sql: string, params: SqlValue[] = []): Promise<void> {
    this.db.prepare(sql).run(...bind(params));
  }

  async query<T = Record<string, unknown>>(
    sql: string,
    params: SqlValue[] = [],
  ): Promise<T[]> {
    return this.db.prepare<unknown[], T>(sql).all(...bind(params));
  }

  async queryOne<T = Record<string, unknown>>(
    sql: string,
    params: SqlValue[] = [],
  ): Promise<T | null> {
    const row = this.db.prepare<unknown[], T>(sql).get(...bind(params));
    return row ?? null;
  }

  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    this.db.exec("BEGIN");
    try {
      const result = await fn();
      this.db.exec("COMMIT");
      return result;
    } catch (err) {
      this.db.exec("ROLLBACK");
      throw err;
    }
  }

  async ping(): Promise<void> {
    this.db.prepare("SELECT 1").get();
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
