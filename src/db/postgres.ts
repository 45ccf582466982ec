/**
 * PostgreSQL database backend using postgres-js.
 */
import postgres from "postgres";
import type { SqlValue } from "../core/types.js";
import type { DatabaseBackend } from "./backend.js";
import { POSTGRES_SCHEMA_SQL } from "./schema.js";

export interface PostgresConnectionOptions {
  host: string;
  port: number;
  database: string;
  username: string;
  password: string;
  /** Seconds to wait for a connection before failing. */
  connectTimeout?: number;
}

/** Rewrite `?` placeholders to `$1, $2, ...`. */
export function toPositional(sql: string): string {
  let n = 0;
  return sql.replace(/\?/g, () => `$${++n}`);
}

export class PostgresBackend implements DatabaseBackend {
  private sql: postgres.Sql;
  /** Connection statements go to; a reserved one inside a transaction. */
  private active: postgres.Sql;

  constructor(opts: PostgresConnectionOptions) {
    this.sql = postgres({
      host: opts.host,
      port: opts.port,
      database: opts.database,
      username: opts.username,
      password: opts.password,
      connect_timeout: opts.connectTimeout ?? 10,
      onnotice: () => {},
    });
    this.active = this.sql;
  }

  async initialize(): Promise<void> {
    await this.active.unsafe(POSTGRES_SCHEMA_SQL);
  }

  async execute(sql: string, params: SqlValue[] = []): Promise<void> {
    await this.active.unsafe(toPositional(sql), params);
  }

  async query<T = Record<string, unknown>>(
    sql: string,
    params: SqlValue[] = [],
  ): Promise<T[]> {
    return await this.active.unsafe<T[]>(toPositional(sql), params);
  }

  async queryOne<T = Record<string, unknown>>(
    sql: string,
    params: SqlValue[] = [],
  ): Promise<T | null> {
    const rows = await this.query<T>(sql, params);
    return rows[0] ?? null;
  }

  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    const conn = await this.sql.reserve();
    this.active = conn;
    try {
      await conn.unsafe("BEGIN");
      const result = await fn();
      await conn.unsafe("COMMIT");
      return result;
    } catch (err) {
      await conn.unsafe("ROLLBACK");
      throw err;
    } finally {
      this.active = this.sql;
      conn.release();
    }
  }

  async ping(): Promise<void> {
    await this.sql.unsafe("SELECT 1");
  }

  async close(): Promise<void> {
    await this.sql.end();
  }
}
