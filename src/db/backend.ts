/**
 * Abstract database backend interface.
 *
 * All implementations use raw SQL with `?` placeholders — no ORM.
 */
import type { SqlValue } from "../core/types.js";

export interface DatabaseBackend {
  /** Create the `tec_data` table if it does not exist. */
  initialize(): Promise<void>;

  /** Execute a write statement (INSERT, UPDATE, DELETE). */
  execute(sql: string, params?: SqlValue[]): Promise<void>;

  /** Run a SELECT and return all matching rows. */
  query<T = Record<string, unknown>>(sql: string, params?: SqlValue[]): Promise<T[]>;

  /** Run a SELECT and return the first row, or null. */
  queryOne<T = Record<string, unknown>>(
    sql: string,
    params?: SqlValue[],
  ): Promise<T | null>;

  /** Execute `fn` inside a transaction. */
  transaction<T>(fn: () => Promise<T>): Promise<T>;

  /** Round-trip a trivial query; rejects when the store is unreachable. */
  ping(): Promise<void>;

  /** Close the connection / release resources. */
  close(): Promise<void>;
}
