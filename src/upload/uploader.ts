/**
 * Appends validated snapshot files to `tec_data`.
 *
 * Uploads are purely additive: re-uploading a file appends its rows again.
 * Each file goes in its own transaction, so a failure rolls back only that
 * file and earlier files stay committed.
 */
import { UploadFailedException, errorMessage } from "../core/exceptions.js";
import { parseSnapshotFileName } from "../core/snapshots.js";
import type { UploadResult } from "../core/types.js";
import type { DatabaseBackend } from "../db/backend.js";
import { silentLogger, type Logger } from "../logger.js";
import { readText, type StorageBackend } from "../storage/backend.js";
import { parseRecords } from "../validation/csv.js";
import {
  INSERT_SQL,
  decodeRecord,
  insertParams,
  normalizeRows,
  toStorageRow,
} from "./rows.js";

export class Uploader {
  private tableReady = false;
  private log: Logger;

  constructor(
    private readonly storage: StorageBackend,
    private readonly db: DatabaseBackend,
    logger: Logger = silentLogger,
  ) {
    this.log = logger.child({ component: "uploader" });
  }

  /** Create the target table if it does not exist yet. */
  async ensureTable(): Promise<void> {
    if (this.tableReady) return;
    try {
      await this.db.initialize();
    } catch (err) {
      throw new UploadFailedException(`cannot create table: ${errorMessage(err)}`);
    }
    this.tableReady = true;
  }

  async upload(keys: readonly string[]): Promise<UploadResult> {
    const result: UploadResult = { rowsAppended: 0, filesUploaded: [], failures: [] };
    if (keys.length === 0) return result;

    await this.ensureTable();

    for (const key of keys) {
      try {
        const count = await this.uploadFile(key);
        result.rowsAppended += count;
        result.filesUploaded.push(key);
        this.log.info({ key, rows: count }, "snapshot uploaded");
      } catch (err) {
        result.failures.push({ key, error: errorMessage(err) });
        this.log.error({ key, err: errorMessage(err) }, "snapshot upload failed");
      }
    }

    return result;
  }

  /** Append one file's rows; returns the number of rows inserted. */
  async uploadFile(key: string): Promise<number> {
    const snapshot = parseSnapshotFileName(key);
    if (!snapshot) {
      throw new Error(`cannot determine cycle from file name: ${key}`);
    }

    const rows = normalizeRows(parseRecords(await readText(this.storage, key)))
      .map((row) => toStorageRow(decodeRecord(row, snapshot.cycle)));

    return this.db.transaction(async () => {
      for (const row of rows) {
        await this.db.execute(INSERT_SQL, insertParams(row));
      }
      return rows.length;
    });
  }
}
