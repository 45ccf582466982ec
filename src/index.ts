/**
 * capacity-ingest – downloads, validates and loads pipeline
 * operationally-available capacity snapshots.
 */
import { parseConfig, type Config } from "./config.js";
import { IngestPipeline } from "./core/etl.js";
import { ConnectivityError, errorMessage } from "./core/exceptions.js";
import { Scheduler, type Sleep } from "./core/scheduler.js";
import { SnapshotQueue } from "./core/snapshots.js";
import type { RunOptions, RunSummary } from "./core/types.js";
import type { DatabaseBackend } from "./db/backend.js";
import { createLogger, silentLogger, type Logger } from "./logger.js";
import { Downloader } from "./source/downloader.js";
import { UndiciHttpClient, type HttpClient } from "./source/http.js";
import type { StorageBackend } from "./storage/backend.js";
import { Uploader } from "./upload/uploader.js";
import { Validator } from "./validation/validator.js";

export { loadConfigFromEnv, parseConfig, type Config } from "./config.js";
export * from "./core/exceptions.js";
export type * from "./core/types.js";
export { SnapshotQueue, snapshotFileName, parseSnapshotFileName, CYCLES } from "./core/snapshots.js";
export { COLUMN_KEYS, EXPECTED_LABELS, normalizeColumnName } from "./core/columns.js";
export { validateCsv } from "./validation/validator.js";

export interface CapacityIngestOptions {
  storage: StorageBackend;
  db: DatabaseBackend;
  http?: HttpClient;
  sourceUrl?: string;
  timeoutMs?: number;
  daysBack?: number;
  now?: () => Date;
  logger?: Logger;
}

export class CapacityIngest {
  private storage: StorageBackend;
  private db: DatabaseBackend;
  private log: Logger;
  private pipeline: IngestPipeline;

  constructor(opts: CapacityIngestOptions) {
    this.storage = opts.storage;
    this.db = opts.db;
    this.log = opts.logger ?? silentLogger;

    this.pipeline = new IngestPipeline({
      downloader: new Downloader({
        http: opts.http ?? new UndiciHttpClient(),
        storage: this.storage,
        baseUrl: opts.sourceUrl,
        timeoutMs: opts.timeoutMs,
        now: opts.now,
        logger: this.log,
      }),
      validator: new Validator(this.storage, this.log),
      uploader: new Uploader(this.storage, this.db, this.log),
      queue: new SnapshotQueue(this.storage),
      daysBack: opts.daysBack,
      logger: this.log,
    });
  }

  /** Construct from a configuration object (validated with Zod). */
  static fromConfig(
    raw: unknown,
    overrides: { http?: HttpClient; logger?: Logger } = {},
  ): { ingest: CapacityIngest; config: Config } {
    const { config, storage, db } = parseConfig(raw);
    const ingest = new CapacityIngest({
      storage,
      db,
      http: overrides.http,
      sourceUrl: config.source.url,
      timeoutMs: config.source.timeoutMs,
      daysBack: config.pipeline.daysBack,
      logger: overrides.logger ?? createLogger(config.logLevel),
    });
    return { ingest, config };
  }

  // ------------------------------------------------------------------
  // Public API
  // ------------------------------------------------------------------

  async runOnce(options: RunOptions = {}): Promise<RunSummary> {
    return this.pipeline.runOnce(options);
  }

  /** Standalone database probe; does not run the pipeline. */
  async checkConnection(): Promise<void> {
    try {
      await this.db.ping();
    } catch (err) {
      throw new ConnectivityError(`database unreachable: ${errorMessage(err)}`);
    }
    this.log.info("database connection ok");
  }

  /** Run now, then every `intervalHours` until `signal` aborts. */
  async runForever(opts: {
    intervalHours: number;
    signal?: AbortSignal;
    run?: RunOptions;
    sleep?: Sleep;
  }): Promise<void> {
    const scheduler = new Scheduler({
      intervalHours: opts.intervalHours,
      taskName: "capacity ingest",
      sleep: opts.sleep,
      logger: this.log,
    });
    await scheduler.runForever(() => this.runOnce(opts.run), opts.signal);
  }

  async close(): Promise<void> {
    await this.db.close();
  }
}
