/**
 * Pipeline runner: download → validate → upload, communicating only through
 * the file store.
 */
import type { Downloader } from "../source/downloader.js";
import type { Uploader } from "../upload/uploader.js";
import type { Validator } from "../validation/validator.js";
import { silentLogger, type Logger } from "../logger.js";
import {
  DownloadFailedException,
  UploadFailedException,
  ValidationFailedException,
  errorMessage,
} from "./exceptions.js";
import type { SnapshotQueue } from "./snapshots.js";
import type {
  DownloadReport,
  RunOptions,
  RunSummary,
  UploadResult,
  ValidationReport,
} from "./types.js";

export const DEFAULT_DAYS_BACK = 2;

export class IngestPipeline {
  private downloader: Downloader;
  private validator: Validator;
  private uploader: Uploader;
  private queue: SnapshotQueue;
  private defaultDaysBack: number;
  private log: Logger;

  constructor(opts: {
    downloader: Downloader;
    validator: Validator;
    uploader: Uploader;
    queue: SnapshotQueue;
    daysBack?: number;
    logger?: Logger;
  }) {
    this.downloader = opts.downloader;
    this.validator = opts.validator;
    this.uploader = opts.uploader;
    this.queue = opts.queue;
    this.defaultDaysBack = opts.daysBack ?? DEFAULT_DAYS_BACK;
    this.log = (opts.logger ?? silentLogger).child({ component: "pipeline" });
  }

  /** Step 1: Fetch the trailing window into the file store. */
  async download(daysBack: number): Promise<DownloadReport> {
    try {
      return await this.downloader.download(daysBack);
    } catch (err) {
      throw new DownloadFailedException(errorMessage(err));
    }
  }

  /** Step 2: Classify every snapshot currently in the store. */
  async validate(): Promise<ValidationReport> {
    try {
      const pending = await this.queue.listPending();
      return await this.validator.validateAll(pending);
    } catch (err) {
      throw new ValidationFailedException(errorMessage(err));
    }
  }

  /** Step 3: Append the given snapshots to the database. */
  async upload(keys: readonly string[]): Promise<UploadResult> {
    try {
      return await this.uploader.upload(keys);
    } catch (err) {
      if (err instanceof UploadFailedException) throw err;
      throw new UploadFailedException(errorMessage(err));
    }
  }

  /** Run one full pass and summarise it. */
  async runOnce(options: RunOptions = {}): Promise<RunSummary> {
    const startedAt = new Date().toISOString();
    const daysBack = options.daysBack ?? this.defaultDaysBack;
    this.log.info({ ...options, daysBack }, "pipeline run started");

    let gasDays: string[] = [];
    let downloaded = 0;
    if (options.skipDownload) {
      this.log.info("download stage skipped");
    } else {
      const report = await this.download(daysBack);
      gasDays = report.gasDays;
      downloaded = report.written.length;
    }

    const validation = await this.validate();
    const withData = validation.valid.filter(
      (key) => !validation.noData.includes(key),
    );

    let upload: UploadResult = { rowsAppended: 0, filesUploaded: [], failures: [] };
    if (options.skipUpload) {
      this.log.info("upload stage skipped");
    } else {
      upload = await this.upload(withData);
    }

    const summary: RunSummary = {
      startedAt,
      finishedAt: new Date().toISOString(),
      gasDays,
      downloaded,
      valid: validation.valid.length,
      invalid: validation.invalid.length,
      noData: validation.noData.length,
      uploaded: upload.filesUploaded.length,
      rowsAppended: upload.rowsAppended,
      uploadFailures: upload.failures,
    };

    const { uploadFailures, ...counts } = summary;
    if (uploadFailures.length > 0) {
      this.log.error({ ...counts, uploadFailures }, "pipeline run finished with upload failures");
    } else {
      this.log.info(counts, "pipeline run finished");
    }
    return summary;
  }
}
