/**
 * Capacity snapshot downloader.
 *
 * Walks every (gas day, cycle) pair in a trailing window, one request at a
 * time, and persists the payloads that carry capacity data. A failed pair
 * is logged and skipped; it never stops the walk.
 */
import { errorMessage } from "../core/exceptions.js";
import {
  CYCLE_IDS,
  cycleName,
  formatGasDay,
  formatQueryDate,
  gasDayWindow,
  snapshotFileName,
} from "../core/snapshots.js";
import type {
  CycleId,
  DownloadAttempt,
  DownloadReport,
} from "../core/types.js";
import { silentLogger, type Logger } from "../logger.js";
import type { StorageBackend } from "../storage/backend.js";
import { looksLikeCapacityCsv } from "../validation/csv.js";
import type { HttpClient } from "./http.js";

export const DEFAULT_SOURCE_URL =
  "https://twtransfer.energytransfer.com/ipost/capacity/operationally-available";

export interface DownloaderOptions {
  http: HttpClient;
  storage: StorageBackend;
  baseUrl?: string;
  timeoutMs?: number;
  /** Clock used to anchor the window; defaults to the current time. */
  now?: () => Date;
  logger?: Logger;
}

export function buildSnapshotUrl(
  baseUrl: string,
  gasDay: Date,
  cycle: CycleId,
): string {
  const params = new URLSearchParams({
    f: "csv",
    extension: "csv",
    asset: "TW",
    gasDay: formatQueryDate(gasDay),
    cycle: String(cycle),
    searchType: "NOM",
    searchString: "",
    locType: "ALL",
    locZone: "ALL",
  });
  return `${baseUrl}?${params.toString()}`;
}

export class Downloader {
  private http: HttpClient;
  private storage: StorageBackend;
  private baseUrl: string;
  private timeoutMs: number;
  private now: () => Date;
  private log: Logger;

  constructor(opts: DownloaderOptions) {
    this.http = opts.http;
    this.storage = opts.storage;
    this.baseUrl = opts.baseUrl ?? DEFAULT_SOURCE_URL;
    this.timeoutMs = opts.timeoutMs ?? 30_000;
    this.now = opts.now ?? (() => new Date());
    this.log = (opts.logger ?? silentLogger).child({ component: "downloader" });
  }

  /** Fetch the window and return the keys written. */
  async fetchWindow(daysBack: number): Promise<string[]> {
    const report = await this.download(daysBack);
    return report.written;
  }

  /** Fetch the window, reporting the outcome of every attempt. */
  async download(daysBack: number): Promise<DownloadReport> {
    const dates = gasDayWindow(this.now(), daysBack);
    const report: DownloadReport = {
      gasDays: dates.map(formatGasDay),
      attempts: [],
      written: [],
    };

    this.log.info({ gasDays: report.gasDays }, "starting download");

    for (const date of dates) {
      for (const cycle of CYCLE_IDS) {
        const attempt = await this.fetchSnapshot(date, cycle);
        report.attempts.push(attempt);
        if (attempt.outcome === "accepted" && attempt.key) {
          report.written.push(attempt.key);
        }
      }
    }

    this.log.info(
      { attempted: report.attempts.length, downloaded: report.written.length },
      "download complete",
    );
    return report;
  }

  private async fetchSnapshot(date: Date, cycle: CycleId): Promise<DownloadAttempt> {
    const gasDay = formatGasDay(date);
    const ctx = { gasDay, cycle, cycleName: cycleName(cycle) };
    const url = buildSnapshotUrl(this.baseUrl, date, cycle);

    let body: string;
    try {
      const res = await this.http.get(url, { timeoutMs: this.timeoutMs });
      if (!res.ok) {
        this.log.error({ ...ctx, status: res.status }, "snapshot request failed");
        return { gasDay, cycle, outcome: "failed", error: `HTTP ${res.status}` };
      }
      body = res.body;
    } catch (err) {
      this.log.error({ ...ctx, err: errorMessage(err) }, "snapshot request failed");
      return { gasDay, cycle, outcome: "failed", error: errorMessage(err) };
    }

    if (!looksLikeCapacityCsv(body)) {
      this.log.info(ctx, "no data available");
      return { gasDay, cycle, outcome: "no_data" };
    }

    const key = snapshotFileName({ gasDay, cycle });
    try {
      await this.storage.write(key, body);
    } catch (err) {
      this.log.error({ ...ctx, key, err: errorMessage(err) }, "failed to save snapshot");
      return { gasDay, cycle, outcome: "failed", error: errorMessage(err) };
    }

    this.log.info({ ...ctx, key }, "snapshot saved");
    return { gasDay, cycle, outcome: "accepted", key };
  }
}
