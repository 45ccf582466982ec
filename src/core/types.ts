/**
 * Pipeline data types.
 */
import type { FlowIndicator } from "./columns.js";

/** Publication slot ids used by the source. */
export type CycleId = 0 | 1 | 3 | 4 | 5 | 7;

/** One (gas-day, cycle) payload. */
export interface Snapshot {
  /** Local calendar date the capacity applies to, as YYYYMMDD. */
  gasDay: string;
  cycle: CycleId;
}

/** One row of pipeline capacity data after decoding. */
export interface CapacityRecord {
  loc: string | null;
  locZn: string | null;
  locName: string | null;
  locPurpDesc: string | null;
  locQti: string | null;
  flowInd: FlowIndicator | null;
  dc: number | null;
  opc: number | null;
  tsq: number | null;
  oac: number | null;
  it: boolean | null;
  authOverrunInd: boolean | null;
  nomCapExceedInd: boolean | null;
  allQtyAvail: boolean | null;
  qtyReason: string | null;
  cycle: CycleId;
}

/** Primitive values the database backends bind. */
export type SqlValue = string | number | boolean | null;

/** A `tec_data` row ready for insertion, keyed by column name. */
export type StorageRow = Record<
  | "loc"
  | "loc_zn"
  | "loc_name"
  | "loc_purp_desc"
  | "loc_qti"
  | "flow_ind"
  | "dc"
  | "opc"
  | "tsq"
  | "oac"
  | "it"
  | "auth_overrun_ind"
  | "nom_cap_exceed_ind"
  | "all_qty_avail"
  | "qty_reason"
  | "cycle",
  SqlValue
>;

/** Verdict for one snapshot file. */
export interface ValidationResult {
  key: string;
  valid: boolean;
  /** Header-only file: valid, but nothing to upload. */
  noData: boolean;
  rowCount: number;
  reasons: string[];
}

export interface ValidationReport {
  results: ValidationResult[];
  valid: string[];
  noData: string[];
  invalid: string[];
}

export type DownloadOutcome = "accepted" | "no_data" | "failed";

export interface DownloadAttempt extends Snapshot {
  outcome: DownloadOutcome;
  key?: string;
  error?: string;
}

export interface DownloadReport {
  gasDays: string[];
  attempts: DownloadAttempt[];
  written: string[];
}

export interface UploadFailure {
  key: string;
  error: string;
}

export interface UploadResult {
  rowsAppended: number;
  filesUploaded: string[];
  failures: UploadFailure[];
}

/** Options for a single pipeline pass. */
export interface RunOptions {
  skipDownload?: boolean;
  skipUpload?: boolean;
  daysBack?: number;
}

/** Result returned from runOnce(). */
export interface RunSummary {
  startedAt: string;
  finishedAt: string;
  gasDays: string[];
  downloaded: number;
  valid: number;
  invalid: number;
  noData: number;
  uploaded: number;
  rowsAppended: number;
  uploadFailures: UploadFailure[];
}
