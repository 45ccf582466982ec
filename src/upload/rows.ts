/**
 * Pure conversion from parsed CSV rows to `tec_data` rows.
 */
import {
  STORAGE_COLUMNS,
  isFlowIndicator,
  normalizeColumnName,
  parseFlag,
  parseInteger,
} from "../core/columns.js";
import type { CapacityRecord, CycleId, SqlValue, StorageRow } from "../core/types.js";

/** A CSV row keyed by normalized column name. */
export type NormalizedRow = Record<string, string>;

/** Key each row by the normalized header label. Unknown columns are kept. */
export function normalizeRows(records: string[][]): NormalizedRow[] {
  if (records.length === 0) return [];
  const [header, ...rows] = records;
  const keys = header.map(normalizeColumnName);
  return rows.map((row) => {
    const out: NormalizedRow = {};
    keys.forEach((key, i) => {
      out[key] = row[i] ?? "";
    });
    return out;
  });
}

function text(value: string | undefined): string | null {
  const v = (value ?? "").trim();
  return v === "" ? null : v;
}

function integer(value: string | undefined): number | null {
  const v = text(value);
  if (v === null) return null;
  return parseInteger(v) ?? null;
}

function flag(value: string | undefined): boolean | null {
  const v = text(value);
  return v === null ? null : (parseFlag(v) ?? null);
}

export function decodeRecord(row: NormalizedRow, cycle: CycleId): CapacityRecord {
  const flow = text(row.flow_ind);
  return {
    loc: text(row.loc),
    locZn: text(row.loc_zn),
    locName: text(row.loc_name),
    locPurpDesc: text(row.loc_purp_desc),
    locQti: text(row.loc_qti),
    flowInd: flow !== null && isFlowIndicator(flow) ? flow : null,
    dc: integer(row.dc),
    opc: integer(row.opc),
    tsq: integer(row.tsq),
    oac: integer(row.oac),
    it: flag(row.it),
    authOverrunInd: flag(row.auth_overrun_ind),
    nomCapExceedInd: flag(row.nom_cap_exceed_ind),
    allQtyAvail: flag(row.all_qty_avail),
    qtyReason: text(row.qty_reason),
    cycle,
  };
}

export function toStorageRow(record: CapacityRecord): StorageRow {
  return {
    loc: record.loc,
    loc_zn: record.locZn,
    loc_name: record.locName,
    loc_purp_desc: record.locPurpDesc,
    loc_qti: record.locQti,
    flow_ind: record.flowInd,
    dc: record.dc,
    opc: record.opc,
    tsq: record.tsq,
    oac: record.oac,
    it: record.it,
    auth_overrun_ind: record.authOverrunInd,
    nom_cap_exceed_ind: record.nomCapExceedInd,
    all_qty_avail: record.allQtyAvail,
    qty_reason: record.qtyReason,
    cycle: record.cycle,
  };
}

export const INSERT_SQL = `INSERT INTO tec_data (${STORAGE_COLUMNS.join(", ")}) VALUES (${STORAGE_COLUMNS.map(() => "?").join(", ")})`;

export function insertParams(row: StorageRow): SqlValue[] {
  return STORAGE_COLUMNS.map((column) => row[column]);
}
