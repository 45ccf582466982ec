/**
 * Column catalogue for the operationally-available capacity CSV and the
 * `tec_data` table it is loaded into.
 */

/** Header labels published by the source, in order. */
export const EXPECTED_LABELS = [
  "Loc",
  "Loc Zn",
  "Loc Name",
  "Loc Purp Desc",
  "Loc/QTI",
  "Flow Ind",
  "DC",
  "OPC",
  "TSQ",
  "OAC",
  "IT",
  "Auth Overrun Ind",
  "Nom Cap Exceed Ind",
  "All Qty Avail",
  "Qty Reason",
] as const;

export type SourceLabel = (typeof EXPECTED_LABELS)[number];

export const NUMERIC_LABELS: readonly SourceLabel[] = ["DC", "OPC", "TSQ", "OAC"];

export const FLAG_LABELS: readonly SourceLabel[] = [
  "IT",
  "Auth Overrun Ind",
  "Nom Cap Exceed Ind",
  "All Qty Avail",
];

export const FLOW_LABEL: SourceLabel = "Flow Ind";

/** D = Delivery, R = Receipt. */
export const FLOW_CODES = ["D", "R"] as const;
export type FlowIndicator = (typeof FLOW_CODES)[number];

/** Range of the `INTEGER` columns (32-bit signed on Postgres). */
export const INTEGER_MIN = -2_147_483_648;
export const INTEGER_MAX = 2_147_483_647;

const INTEGER_PATTERN = /^[+-]?\d+$/;

/** Decimal integer within the `INTEGER` column range, else undefined. */
export function parseInteger(value: string): number | undefined {
  if (!INTEGER_PATTERN.test(value)) return undefined;
  const n = Number(value);
  return n >= INTEGER_MIN && n <= INTEGER_MAX ? n : undefined;
}

export const FLAG_VALUES: ReadonlyMap<string, boolean> = new Map([
  ["Y", true],
  ["N", false],
]);

/** Y → true, N → false, anything else → undefined. */
export function parseFlag(value: string): boolean | undefined {
  return FLAG_VALUES.get(value);
}

/**
 * Map a free-text source label onto a storage column key: trimmed,
 * lower-cased, runs of whitespace or slashes become one underscore.
 */
export function normalizeColumnName(label: string): string {
  return label.trim().toLowerCase().replace(/[\s/]+/g, "_");
}

/** Comparison form for header labels (case and whitespace insensitive). */
export function canonicalLabel(label: string): string {
  return label.trim().replace(/\s+/g, " ").toLowerCase();
}

/** Explicit label → column key table, e.g. "Loc/QTI" → "loc_qti". */
export const COLUMN_KEYS = {
  "Loc": "loc",
  "Loc Zn": "loc_zn",
  "Loc Name": "loc_name",
  "Loc Purp Desc": "loc_purp_desc",
  "Loc/QTI": "loc_qti",
  "Flow Ind": "flow_ind",
  "DC": "dc",
  "OPC": "opc",
  "TSQ": "tsq",
  "OAC": "oac",
  "IT": "it",
  "Auth Overrun Ind": "auth_overrun_ind",
  "Nom Cap Exceed Ind": "nom_cap_exceed_ind",
  "All Qty Avail": "all_qty_avail",
  "Qty Reason": "qty_reason",
} as const satisfies Record<SourceLabel, string>;

/** Insert order for `tec_data`, excluding the surrogate id. */
export const STORAGE_COLUMNS = [
  "loc",
  "loc_zn",
  "loc_name",
  "loc_purp_desc",
  "loc_qti",
  "flow_ind",
  "dc",
  "opc",
  "tsq",
  "oac",
  "it",
  "auth_overrun_ind",
  "nom_cap_exceed_ind",
  "all_qty_avail",
  "qty_reason",
  "cycle",
] as const;

export function isFlowIndicator(value: string): value is FlowIndicator {
  return FLOW_CODES.some((code) => code === value);
}
