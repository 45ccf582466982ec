/**
 * CSV reading helpers shared by the downloader, validator and uploader.
 */
import { parse } from "csv-parse/sync";
import { EXPECTED_LABELS, canonicalLabel } from "../core/columns.js";

/**
 * Parse delimited text into raw records. Rows keep their own length so
 * ragged rows can be reported instead of rejected by the parser.
 * Throws on malformed input (e.g. an unterminated quote).
 */
export function parseRecords(text: string, limit?: number): string[][] {
  const records: string[][] = parse(text, {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
    ...(limit !== undefined ? { to: limit } : {}),
  });
  return records;
}

export interface HeaderCheck {
  missing: string[];
  unexpected: string[];
  outOfOrder: boolean;
}

/** Compare a header row against the expected labels. */
export function checkHeader(header: readonly string[]): HeaderCheck {
  const actual = header.map(canonicalLabel);
  const expected = EXPECTED_LABELS.map(canonicalLabel);

  const missing = EXPECTED_LABELS.filter(
    (label) => !actual.includes(canonicalLabel(label)),
  );
  const unexpected = header.filter(
    (label) => !expected.includes(canonicalLabel(label)),
  );
  const outOfOrder =
    missing.length === 0 &&
    unexpected.length === 0 &&
    actual.some((label, i) => label !== expected[i]);

  return { missing, unexpected, outOfOrder };
}

export function headerMatches(header: readonly string[]): boolean {
  const { missing, unexpected, outOfOrder } = checkHeader(header);
  return (
    missing.length === 0 &&
    unexpected.length === 0 &&
    !outOfOrder &&
    header.length === EXPECTED_LABELS.length
  );
}

/** True when the payload's first record is the expected header. */
export function looksLikeCapacityCsv(text: string): boolean {
  if (text.trim() === "") return false;
  try {
    const [header] = parseRecords(text, 1);
    return header !== undefined && headerMatches(header);
  } catch {
    return false;
  }
}
