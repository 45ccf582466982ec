/**
 * Snapshot validation: classifies a CSV file as valid, valid-but-empty or
 * invalid, with every failing check reported. Files are never modified.
 */
import {
  EXPECTED_LABELS,
  FLAG_LABELS,
  FLOW_LABEL,
  NUMERIC_LABELS,
  canonicalLabel,
  isFlowIndicator,
  parseFlag,
  parseInteger,
  type SourceLabel,
} from "../core/columns.js";
import { errorMessage } from "../core/exceptions.js";
import type { ValidationReport, ValidationResult } from "../core/types.js";
import { silentLogger, type Logger } from "../logger.js";
import { readText, type StorageBackend } from "../storage/backend.js";
import { checkHeader, parseRecords } from "./csv.js";

type Verdict = Omit<ValidationResult, "key">;

/** Positions of the expected columns that are present in `header`. */
function locateColumns(
  header: readonly string[],
  labels: readonly SourceLabel[],
): Array<{ label: SourceLabel; index: number }> {
  const canonical = header.map(canonicalLabel);
  return labels
    .map((label) => ({ label, index: canonical.indexOf(canonicalLabel(label)) }))
    .filter((c) => c.index >= 0);
}

export function validateCsv(text: string): Verdict {
  let records: string[][];
  try {
    records = parseRecords(text);
  } catch {
    return { valid: false, noData: false, rowCount: 0, reasons: ["malformed CSV"] };
  }

  if (records.length === 0) {
    return { valid: false, noData: false, rowCount: 0, reasons: ["missing header row"] };
  }

  const [header, ...rows] = records;
  const reasons: string[] = [];

  const { missing, unexpected, outOfOrder } = checkHeader(header);
  if (missing.length > 0) {
    reasons.push(`missing columns: ${missing.join(", ")}`);
  }
  if (unexpected.length > 0) {
    reasons.push(`unexpected columns: ${unexpected.join(", ")}`);
  }
  if (
    missing.length === 0 &&
    unexpected.length === 0 &&
    header.length !== EXPECTED_LABELS.length
  ) {
    reasons.push(
      `expected ${EXPECTED_LABELS.length} columns, found ${header.length}`,
    );
  } else if (outOfOrder) {
    reasons.push("columns out of order");
  }

  const numeric = locateColumns(header, NUMERIC_LABELS);
  const flags = locateColumns(header, FLAG_LABELS);
  const [flow] = locateColumns(header, [FLOW_LABEL]);

  rows.forEach((row, i) => {
    const n = i + 1;
    if (row.length !== header.length) {
      reasons.push(
        `row ${n}: expected ${header.length} columns, found ${row.length}`,
      );
    }

    for (const { label, index } of numeric) {
      const value = (row[index] ?? "").trim();
      if (value !== "" && parseInteger(value) === undefined) {
        reasons.push(`row ${n}: column "${label}" value "${value}" is not an integer`);
      }
    }

    if (flow) {
      const value = (row[flow.index] ?? "").trim();
      if (value !== "" && !isFlowIndicator(value)) {
        reasons.push(
          `row ${n}: column "${flow.label}" value "${value}" is not a known flow indicator`,
        );
      }
    }

    for (const { label, index } of flags) {
      const value = (row[index] ?? "").trim();
      if (value !== "" && parseFlag(value) === undefined) {
        reasons.push(`row ${n}: column "${label}" value "${value}" is not a Y/N flag`);
      }
    }
  });

  const valid = reasons.length === 0;
  return { valid, noData: valid && rows.length === 0, rowCount: rows.length, reasons };
}

export class Validator {
  private log: Logger;

  constructor(
    private readonly storage: StorageBackend,
    logger: Logger = silentLogger,
  ) {
    this.log = logger.child({ component: "validator" });
  }

  async validate(key: string): Promise<ValidationResult> {
    let text: string;
    try {
      text = await readText(this.storage, key);
    } catch (err) {
      return {
        key,
        valid: false,
        noData: false,
        rowCount: 0,
        reasons: [`unreadable file: ${errorMessage(err)}`],
      };
    }
    return { key, ...validateCsv(text) };
  }

  async validateAll(keys: readonly string[]): Promise<ValidationReport> {
    const report: ValidationReport = { results: [], valid: [], noData: [], invalid: [] };

    for (const key of keys) {
      const result = await this.validate(key);
      report.results.push(result);

      if (!result.valid) {
        report.invalid.push(key);
        this.log.warn({ key, reasons: result.reasons }, "snapshot failed validation");
      } else if (result.noData) {
        report.valid.push(key);
        report.noData.push(key);
        this.log.info({ key }, "snapshot has no data rows");
      } else {
        report.valid.push(key);
        this.log.debug({ key, rows: result.rowCount }, "snapshot valid");
      }
    }

    this.log.info(
      {
        checked: keys.length,
        valid: report.valid.length,
        invalid: report.invalid.length,
        noData: report.noData.length,
      },
      "validation complete",
    );
    return report;
  }
}
