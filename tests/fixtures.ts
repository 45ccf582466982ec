/**
 * Shared test fixtures: CSV builders, a scripted HTTP client, pre-wired ingest.
 */
import { mkdtempSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { CapacityIngest } from "../src/index.js";
import { EXPECTED_LABELS } from "../src/core/columns.js";
import { SQLiteBackend } from "../src/db/sqlite.js";
import type { HttpClient, HttpResponse } from "../src/source/http.js";
import type { StorageBackend } from "../src/storage/backend.js";
import { MemoryStorage } from "../src/storage/memory.js";

// ---------------------------------------------------------------------------
// CSV fixtures
// ---------------------------------------------------------------------------

function quote(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

export function csvLine(values: readonly string[]): string {
  return values.map(quote).join(",");
}

export const HEADER_LINE = csvLine(EXPECTED_LABELS);

export const RECEIPT_ROW = [
  "70001", "Z1", "North Meter", "Receipt Meter", "M", "R",
  "1000", "900", "450", "450", "N", "N", "N", "Y", "",
];

export const DELIVERY_ROW = [
  "70002", "Z2", "South Meter", "Delivery Meter", "M", "D",
  "2000", "", "1500", "", "Y", "N", "N", "N", "Maintenance",
];

export function buildCsv(
  rows: readonly (readonly string[])[],
  header: readonly string[] = EXPECTED_LABELS,
): string {
  return [csvLine(header), ...rows.map(csvLine)].join("\r\n") + "\r\n";
}

export const VALID_CSV = buildCsv([RECEIPT_ROW, DELIVERY_ROW]);
export const EMPTY_CSV = buildCsv([]);

// ---------------------------------------------------------------------------
// Scripted HTTP client
// ---------------------------------------------------------------------------

export type Route = (req: { gasDay: string; cycle: number; url: string }) =>
  | HttpResponse
  | Error;

export function ok(body: string): HttpResponse {
  return { status: 200, ok: true, contentType: "text/csv", body };
}

export function notFound(): HttpResponse {
  return { status: 404, ok: false, contentType: "text/html", body: "Not Found" };
}

export class FakeHttpClient implements HttpClient {
  calls: Array<{ gasDay: string; cycle: number; url: string; timeoutMs: number }> = [];

  constructor(private route: Route = () => notFound()) {}

  async get(url: string, opts: { timeoutMs: number }): Promise<HttpResponse> {
    const params = new URL(url).searchParams;
    const req = {
      url,
      gasDay: params.get("gasDay") ?? "",
      cycle: Number(params.get("cycle")),
    };
    this.calls.push({ ...req, timeoutMs: opts.timeoutMs });
    const res = this.route(req);
    if (res instanceof Error) throw res;
    return res;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), "capacity-ingest-test-"));
}

/** 2024-03-10, local noon. */
export const TODAY = new Date(2024, 2, 10, 12, 0, 0);

export async function makeIngest(opts: {
  http?: HttpClient;
  storage?: StorageBackend;
  db?: SQLiteBackend;
} = {}): Promise<{ ingest: CapacityIngest; db: SQLiteBackend; storage: StorageBackend }> {
  const storage = opts.storage ?? new MemoryStorage();
  const db = opts.db ?? new SQLiteBackend(":memory:");
  const ingest = new CapacityIngest({
    storage,
    db,
    http: opts.http ?? new FakeHttpClient(),
    now: () => TODAY,
  });
  return { ingest, db, storage };
}

export async function countRows(db: SQLiteBackend): Promise<number> {
  const row = await db.queryOne<{ n: number }>("SELECT COUNT(*) AS n FROM tec_data");
  return row?.n ?? 0;
}
