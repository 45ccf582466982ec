/**
 * Snapshot naming, gas-day enumeration and the file-store work list.
 */
import type { StorageBackend } from "../storage/backend.js";
import type { CycleId, Snapshot } from "./types.js";

// ---------------------------------------------------------------------------
// Cycles
// ---------------------------------------------------------------------------

export const CYCLES: Record<string, CycleId> = {
  timely: 0,
  evening: 1,
  intraday_1: 3,
  intraday_2: 4,
  final: 5,
  intraday_3: 7,
};

export const CYCLE_IDS: readonly CycleId[] = [0, 1, 3, 4, 5, 7];

export function isCycleId(value: number): value is CycleId {
  return CYCLE_IDS.some((id) => id === value);
}

export function cycleName(cycle: CycleId): string {
  const entry = Object.entries(CYCLES).find(([, id]) => id === cycle);
  return entry ? entry[0] : `cycle_${cycle}`;
}

// ---------------------------------------------------------------------------
// Gas days
// ---------------------------------------------------------------------------

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

/** YYYYMMDD in local time. */
export function formatGasDay(date: Date): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
}

/** MM/DD/YYYY, the form the source's query string takes. */
export function formatQueryDate(date: Date): string {
  return `${pad(date.getMonth() + 1)}/${pad(date.getDate())}/${date.getFullYear()}`;
}

/** Dates in [today - daysBack, today], oldest first. */
export function gasDayWindow(today: Date, daysBack: number): Date[] {
  if (!Number.isInteger(daysBack) || daysBack < 0) {
    throw new RangeError(`daysBack must be a non-negative integer, got ${daysBack}`);
  }
  const dates: Date[] = [];
  for (let offset = daysBack; offset >= 0; offset--) {
    dates.push(
      new Date(today.getFullYear(), today.getMonth(), today.getDate() - offset),
    );
  }
  return dates;
}

// ---------------------------------------------------------------------------
// File naming
// ---------------------------------------------------------------------------

const SNAPSHOT_PATTERN = /^tec_data_(\d{8})_cycle_(\d+)\.csv$/;

export function snapshotFileName(snapshot: Snapshot): string {
  return `tec_data_${snapshot.gasDay}_cycle_${snapshot.cycle}.csv`;
}

/** Inverse of snapshotFileName; null for anything else. */
export function parseSnapshotFileName(key: string): Snapshot | null {
  const base = key.split("/").pop() ?? key;
  const match = SNAPSHOT_PATTERN.exec(base);
  if (!match) return null;
  const cycle = Number(match[2]);
  if (!isCycleId(cycle)) return null;
  return { gasDay: match[1], cycle };
}

// ---------------------------------------------------------------------------
// Work list
// ---------------------------------------------------------------------------

/**
 * The data directory seen as a queue of snapshot files. Every stage reads
 * its input from here, so any stage can be re-run against existing files.
 */
export class SnapshotQueue {
  constructor(private readonly storage: StorageBackend) {}

  /** Snapshot keys currently in the store, ordered by gas day then cycle. */
  async listPending(): Promise<string[]> {
    const keys = await this.storage.list("");
    return keys
      .map((key) => ({ key, snapshot: parseSnapshotFileName(key) }))
      .filter(
        (e): e is { key: string; snapshot: Snapshot } => e.snapshot !== null,
      )
      .sort(
        (a, b) =>
          a.snapshot.gasDay.localeCompare(b.snapshot.gasDay) ||
          a.snapshot.cycle - b.snapshot.cycle,
      )
      .map((e) => e.key);
  }
}
