/**
 * Unit tests for snapshot naming, gas-day windows and the work list.
 */
import { describe, test, expect } from "vitest";
import {
  SnapshotQueue,
  cycleName,
  formatGasDay,
  formatQueryDate,
  gasDayWindow,
  parseSnapshotFileName,
  snapshotFileName,
} from "../src/core/snapshots.js";
import { MemoryStorage } from "../src/storage/memory.js";
import { TODAY } from "./fixtures.js";

describe("gasDayWindow", () => {
  test("inclusive, oldest first", () => {
    expect(gasDayWindow(TODAY, 2).map(formatGasDay)).toEqual([
      "20240308",
      "20240309",
      "20240310",
    ]);
  });

  test("zero days back is today only", () => {
    expect(gasDayWindow(TODAY, 0).map(formatGasDay)).toEqual(["20240310"]);
  });

  test("crosses month boundaries", () => {
    const dates = gasDayWindow(new Date(2024, 2, 1), 1).map(formatGasDay);
    expect(dates).toEqual(["20240229", "20240301"]);
  });

  test("rejects negative windows", () => {
    expect(() => gasDayWindow(TODAY, -1)).toThrow(RangeError);
  });
});

describe("formatting", () => {
  test("query date", () => {
    expect(formatQueryDate(TODAY)).toBe("03/10/2024");
  });

  test("cycle names", () => {
    expect(cycleName(0)).toBe("timely");
    expect(cycleName(7)).toBe("intraday_3");
  });
});

describe("snapshot file names", () => {
  test("round trip", () => {
    const name = snapshotFileName({ gasDay: "20240310", cycle: 5 });
    expect(name).toBe("tec_data_20240310_cycle_5.csv");
    expect(parseSnapshotFileName(name)).toEqual({ gasDay: "20240310", cycle: 5 });
  });

  test("rejects unknown cycles and other files", () => {
    expect(parseSnapshotFileName("tec_data_20240310_cycle_2.csv")).toBeNull();
    expect(parseSnapshotFileName("notes.txt")).toBeNull();
    expect(parseSnapshotFileName("tec_data_20240310_cycle_5.csv.1.1.tmp")).toBeNull();
  });
});

describe("SnapshotQueue", () => {
  test("lists snapshots in gas-day then cycle order", async () => {
    const storage = new MemoryStorage();
    await storage.write("tec_data_20240310_cycle_1.csv", "x");
    await storage.write("tec_data_20240309_cycle_7.csv", "x");
    await storage.write("tec_data_20240310_cycle_0.csv", "x");
    await storage.write("readme.md", "x");

    const queue = new SnapshotQueue(storage);
    expect(await queue.listPending()).toEqual([
      "tec_data_20240309_cycle_7.csv",
      "tec_data_20240310_cycle_0.csv",
      "tec_data_20240310_cycle_1.csv",
    ]);
  });
});
