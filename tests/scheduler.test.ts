/**
 * Unit tests for the fixed-interval scheduler.
 */
import { describe, test, expect } from "vitest";
import {
  MAX_TIMER_MS,
  Scheduler,
  chunkedSleep,
  defaultSleep,
  type SchedulerState,
  type Sleep,
} from "../src/core/scheduler.js";

const SIX_HOURS_MS = 6 * 60 * 60 * 1000;

/** A sleep that returns at once and aborts the loop after `limit` waits. */
function countingSleep(controller: AbortController, limit: number) {
  const waits: number[] = [];
  const sleep: Sleep = async (ms) => {
    waits.push(ms);
    if (waits.length >= limit) controller.abort();
  };
  return { waits, sleep };
}

describe("Scheduler", () => {
  test("runs immediately, then once per interval", async () => {
    const controller = new AbortController();
    const { waits, sleep } = countingSleep(controller, 2);
    const scheduler = new Scheduler({ intervalHours: 6, sleep });

    let runs = 0;
    await scheduler.runForever(async () => {
      runs++;
    }, controller.signal);

    expect(runs).toBe(2);
    expect(waits).toEqual([SIX_HOURS_MS, SIX_HOURS_MS]);
    expect(scheduler.runCount).toBe(2);
    expect(scheduler.state).toBe("stopped");
  });

  test("a failing iteration does not end the loop", async () => {
    const controller = new AbortController();
    const { sleep } = countingSleep(controller, 3);
    const scheduler = new Scheduler({ intervalHours: 1, sleep });

    const outcomes: string[] = [];
    await scheduler.runForever(async () => {
      if (outcomes.length === 0) {
        outcomes.push("boom");
        throw new Error("stage exploded");
      }
      outcomes.push("ok");
    }, controller.signal);

    expect(outcomes).toEqual(["boom", "ok", "ok"]);
  });

  test("alternates between running and waiting", async () => {
    const controller = new AbortController();
    const seen: SchedulerState[] = [];
    const scheduler: Scheduler = new Scheduler({
      intervalHours: 2,
      sleep: async () => {
        seen.push(scheduler.state);
        controller.abort();
      },
    });

    expect(scheduler.state).toBe("idle");
    await scheduler.runForever(async () => {
      seen.push(scheduler.state);
    }, controller.signal);

    expect(seen).toEqual(["running", "waiting"]);
    expect(scheduler.state).toBe("stopped");
  });

  test("an already aborted signal runs nothing", async () => {
    const controller = new AbortController();
    controller.abort();
    const scheduler = new Scheduler({ intervalHours: 1 });
    let runs = 0;
    await scheduler.runForever(async () => {
      runs++;
    }, controller.signal);
    expect(runs).toBe(0);
  });

  test("runTask reports failures as false", async () => {
    const scheduler = new Scheduler({ intervalHours: 1 });
    expect(await scheduler.runTask(async () => "done")).toBe(true);
    expect(
      await scheduler.runTask(async () => {
        throw new Error("nope");
      }),
    ).toBe(false);
  });

  test.each([0, -1, Number.NaN, Number.POSITIVE_INFINITY])("rejects interval %s", (hours) => {
    expect(() => new Scheduler({ intervalHours: hours })).toThrow(RangeError);
  });
});

describe("defaultSleep", () => {
  test("resolves early when aborted", async () => {
    const controller = new AbortController();
    const pending = defaultSleep(SIX_HOURS_MS, controller.signal);
    controller.abort();
    await expect(pending).resolves.toBeUndefined();
  });
});

describe("chunkedSleep", () => {
  test("splits delays longer than a timer can hold", async () => {
    const steps: number[] = [];
    const sleep = chunkedSleep(async (ms) => {
      steps.push(ms);
    });
    await sleep(600 * 60 * 60 * 1000, new AbortController().signal);
    expect(steps).toEqual([MAX_TIMER_MS, 12_516_353]);
  });

  test("short delays are a single wait", async () => {
    const steps: number[] = [];
    const sleep = chunkedSleep(async (ms) => {
      steps.push(ms);
    });
    await sleep(SIX_HOURS_MS, new AbortController().signal);
    expect(steps).toEqual([SIX_HOURS_MS]);
  });

  test("stops stepping once aborted", async () => {
    const controller = new AbortController();
    const steps: number[] = [];
    const sleep = chunkedSleep(async (ms) => {
      steps.push(ms);
      controller.abort();
    }, 10);
    await sleep(35, controller.signal);
    expect(steps).toEqual([10]);
  });
});
