/**
 * Fixed-interval scheduler. Runs a task immediately, then waits the interval
 * after each completed run (no drift correction) until its signal aborts.
 */
import { setTimeout as sleepFor } from "node:timers/promises";
import { errorMessage } from "./exceptions.js";
import { silentLogger, type Logger } from "../logger.js";

export type SchedulerState = "idle" | "running" | "waiting" | "stopped";

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

const HOUR_MS = 60 * 60 * 1000;

/** Longest delay a Node timer honours; larger values fire after 1 ms. */
export const MAX_TIMER_MS = 2 ** 31 - 1;

const timerSleep: Sleep = async (ms, signal) => {
  try {
    await sleepFor(ms, undefined, { signal });
  } catch (err) {
    if (!signal.aborted) throw err;
  }
};

/** Wraps `wait` so that delays longer than `maxChunkMs` are taken in steps. */
export function chunkedSleep(wait: Sleep, maxChunkMs = MAX_TIMER_MS): Sleep {
  return async (ms, signal) => {
    let remaining = ms;
    while (remaining > 0 && !signal.aborted) {
      const step = Math.min(remaining, maxChunkMs);
      await wait(step, signal);
      remaining -= step;
    }
  };
}

/** Resolves after `ms`, or early (without error) when `signal` aborts. */
export const defaultSleep: Sleep = chunkedSleep(timerSleep);

export interface SchedulerOptions {
  intervalHours: number;
  taskName?: string;
  sleep?: Sleep;
  logger?: Logger;
}

export class Scheduler {
  readonly intervalHours: number;
  private taskName: string;
  private sleep: Sleep;
  private log: Logger;
  private _state: SchedulerState = "idle";
  private _runCount = 0;

  constructor(opts: SchedulerOptions) {
    if (!(opts.intervalHours > 0) || !Number.isFinite(opts.intervalHours)) {
      throw new RangeError(
        `intervalHours must be a positive finite number, got ${opts.intervalHours}`,
      );
    }
    this.intervalHours = opts.intervalHours;
    this.taskName = opts.taskName ?? "task";
    this.sleep = opts.sleep ?? defaultSleep;
    this.log = (opts.logger ?? silentLogger).child({ component: "scheduler" });
  }

  get state(): SchedulerState {
    return this._state;
  }

  get runCount(): number {
    return this._runCount;
  }

  /** Run `task` once; errors are logged and reported as `false`. */
  async runTask(task: () => Promise<unknown>): Promise<boolean> {
    this._state = "running";
    const run = ++this._runCount;
    this.log.info({ run, task: this.taskName }, "starting scheduled run");
    try {
      await task();
      this.log.info({ run, task: this.taskName }, "scheduled run completed");
      return true;
    } catch (err) {
      this.log.error(
        { run, task: this.taskName, err: errorMessage(err) },
        "scheduled run failed",
      );
      return false;
    }
  }

  /** Loop until `signal` aborts. */
  async runForever(
    task: () => Promise<unknown>,
    signal: AbortSignal = new AbortController().signal,
  ): Promise<void> {
    this.log.info(
      { task: this.taskName, intervalHours: this.intervalHours },
      "starting continuous schedule",
    );

    while (!signal.aborted) {
      await this.runTask(task);
      if (signal.aborted) break;

      this._state = "waiting";
      this.log.info(
        { task: this.taskName, intervalHours: this.intervalHours },
        "waiting for next run",
      );
      await this.sleep(this.intervalHours * HOUR_MS, signal);
    }

    this._state = "stopped";
    this.log.info({ task: this.taskName, runs: this._runCount }, "scheduler stopped");
  }
}
