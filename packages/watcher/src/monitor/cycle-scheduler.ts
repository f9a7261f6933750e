/**
 * Cycle Scheduler — runs a cycle at a fixed cadence, measured start to start.
 *
 * After each cycle it sleeps for whatever remains of the interval. A cycle
 * that overruns the interval is followed immediately by the next one and a
 * drift warning; missed ticks are never caught up. stop() is honoured
 * between cycles only, so a cycle in progress always runs to completion.
 */

import { setTimeout as sleep } from "node:timers/promises";
import type { Logger } from "../logger.js";

export interface SchedulerClock {
  /** Monotonic milliseconds */
  now(): number;
  /** Resolve after `ms`, or early when `signal` aborts */
  sleep(ms: number, signal: AbortSignal): Promise<void>;
}

export interface CycleSchedulerOptions {
  /** Start-to-start period in ms */
  intervalMs: number;
  logger: Logger;
  clock?: SchedulerClock;
}

/** Timing of one completed cycle */
export interface CycleTiming {
  startedAt: number;
  elapsedMs: number;
  /** How far the cycle overran the interval; 0 when it fit */
  driftMs: number;
}

const systemClock: SchedulerClock = {
  now: () => performance.now(),
  sleep: async (ms, signal) => {
    try {
      await sleep(ms, undefined, { signal });
    } catch (err) {
      if (!signal.aborted) throw err;
    }
  },
};

export class CycleScheduler {
  private cycle: () => Promise<unknown>;
  private intervalMs: number;
  private logger: Logger;
  private clock: SchedulerClock;

  private loop: Promise<void> | null = null;
  private abort: AbortController | null = null;
  private lastTiming: CycleTiming | null = null;

  constructor(cycle: () => Promise<unknown>, options: CycleSchedulerOptions) {
    if (!(options.intervalMs > 0)) {
      throw new RangeError(`Interval must be positive, got ${options.intervalMs}`);
    }
    this.cycle = cycle;
    this.intervalMs = options.intervalMs;
    this.logger = options.logger;
    this.clock = options.clock ?? systemClock;
  }

  /** Start the cycle loop; the first cycle runs immediately */
  start(): void {
    if (this.loop) return;
    this.abort = new AbortController();
    this.loop = this.run(this.abort.signal);
  }

  /** Request a stop and wait for the cycle in progress to finish */
  async stop(): Promise<void> {
    this.abort?.abort();
    const loop = this.loop;
    if (!loop) return;
    await loop;
    this.loop = null;
    this.abort = null;
  }

  /** Whether the loop is running */
  get isRunning(): boolean {
    return this.loop !== null;
  }

  /** Timing of the most recent cycle */
  get lastCycle(): CycleTiming | null {
    return this.lastTiming;
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const startedAt = this.clock.now();
      try {
        await this.cycle();
      } catch (err) {
        this.logger.error({ err }, "cycle failed");
      }

      const elapsedMs = this.clock.now() - startedAt;
      const driftMs = Math.max(0, elapsedMs - this.intervalMs);
      this.lastTiming = { startedAt, elapsedMs, driftMs };

      if (signal.aborted) break;

      if (elapsedMs >= this.intervalMs) {
        this.logger.warn(
          { elapsedMs: round2(elapsedMs), intervalMs: this.intervalMs, driftMs: round2(driftMs) },
          `cycle took ${(elapsedMs / 1000).toFixed(2)}s, longer than the ${this.intervalMs / 1000}s interval`,
        );
        continue;
      }

      const remaining = this.intervalMs - elapsedMs;
      this.logger.debug({ elapsedMs: round2(elapsedMs), sleepMs: round2(remaining) }, "cycle finished");
      await this.clock.sleep(remaining, signal);
    }
    this.logger.info("scheduler stopped");
  }
}

/** Round to 2 decimal places */
function round2(n: number): number {
  return Math.round(n * 100) / 100;
}
