/**
 * One point-in-time resource reading per container.
 *
 * A failure is returned, never thrown, so the caller can drop that
 * container's record for the cycle and carry on with the others.
 */

import type { ResourceSample, WorkloadContainer } from "@resource-watcher/shared";
import type { Logger } from "../logger.js";
import { StatsError, errorMessage } from "../errors.js";
import { withTimeout } from "../util/timeout.js";
import type { ContainerRuntime } from "./docker-runtime.js";
import { formatStats } from "./stats-format.js";

export type StatsResult =
  | { ok: true; sample: ResourceSample }
  | { ok: false; error: StatsError };

export interface StatsCollectorOptions {
  logger: Logger;
  /** Budget for one stats call in ms (default: 10000) */
  timeoutMs?: number;
  /** Clock for sample timestamps */
  now?: () => Date;
}

const DEFAULT_TIMEOUT_MS = 10_000;

export class StatsCollector {
  private runtime: ContainerRuntime;
  private logger: Logger;
  private timeoutMs: number;
  private now: () => Date;

  constructor(runtime: ContainerRuntime, options: StatsCollectorOptions) {
    this.runtime = runtime;
    this.logger = options.logger;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.now = options.now ?? (() => new Date());
  }

  async collect(container: WorkloadContainer): Promise<StatsResult> {
    try {
      const stats = await withTimeout(
        (signal) => this.runtime.stats(container.id, signal),
        this.timeoutMs,
        `stats for ${container.name}`,
      );
      const sample: ResourceSample = {
        container: container.name,
        ...formatStats(stats),
        timestamp: formatTimestamp(this.now()),
      };
      this.logger.debug({ container: container.name, sample }, "collected stats");
      return { ok: true, sample };
    } catch (err) {
      const error = new StatsError(
        container.name,
        `Failed to collect stats for ${container.name}: ${errorMessage(err)}`,
        { cause: err },
      );
      return { ok: false, error };
    }
  }
}

/** Local time as "YYYY-MM-DD HH:mm:ss" */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}
