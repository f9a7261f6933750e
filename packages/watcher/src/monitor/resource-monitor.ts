/**
 * Resource Monitor — one sampling cycle, end to end.
 *
 * discover containers → capture the GPU snapshot once → per container:
 * stats, process ids, GPU usage, module name → append to its sink.
 *
 * Failures stay as narrow as their cause: a failed listing yields an
 * empty cycle, a failed GPU query blanks only the GPU fields, and a
 * failed stats call drops only that container's record.
 */

import type {
  CycleSummary,
  GpuCycleSnapshot,
  MonitoringRecord,
  WorkloadContainer,
} from "@resource-watcher/shared";
import type { Logger } from "../logger.js";
import { DiscoveryError, errorMessage } from "../errors.js";
import type { ContainerDiscovery } from "../runtime/container-discovery.js";
import type { ContainerRuntime } from "../runtime/docker-runtime.js";
import type { StatsCollector } from "../runtime/stats-collector.js";
import type { GpuCorrelator } from "../gpu/gpu-correlator.js";
import type { MetadataResolver } from "../metadata/metadata-resolver.js";
import type { ModuleStore } from "../store/module-store.js";
import { withTimeout } from "../util/timeout.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Cycle summaries kept for the status API (30 min at 5s) */
const MAX_SUMMARIES = 360;

const DEFAULT_TIMEOUT_MS = 10_000;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ResourceMonitorDeps {
  discovery: ContainerDiscovery;
  runtime: ContainerRuntime;
  stats: StatsCollector;
  gpu: GpuCorrelator;
  metadata: MetadataResolver;
  store: ModuleStore;
}

export interface ResourceMonitorOptions {
  logger: Logger;
  /** Containers processed in parallel (default: 1) */
  concurrency?: number;
  /** Budget for the process-list call in ms (default: 10000) */
  timeoutMs?: number;
}

type ContainerOutcome = "recorded" | "stats-failed" | "persist-failed";

// ---------------------------------------------------------------------------
// ResourceMonitor
// ---------------------------------------------------------------------------

export class ResourceMonitor {
  private deps: ResourceMonitorDeps;
  private logger: Logger;
  private concurrency: number;
  private timeoutMs: number;

  /** Most recent cycle summaries, oldest first */
  private summaries: CycleSummary[] = [];

  constructor(deps: ResourceMonitorDeps, options: ResourceMonitorOptions) {
    this.deps = deps;
    this.logger = options.logger;
    this.concurrency = Math.max(1, options.concurrency ?? 1);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /** Run one cycle. Per-container and per-cycle failures are absorbed and counted. */
  async runCycle(): Promise<CycleSummary> {
    const started = Date.now();
    const summary: CycleSummary = {
      startedAt: new Date(started).toISOString(),
      durationMs: 0,
      discovered: 0,
      skippedNames: 0,
      recorded: 0,
      statsFailures: 0,
      persistFailures: 0,
      gpuAvailable: null,
    };

    let containers: WorkloadContainer[] = [];
    try {
      const result = await this.deps.discovery.discover();
      containers = result.containers;
      summary.discovered = result.containers.length + result.skipped.length;
      summary.skippedNames = result.skipped.length;
    } catch (err) {
      if (!(err instanceof DiscoveryError)) throw err;
      this.logger.error({ err }, "container discovery failed, skipping this cycle's containers");
    }

    if (containers.length === 0) {
      this.logger.info("no workload containers found, waiting for the next cycle");
    } else {
      const gpu = await this.deps.gpu.capture();
      summary.gpuAvailable = gpu !== null;

      const outcomes = await mapWithConcurrency(containers, this.concurrency, (c) =>
        this.processContainer(c, gpu),
      );
      for (const outcome of outcomes) {
        if (outcome === "recorded") summary.recorded++;
        else if (outcome === "stats-failed") summary.statsFailures++;
        else summary.persistFailures++;
      }
    }

    await this.deps.store.endCycle();

    summary.durationMs = Date.now() - started;
    this.pushSummary(summary);
    this.logger.info(
      {
        discovered: summary.discovered,
        recorded: summary.recorded,
        durationMs: summary.durationMs,
      },
      "cycle complete",
    );
    return summary;
  }

  /** Latest summaries, oldest first */
  getSummaries(limit = MAX_SUMMARIES): CycleSummary[] {
    return this.summaries.slice(-limit);
  }

  get lastSummary(): CycleSummary | undefined {
    return this.summaries[this.summaries.length - 1];
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private async processContainer(
    container: WorkloadContainer,
    gpu: GpuCycleSnapshot | null,
  ): Promise<ContainerOutcome> {
    const { stats, metadata, store } = this.deps;

    const result = await stats.collect(container);
    if (!result.ok) {
      this.logger.warn({ container: container.name, err: result.error }, result.error.message);
      return "stats-failed";
    }

    const pids = gpu ? await this.processIds(container) : [];
    const usage = this.deps.gpu.usageFor(pids, gpu);
    const moduleName = await metadata.resolve(container.taskId);

    const record: MonitoringRecord = {
      taskId: container.taskId,
      jobId: container.jobId,
      moduleName,
      ...result.sample,
      ...usage,
    };

    const outcome = await store.append(record);
    return outcome.status === "dropped" ? "persist-failed" : "recorded";
  }

  /** Host pids of a container; an empty set when they cannot be listed */
  private async processIds(container: WorkloadContainer): Promise<number[]> {
    try {
      return await withTimeout(
        (signal) => this.deps.runtime.listProcessIds(container.id, signal),
        this.timeoutMs,
        `process list for ${container.name}`,
      );
    } catch (err) {
      this.logger.warn(
        { container: container.name, err },
        `cannot list processes, GPU fields will be N/A: ${errorMessage(err)}`,
      );
      return [];
    }
  }

  private pushSummary(summary: CycleSummary): void {
    this.summaries.push(summary);
    if (this.summaries.length > MAX_SUMMARIES) {
      this.summaries.splice(0, this.summaries.length - MAX_SUMMARIES);
    }
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Map items through `fn` with at most `limit` calls in flight; results keep input order */
async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T) => Promise<R>,
): Promise<R[]> {
  const results: R[] = new Array(items.length);
  let next = 0;

  const worker = async () => {
    while (next < items.length) {
      const i = next++;
      results[i] = await fn(items[i]);
    }
  };

  await Promise.all(Array.from({ length: Math.min(limit, items.length) }, worker));
  return results;
}
