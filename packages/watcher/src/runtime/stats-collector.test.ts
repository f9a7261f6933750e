import { describe, it, expect, vi } from "vitest";
import type { WorkloadContainer } from "@resource-watcher/shared";
import { StatsCollector, formatTimestamp } from "./stats-collector.js";
import type { ContainerRuntime } from "./docker-runtime.js";
import type { ContainerStatsPayload } from "./schemas.js";
import { StatsError } from "../errors.js";
import { captureLogger } from "../test/logger.js";

const container: WorkloadContainer = {
  id: "abc123",
  name: "wemol_rc_task_gpu_10_20_0",
  taskId: 10,
  jobId: 20,
};

const payload: ContainerStatsPayload = {
  cpu_stats: {
    cpu_usage: { total_usage: 300 },
    system_cpu_usage: 1_000,
    online_cpus: 2,
  },
  precpu_stats: {
    cpu_usage: { total_usage: 100 },
    system_cpu_usage: 0,
  },
  memory_stats: { usage: 1024, limit: 4096 },
  pids_stats: { current: 3 },
};

function createRuntime(stats: ContainerRuntime["stats"]): ContainerRuntime {
  return { listRunning: vi.fn(), stats, listProcessIds: vi.fn() };
}

describe("StatsCollector", () => {
  it("returns a formatted sample stamped with the local time", async () => {
    const runtime = createRuntime(vi.fn().mockResolvedValue(payload));
    const { logger } = captureLogger();
    const collector = new StatsCollector(runtime, {
      logger,
      now: () => new Date(2024, 0, 5, 9, 3, 7),
    });

    const result = await collector.collect(container);

    expect(runtime.stats).toHaveBeenCalledWith("abc123", expect.any(AbortSignal));
    expect(result).toEqual({
      ok: true,
      sample: {
        container: "wemol_rc_task_gpu_10_20_0",
        cpuPercent: "40.00%",
        memUsage: "1KiB / 4KiB",
        memPercent: "25.00%",
        netIo: "0B / 0B",
        blockIo: "0B / 0B",
        pids: "3",
        timestamp: "2024-01-05 09:03:07",
      },
    });
  });

  it("returns a StatsError instead of throwing", async () => {
    const runtime = createRuntime(vi.fn().mockRejectedValue(new Error("No such container")));
    const { logger } = captureLogger();
    const collector = new StatsCollector(runtime, { logger });

    const result = await collector.collect(container);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(StatsError);
    expect(result.error.containerName).toBe("wemol_rc_task_gpu_10_20_0");
    expect(result.error.message).toBe(
      "Failed to collect stats for wemol_rc_task_gpu_10_20_0: No such container",
    );
  });

  it("gives up on a stats call that outlives its budget and aborts it", async () => {
    const signals: AbortSignal[] = [];
    const runtime = createRuntime((_id, signal) => {
      if (signal) signals.push(signal);
      return new Promise(() => {});
    });
    const { logger } = captureLogger();
    const collector = new StatsCollector(runtime, { logger, timeoutMs: 5 });

    const result = await collector.collect(container);

    expect(signals).toHaveLength(1);
    expect(signals[0].aborted).toBe(true);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe(
      "Failed to collect stats for wemol_rc_task_gpu_10_20_0: " +
        "stats for wemol_rc_task_gpu_10_20_0 timed out after 5ms",
    );
  });
});

describe("formatTimestamp", () => {
  it("zero-pads every component", () => {
    expect(formatTimestamp(new Date(2023, 8, 1, 0, 0, 5))).toBe("2023-09-01 00:00:05");
  });
});
