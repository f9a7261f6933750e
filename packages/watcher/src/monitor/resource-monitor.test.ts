import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import type { GpuTelemetrySource } from "@resource-watcher/shared";
import { ResourceMonitor } from "./resource-monitor.js";
import type { ContainerRuntime, ContainerSummary } from "../runtime/docker-runtime.js";
import type { ContainerStatsPayload } from "../runtime/schemas.js";
import { ContainerDiscovery } from "../runtime/container-discovery.js";
import { StatsCollector } from "../runtime/stats-collector.js";
import { GpuCorrelator } from "../gpu/gpu-correlator.js";
import { MetadataResolver, metadataPath } from "../metadata/metadata-resolver.js";
import { ModuleStore } from "../store/module-store.js";
import { parseCsv, toRecordRow } from "../store/csv.js";
import { captureLogger } from "../test/logger.js";

// ---------------------------------------------------------------------------
// Fakes
// ---------------------------------------------------------------------------

const GPU_CONTAINER: ContainerSummary = { id: "c1", name: "wemol_rc_task_gpu_132178_182060_334177" };
const CPU_CONTAINER: ContainerSummary = { id: "c2", name: "wemol_rc_task_cpu_500_600_1" };

const payload: ContainerStatsPayload = {
  cpu_stats: { cpu_usage: { total_usage: 300 }, system_cpu_usage: 1_000, online_cpus: 2 },
  precpu_stats: { cpu_usage: { total_usage: 100 }, system_cpu_usage: 0 },
  memory_stats: { usage: 1024, limit: 4096 },
  pids_stats: { current: 3 },
};

function createRuntime(overrides?: Partial<ContainerRuntime>): ContainerRuntime {
  return {
    listRunning: vi.fn().mockResolvedValue([
      GPU_CONTAINER,
      CPU_CONTAINER,
      { id: "c3", name: "wemol_rc_task_bad" },
      { id: "c4", name: "redis" },
    ]),
    stats: vi.fn().mockResolvedValue(payload),
    listProcessIds: vi.fn(async (id: string) => (id === "c1" ? [999, 1000] : [1])),
    ...overrides,
  };
}

function createGpuSource(overrides?: Partial<GpuTelemetrySource>): GpuTelemetrySource {
  return {
    listDevices: vi.fn().mockResolvedValue([
      {
        index: 0,
        uuid: "GPU-0",
        name: "NVIDIA GeForce RTX 3090",
        memoryTotal: "24576",
        memoryUsed: "522",
        utilizationGpu: "88",
        utilizationMemory: "35",
        temperature: "72",
        fanSpeed: "54",
        powerDraw: "341.52",
        powerLimit: "350.00",
      },
    ]),
    listProcesses: vi.fn().mockResolvedValue([{ pid: 999, device: "GPU-0", usedMemory: "522" }]),
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Setup
// ---------------------------------------------------------------------------

let workDir: string;
let store: ModuleStore;

beforeEach(async () => {
  workDir = await mkdtemp(join(tmpdir(), "resource-monitor-test-"));
  const path = metadataPath(join(workDir, "meta", "Worker.GPU"), 132178);
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify({ Module: { Name: "Protein Folding" } }));
});

afterEach(async () => {
  await store.close();
  await rm(workDir, { recursive: true, force: true });
});

function createMonitor(runtime: ContainerRuntime, gpuSource: GpuTelemetrySource) {
  const captured = captureLogger();
  const { logger } = captured;
  store = new ModuleStore({ outputDir: join(workDir, "out"), logger });
  const monitor = new ResourceMonitor(
    {
      discovery: new ContainerDiscovery(runtime, { prefix: "wemol_rc_task", logger }),
      runtime,
      stats: new StatsCollector(runtime, { logger, now: () => new Date(2024, 2, 1, 12, 0, 5) }),
      gpu: new GpuCorrelator(gpuSource, { logger }),
      metadata: new MetadataResolver({
        metadataRoot: join(workDir, "meta"),
        workerTypes: ["GPU", "CPU", "AF2", "ALL"],
        logger,
      }),
      store,
    },
    { logger, concurrency: 2 },
  );
  return { monitor, ...captured };
}

async function readRows(...segments: string[]) {
  await store.close();
  const text = await readFile(join(workDir, "out", ...segments), "utf8");
  return parseCsv(text).slice(1).map(toRecordRow);
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("ResourceMonitor", () => {
  it("records every workload container with its module and GPU usage", async () => {
    const gpu = createGpuSource();
    const { monitor } = createMonitor(createRuntime(), gpu);

    const summary = await monitor.runCycle();

    expect(gpu.listDevices).toHaveBeenCalledTimes(1);
    expect(gpu.listProcesses).toHaveBeenCalledTimes(1);

    expect(summary).toMatchObject({
      discovered: 3,
      skippedNames: 1,
      recorded: 2,
      statsFailures: 0,
      persistFailures: 0,
      gpuAvailable: true,
    });

    const [gpuRow] = await readRows("Protein Folding", "132178.csv");
    expect(gpuRow).toMatchObject({
      task_id: "132178",
      job_id: "182060",
      module_name: "Protein Folding",
      timestamp: "2024-03-01 12:00:05",
      container: "wemol_rc_task_gpu_132178_182060_334177",
      cpu_percent: "40.00%",
      mem_usage: "1KiB / 4KiB",
      pids: "3",
      gpu_count: "1",
      gpu_ids: "0",
      gpu_names: "NVIDIA GeForce RTX 3090",
      gpu_power_draw: "341.52",
    });

    const [cpuRow] = await readRows("Unknown", "500.csv");
    expect(cpuRow).toMatchObject({
      task_id: "500",
      job_id: "600",
      module_name: "Unknown",
      gpu_count: "0",
      gpu_ids: "N/A",
      gpu_power_limit: "N/A",
    });
  });

  it("drops only the container whose stats failed", async () => {
    const runtime = createRuntime({
      stats: vi.fn(async (id: string) => {
        if (id === "c2") throw new Error("container exited");
        return payload;
      }),
    });
    const { monitor, messages } = createMonitor(runtime, createGpuSource());

    const summary = await monitor.runCycle();

    expect(summary.recorded).toBe(1);
    expect(summary.statsFailures).toBe(1);
    expect(messages("warn")).toContain(
      "Failed to collect stats for wemol_rc_task_cpu_500_600_1: container exited",
    );
  });

  it("blanks GPU fields and skips process listing when GPU queries fail", async () => {
    const runtime = createRuntime();
    const gpu = createGpuSource({ listProcesses: vi.fn().mockRejectedValue(new Error("no driver")) });
    const { monitor } = createMonitor(runtime, gpu);

    const summary = await monitor.runCycle();

    expect(summary.gpuAvailable).toBe(false);
    expect(summary.recorded).toBe(2);
    expect(runtime.listProcessIds).not.toHaveBeenCalled();
    const [row] = await readRows("Protein Folding", "132178.csv");
    expect(row).toMatchObject({ gpu_count: "0", gpu_ids: "N/A", gpu_names: "N/A" });
  });

  it("keeps the record when the process list cannot be read", async () => {
    const runtime = createRuntime({
      listProcessIds: vi.fn().mockRejectedValue(new Error("container paused")),
    });
    const { monitor, messages } = createMonitor(runtime, createGpuSource());

    const summary = await monitor.runCycle();

    expect(summary.recorded).toBe(2);
    expect(messages("warn")).toContain(
      "cannot list processes, GPU fields will be N/A: container paused",
    );
    const [row] = await readRows("Protein Folding", "132178.csv");
    expect(row).toMatchObject({ gpu_count: "0", gpu_ids: "N/A" });
  });

  it("treats a failed listing as an empty cycle", async () => {
    const gpu = createGpuSource();
    const runtime = createRuntime({
      listRunning: vi.fn().mockRejectedValue(new Error("daemon down")),
    });
    const { monitor, messages } = createMonitor(runtime, gpu);

    const summary = await monitor.runCycle();

    expect(summary).toMatchObject({ discovered: 0, recorded: 0, gpuAvailable: null });
    expect(gpu.listDevices).not.toHaveBeenCalled();
    expect(messages("error")).toEqual([
      "container discovery failed, skipping this cycle's containers",
    ]);
  });

  it("skips GPU queries when there are no workload containers", async () => {
    const gpu = createGpuSource();
    const runtime = createRuntime({ listRunning: vi.fn().mockResolvedValue([]) });
    const { monitor, messages } = createMonitor(runtime, gpu);

    const summary = await monitor.runCycle();

    expect(summary.gpuAvailable).toBeNull();
    expect(gpu.listDevices).not.toHaveBeenCalled();
    expect(messages("info")).toContain("no workload containers found, waiting for the next cycle");
  });

  it("keeps recent summaries, oldest first", async () => {
    const runtime = createRuntime({ listRunning: vi.fn().mockResolvedValue([]) });
    const { monitor } = createMonitor(runtime, createGpuSource());

    expect(monitor.lastSummary).toBeUndefined();
    const first = await monitor.runCycle();
    const second = await monitor.runCycle();
    const third = await monitor.runCycle();

    expect(monitor.getSummaries()).toEqual([first, second, third]);
    expect(monitor.getSummaries(2)).toEqual([second, third]);
    expect(monitor.lastSummary).toBe(third);
  });
});
