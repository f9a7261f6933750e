import { describe, it, expect, vi } from "vitest";
import type {
  GpuCycleSnapshot,
  GpuDeviceSnapshot,
  GpuTelemetrySource,
} from "@resource-watcher/shared";
import {
  GpuCorrelator,
  NO_GPU_USAGE,
  correlateGpuUsage,
  devicesForContainer,
} from "./gpu-correlator.js";
import { captureLogger } from "../test/logger.js";

// ---------------------------------------------------------------------------
// Test data
// ---------------------------------------------------------------------------

function makeDevice(index: number, overrides?: Partial<GpuDeviceSnapshot>): GpuDeviceSnapshot {
  return {
    index,
    uuid: `GPU-${index}`,
    name: "NVIDIA GeForce RTX 3090",
    memoryTotal: "24576",
    memoryUsed: "522",
    utilizationGpu: "88",
    utilizationMemory: "35",
    temperature: "72",
    fanSpeed: "54",
    powerDraw: "341.52",
    powerLimit: "350.00",
    ...overrides,
  };
}

const snapshot: GpuCycleSnapshot = {
  devices: [
    makeDevice(0),
    makeDevice(1, { name: "NVIDIA A40", memoryTotal: "46068", memoryUsed: "1000", utilizationGpu: "10" }),
    makeDevice(2),
  ],
  processes: [{ pid: 999, device: "0", usedMemory: "522" }],
};

function createSource(overrides?: Partial<GpuTelemetrySource>): GpuTelemetrySource {
  return {
    listDevices: vi.fn().mockResolvedValue(snapshot.devices),
    listProcesses: vi.fn().mockResolvedValue(snapshot.processes),
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Correlation
// ---------------------------------------------------------------------------

describe("correlateGpuUsage", () => {
  it("reports the device a container's process runs on", () => {
    expect(correlateGpuUsage([999], snapshot)).toEqual({
      gpuCount: 1,
      gpuIds: "0",
      gpuNames: "NVIDIA GeForce RTX 3090",
      gpuMemoryUsed: "522",
      gpuMemoryTotal: "24576",
      gpuUtilization: "88",
      gpuMemoryUtilization: "35",
      gpuTemperature: "72",
      gpuFanSpeed: "54",
      gpuPowerDraw: "341.52",
      gpuPowerLimit: "350.00",
    });
  });

  it("reports N/A everywhere when no process matches", () => {
    expect(correlateGpuUsage([1], snapshot)).toEqual(NO_GPU_USAGE);
  });

  it("reports N/A everywhere when the snapshot is missing", () => {
    expect(correlateGpuUsage([999], null)).toEqual(NO_GPU_USAGE);
  });

  it("joins several devices in index order", () => {
    const multi: GpuCycleSnapshot = {
      devices: snapshot.devices,
      processes: [
        { pid: 20, device: "GPU-1", usedMemory: "1000" },
        { pid: 10, device: "0", usedMemory: "522" },
        { pid: 11, device: "GPU-0", usedMemory: "100" },
      ],
    };

    const usage = correlateGpuUsage([10, 11, 20], multi);

    expect(usage.gpuCount).toBe(2);
    expect(usage.gpuIds).toBe("0,1");
    expect(usage.gpuNames).toBe("NVIDIA GeForce RTX 3090,NVIDIA A40");
    expect(usage.gpuMemoryTotal).toBe("24576,46068");
    expect(usage.gpuUtilization).toBe("88,10");
  });
});

describe("devicesForContainer", () => {
  it("ignores associations naming an unknown device", () => {
    const orphan: GpuCycleSnapshot = {
      devices: snapshot.devices,
      processes: [{ pid: 5, device: "GPU-missing", usedMemory: "1" }],
    };
    expect(devicesForContainer([5], orphan)).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// GpuCorrelator
// ---------------------------------------------------------------------------

describe("GpuCorrelator", () => {
  it("captures both lists in one snapshot", async () => {
    const source = createSource();
    const { logger } = captureLogger();
    const correlator = new GpuCorrelator(source, { logger });

    expect(await correlator.capture()).toEqual(snapshot);
    expect(source.listDevices).toHaveBeenCalledTimes(1);
    expect(source.listProcesses).toHaveBeenCalledTimes(1);
  });

  it("returns null and warns once while the query keeps failing", async () => {
    const source = createSource({
      listDevices: vi.fn().mockRejectedValue(new Error("NVIDIA-SMI has failed")),
    });
    const { logger, messages } = captureLogger();
    const correlator = new GpuCorrelator(source, { logger });

    expect(await correlator.capture()).toBeNull();
    expect(await correlator.capture()).toBeNull();
    expect(await correlator.capture()).toBeNull();

    expect(messages("warn")).toEqual(["GPU telemetry unavailable, GPU fields will be N/A"]);
  });

  it("logs recovery after a failure", async () => {
    const listDevices = vi
      .fn()
      .mockRejectedValueOnce(new Error("timed out"))
      .mockResolvedValue(snapshot.devices);
    const { logger, messages } = captureLogger();
    const correlator = new GpuCorrelator(createSource({ listDevices }), { logger });

    await correlator.capture();
    await correlator.capture();
    await correlator.capture();

    expect(messages("warn")).toHaveLength(1);
    expect(messages("info")).toEqual(["GPU telemetry available again"]);
  });
});
