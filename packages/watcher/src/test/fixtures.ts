/**
 * Shared record fixtures for store and monitor tests.
 */
import type { MonitoringRecord } from "@resource-watcher/shared";

export function makeRecord(overrides?: Partial<MonitoringRecord>): MonitoringRecord {
  return {
    taskId: 132178,
    jobId: 182060,
    moduleName: "Protein Folding",
    timestamp: "2024-03-01 12:00:05",
    container: "wemol_rc_task_gpu_132178_182060_334177",
    cpuPercent: "101.25%",
    memUsage: "512MiB / 2GiB",
    memPercent: "25.00%",
    netIo: "2kB / 848kB",
    blockIo: "4.1MB / 12.3MB",
    pids: "7",
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
    ...overrides,
  };
}
