/**
 * Attributes GPU devices to a container.
 *
 * The device list and the compute-process list are captured once per cycle
 * and shared read-only by every container in that cycle. A container uses
 * a device when one of its host pids appears as a compute process on it.
 */

import {
  NOT_AVAILABLE,
  type ContainerGpuUsage,
  type GpuCycleSnapshot,
  type GpuDeviceSnapshot,
  type GpuTelemetrySource,
} from "@resource-watcher/shared";
import type { Logger } from "../logger.js";
import { GpuQueryError, errorMessage } from "../errors.js";

/** GPU fields of a container that uses no GPU (or when GPU queries failed) */
export const NO_GPU_USAGE: Readonly<ContainerGpuUsage> = Object.freeze({
  gpuCount: 0,
  gpuIds: NOT_AVAILABLE,
  gpuNames: NOT_AVAILABLE,
  gpuMemoryUsed: NOT_AVAILABLE,
  gpuMemoryTotal: NOT_AVAILABLE,
  gpuUtilization: NOT_AVAILABLE,
  gpuMemoryUtilization: NOT_AVAILABLE,
  gpuTemperature: NOT_AVAILABLE,
  gpuFanSpeed: NOT_AVAILABLE,
  gpuPowerDraw: NOT_AVAILABLE,
  gpuPowerLimit: NOT_AVAILABLE,
});

const MULTI_VALUE_SEPARATOR = ",";

// ---------------------------------------------------------------------------
// Correlation
// ---------------------------------------------------------------------------

/**
 * Devices used by a container, deduplicated and sorted by index.
 * Process associations naming a device that is not in the snapshot are
 * ignored.
 */
export function devicesForContainer(
  pids: Iterable<number>,
  snapshot: GpuCycleSnapshot,
): GpuDeviceSnapshot[] {
  const containerPids = new Set(pids);
  const byIndex = new Map<number, GpuDeviceSnapshot>();

  for (const assoc of snapshot.processes) {
    if (!containerPids.has(assoc.pid)) continue;
    const device = snapshot.devices.find(
      (d) => d.uuid === assoc.device || String(d.index) === assoc.device,
    );
    if (device) byIndex.set(device.index, device);
  }

  return [...byIndex.values()].sort((a, b) => a.index - b.index);
}

/** Aggregate matched devices into the record's GPU fields */
export function summarizeDevices(devices: readonly GpuDeviceSnapshot[]): ContainerGpuUsage {
  if (devices.length === 0) return { ...NO_GPU_USAGE };

  const join = (pick: (d: GpuDeviceSnapshot) => string) =>
    devices.map(pick).join(MULTI_VALUE_SEPARATOR);

  return {
    gpuCount: devices.length,
    gpuIds: join((d) => String(d.index)),
    gpuNames: join((d) => d.name),
    gpuMemoryUsed: join((d) => d.memoryUsed),
    gpuMemoryTotal: join((d) => d.memoryTotal),
    gpuUtilization: join((d) => d.utilizationGpu),
    gpuMemoryUtilization: join((d) => d.utilizationMemory),
    gpuTemperature: join((d) => d.temperature),
    gpuFanSpeed: join((d) => d.fanSpeed),
    gpuPowerDraw: join((d) => d.powerDraw),
    gpuPowerLimit: join((d) => d.powerLimit),
  };
}

/** GPU fields for a container; a null snapshot means the cycle's queries failed */
export function correlateGpuUsage(
  pids: Iterable<number>,
  snapshot: GpuCycleSnapshot | null,
): ContainerGpuUsage {
  if (!snapshot) return { ...NO_GPU_USAGE };
  return summarizeDevices(devicesForContainer(pids, snapshot));
}

// ---------------------------------------------------------------------------
// GpuCorrelator
// ---------------------------------------------------------------------------

export interface GpuCorrelatorOptions {
  logger: Logger;
}

export class GpuCorrelator {
  private source: GpuTelemetrySource;
  private logger: Logger;

  /** Availability seen on the previous capture; null before the first */
  private lastAvailable: boolean | null = null;

  constructor(source: GpuTelemetrySource, options: GpuCorrelatorOptions) {
    this.source = source;
    this.logger = options.logger;
  }

  /**
   * Capture the cycle's device and process lists. Returns null when either
   * query fails; availability changes are logged once per transition.
   */
  async capture(): Promise<GpuCycleSnapshot | null> {
    try {
      const [devices, processes] = await Promise.all([
        this.source.listDevices(),
        this.source.listProcesses(),
      ]);
      if (this.lastAvailable === false) {
        this.logger.info({ devices: devices.length }, "GPU telemetry available again");
      }
      this.lastAvailable = true;
      this.logger.debug(
        { devices: devices.length, processes: processes.length },
        "captured GPU snapshot",
      );
      return { devices, processes };
    } catch (err) {
      const error = new GpuQueryError(`GPU query failed: ${errorMessage(err)}`, { cause: err });
      if (this.lastAvailable !== false) {
        this.logger.warn({ err: error }, "GPU telemetry unavailable, GPU fields will be N/A");
      } else {
        this.logger.debug({ err: error }, "GPU telemetry still unavailable");
      }
      this.lastAvailable = false;
      return null;
    }
  }

  usageFor(pids: Iterable<number>, snapshot: GpuCycleSnapshot | null): ContainerGpuUsage {
    return correlateGpuUsage(pids, snapshot);
  }
}
