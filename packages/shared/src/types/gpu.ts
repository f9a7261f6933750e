/**
 * GPU telemetry contract.
 *
 * The watcher reads GPU state through this interface only, so the
 * nvidia-smi implementation can be swapped for a deterministic fake.
 */

/** Static and dynamic telemetry for one physical device, as raw tool text */
export interface GpuDeviceSnapshot {
  index: number;
  /** Device UUID, e.g. "GPU-5f3c..."; empty when the source does not report it */
  uuid: string;
  name: string;
  memoryTotal: string;
  memoryUsed: string;
  utilizationGpu: string;
  utilizationMemory: string;
  temperature: string;
  fanSpeed: string;
  powerDraw: string;
  powerLimit: string;
}

/** A compute process running on a device */
export interface GpuProcessAssoc {
  pid: number;
  /** Device UUID or decimal device index */
  device: string;
  usedMemory: string;
}

/** Devices and compute processes captured once per cycle and shared read-only */
export interface GpuCycleSnapshot {
  devices: readonly GpuDeviceSnapshot[];
  processes: readonly GpuProcessAssoc[];
}

export interface GpuTelemetrySource {
  /** List every visible device with its current telemetry */
  listDevices(): Promise<GpuDeviceSnapshot[]>;

  /** List compute processes and the device each one runs on */
  listProcesses(): Promise<GpuProcessAssoc[]>;
}
