/**
 * Types for the per-container monitoring record.
 *
 * One record is written per container per sampling cycle. The on-disk
 * column names and their order are fixed; tooling that reads the sinks
 * depends on them.
 */

// ---------------------------------------------------------------------------
// Sentinels
// ---------------------------------------------------------------------------

/** Value of every GPU field when a container uses no GPU this cycle */
export const NOT_AVAILABLE = "N/A";

/** Module name when no job metadata could be resolved for a task */
export const UNKNOWN_MODULE = "Unknown";

// ---------------------------------------------------------------------------
// Record parts
// ---------------------------------------------------------------------------

/** A running workload container whose name parsed into identifiers */
export interface WorkloadContainer {
  /** Runtime container id */
  id: string;
  /** Raw container name, e.g. "wemol_rc_task_gpu_132178_182060_334177" */
  name: string;
  taskId: number;
  jobId: number;
}

/** Point-in-time resource usage, rendered the way `docker stats` prints it */
export interface ResourceSample {
  /** Container name as reported by the runtime */
  container: string;
  /** e.g. "12.34%" */
  cpuPercent: string;
  /** "used / limit", e.g. "951.7MiB / 250.3GiB" */
  memUsage: string;
  memPercent: string;
  /** "rx / tx" */
  netIo: string;
  /** "read / write" */
  blockIo: string;
  pids: string;
  /** Local time, "YYYY-MM-DD HH:mm:ss" */
  timestamp: string;
}

/** GPU fields of a record; every multi-value field is comma-joined by device index */
export interface ContainerGpuUsage {
  gpuCount: number;
  gpuIds: string;
  gpuNames: string;
  gpuMemoryUsed: string;
  gpuMemoryTotal: string;
  gpuUtilization: string;
  gpuMemoryUtilization: string;
  gpuTemperature: string;
  gpuFanSpeed: string;
  gpuPowerDraw: string;
  gpuPowerLimit: string;
}

/** The flattened row persisted for one container in one cycle */
export interface MonitoringRecord extends ResourceSample, ContainerGpuUsage {
  taskId: number;
  jobId: number;
  moduleName: string;
}

// ---------------------------------------------------------------------------
// Column layout
// ---------------------------------------------------------------------------

/** On-disk column name → record key, in the fixed column order */
export const RECORD_COLUMNS = [
  ["task_id", "taskId"],
  ["job_id", "jobId"],
  ["module_name", "moduleName"],
  ["timestamp", "timestamp"],
  ["container", "container"],
  ["cpu_percent", "cpuPercent"],
  ["mem_usage", "memUsage"],
  ["mem_percent", "memPercent"],
  ["net_io", "netIo"],
  ["block_io", "blockIo"],
  ["pids", "pids"],
  ["gpu_count", "gpuCount"],
  ["gpu_ids", "gpuIds"],
  ["gpu_names", "gpuNames"],
  ["gpu_memory_used", "gpuMemoryUsed"],
  ["gpu_memory_total", "gpuMemoryTotal"],
  ["gpu_utilization", "gpuUtilization"],
  ["gpu_memory_utilization", "gpuMemoryUtilization"],
  ["gpu_temperature", "gpuTemperature"],
  ["gpu_fan_speed", "gpuFanSpeed"],
  ["gpu_power_draw", "gpuPowerDraw"],
  ["gpu_power_limit", "gpuPowerLimit"],
] as const satisfies ReadonlyArray<readonly [string, keyof MonitoringRecord]>;

export type RecordColumn = (typeof RECORD_COLUMNS)[number][0];

/** Header row of every sink */
export const RECORD_HEADER: readonly RecordColumn[] = RECORD_COLUMNS.map(([column]) => column);

/** A persisted row read back as text, keyed by column name */
export type RecordRow = Record<RecordColumn, string>;
