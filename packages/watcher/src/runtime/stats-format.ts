/**
 * Render a raw stats payload the way `docker stats` prints it.
 *
 * Existing sinks hold the CLI's text ("512MiB / 2GiB", "12.34%"),
 * so the same rounding and unit rules are applied here.
 */

import type { ContainerStatsPayload } from "./schemas.js";

const BINARY_UNITS = ["B", "KiB", "MiB", "GiB", "TiB", "PiB", "EiB", "ZiB", "YiB"];
const DECIMAL_UNITS = ["B", "kB", "MB", "GB", "TB", "PB", "EB", "ZB", "YB"];

export interface FormattedStats {
  cpuPercent: string;
  memUsage: string;
  memPercent: string;
  netIo: string;
  blockIo: string;
  pids: string;
}

export function formatStats(stats: ContainerStatsPayload): FormattedStats {
  const memUsed = memoryUsedNoCache(stats);
  const memLimit = stats.memory_stats.limit ?? 0;
  const memPercent = memLimit !== 0 ? (memUsed / memLimit) * 100 : 0;
  const [rx, tx] = networkTotals(stats);
  const [read, write] = blockIoTotals(stats);

  return {
    cpuPercent: `${cpuPercent(stats).toFixed(2)}%`,
    memUsage: `${binarySize(memUsed)} / ${binarySize(memLimit)}`,
    memPercent: `${memPercent.toFixed(2)}%`,
    netIo: `${decimalSize(rx)} / ${decimalSize(tx)}`,
    blockIo: `${decimalSize(read)} / ${decimalSize(write)}`,
    pids: String(stats.pids_stats?.current ?? 0),
  };
}

// ---------------------------------------------------------------------------
// Calculations
// ---------------------------------------------------------------------------

/** CPU % from the delta between the reading and the engine's previous reading */
export function cpuPercent(stats: ContainerStatsPayload): number {
  const current = stats.cpu_stats;
  const previous = stats.precpu_stats;
  const cpuDelta = current.cpu_usage.total_usage - (previous?.cpu_usage?.total_usage ?? 0);
  const systemDelta = (current.system_cpu_usage ?? 0) - (previous?.system_cpu_usage ?? 0);
  let onlineCpus = current.online_cpus ?? 0;
  if (onlineCpus === 0) {
    onlineCpus = current.cpu_usage.percpu_usage?.length ?? 0;
  }

  if (systemDelta > 0 && cpuDelta > 0) {
    return (cpuDelta / systemDelta) * onlineCpus * 100;
  }
  return 0;
}

/** Memory usage minus the inactive page cache (cgroup v1, then v2) */
export function memoryUsedNoCache(stats: ContainerStatsPayload): number {
  const usage = stats.memory_stats.usage ?? 0;
  const detail = stats.memory_stats.stats ?? {};

  const v1 = detail["total_inactive_file"];
  if (v1 !== undefined && v1 < usage) return usage - v1;

  const v2 = detail["inactive_file"] ?? 0;
  if (v2 < usage) return usage - v2;

  return usage;
}

function networkTotals(stats: ContainerStatsPayload): [number, number] {
  let rx = 0;
  let tx = 0;
  for (const iface of Object.values(stats.networks ?? {})) {
    rx += iface.rx_bytes;
    tx += iface.tx_bytes;
  }
  return [rx, tx];
}

function blockIoTotals(stats: ContainerStatsPayload): [number, number] {
  let read = 0;
  let write = 0;
  for (const entry of stats.blkio_stats?.io_service_bytes_recursive ?? []) {
    const op = entry.op.charAt(0).toLowerCase();
    if (op === "r") read += entry.value;
    else if (op === "w") write += entry.value;
  }
  return [read, write];
}

// ---------------------------------------------------------------------------
// Units
// ---------------------------------------------------------------------------

/** Binary units, 4 significant digits: 1610612736 → "1.5GiB" */
export function binarySize(bytes: number): string {
  return scaledSize(bytes, 1024, BINARY_UNITS, 4);
}

/** Decimal units, 3 significant digits: 848000 → "848kB" */
export function decimalSize(bytes: number): string {
  return scaledSize(bytes, 1000, DECIMAL_UNITS, 3);
}

function scaledSize(size: number, base: number, units: string[], precision: number): string {
  let i = 0;
  while (size >= base && i < units.length - 1) {
    size /= base;
    i++;
  }
  return `${significant(size, precision)}${units[i]}`;
}

/** Shortest rendering of `n` rounded to `digits` significant digits */
function significant(n: number, digits: number): string {
  if (n === 0) return "0";
  return String(Number(n.toPrecision(digits)));
}
