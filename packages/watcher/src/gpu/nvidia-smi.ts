/**
 * nvidia-smi telemetry source.
 *
 * Every query asks for CSV without header or units. Each output line goes
 * through a named line parser that returns either a typed value or a
 * LineParseFailure; bad lines are skipped, a failed invocation throws.
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import {
  NOT_AVAILABLE,
  type GpuDeviceSnapshot,
  type GpuProcessAssoc,
  type GpuTelemetrySource,
} from "@resource-watcher/shared";
import type { Logger } from "../logger.js";

const execFileAsync = promisify(execFile);

/** Columns of the device query, in output order */
export const DEVICE_QUERY_FIELDS = [
  "index",
  "uuid",
  "name",
  "memory.total",
  "memory.used",
  "utilization.gpu",
  "utilization.memory",
  "temperature.gpu",
  "fan.speed",
  "power.draw",
  "power.limit",
] as const;

export const COMPUTE_APPS_FIELDS = ["pid", "gpu_uuid", "used_memory"] as const;

/** Values nvidia-smi prints when a sensor is missing */
const UNSUPPORTED = new Set(["[Not Supported]", "[N/A]", "N/A", "[Unknown Error]", ""]);

// ---------------------------------------------------------------------------
// Line parsers
// ---------------------------------------------------------------------------

export interface LineParseFailure {
  line: string;
  reason: string;
}

export type LineParse<T> = { ok: true; value: T } | { ok: false; failure: LineParseFailure };

function fail<T>(line: string, reason: string): LineParse<T> {
  return { ok: false, failure: { line, reason } };
}

function telemetry(raw: string): string {
  return UNSUPPORTED.has(raw) ? NOT_AVAILABLE : raw;
}

function splitCsv(line: string): string[] {
  return line.split(",").map((s) => s.trim());
}

/**
 * Parse one `--query-gpu` line. A device name containing commas spreads
 * over several cells; they are joined back together.
 */
export function parseDeviceLine(line: string): LineParse<GpuDeviceSnapshot> {
  const parts = splitCsv(line);
  const expected = DEVICE_QUERY_FIELDS.length;
  if (parts.length < expected) {
    return fail(line, `expected ${expected} fields, got ${parts.length}`);
  }

  const extra = parts.length - expected;
  const name = parts.slice(2, 3 + extra).join(", ");
  const [
    memoryTotal,
    memoryUsed,
    utilizationGpu,
    utilizationMemory,
    temperature,
    fanSpeed,
    powerDraw,
    powerLimit,
  ] = parts.slice(3 + extra).map(telemetry);

  if (!/^\d+$/.test(parts[0])) {
    return fail(line, `invalid device index "${parts[0]}"`);
  }

  return {
    ok: true,
    value: {
      index: Number(parts[0]),
      uuid: parts[1],
      name,
      memoryTotal,
      memoryUsed,
      utilizationGpu,
      utilizationMemory,
      temperature,
      fanSpeed,
      powerDraw,
      powerLimit,
    },
  };
}

/** Parse one `--query-compute-apps` line */
export function parseComputeAppLine(line: string): LineParse<GpuProcessAssoc> {
  const parts = splitCsv(line);
  if (parts.length < COMPUTE_APPS_FIELDS.length) {
    return fail(line, `expected ${COMPUTE_APPS_FIELDS.length} fields, got ${parts.length}`);
  }
  const [pid, device, usedMemory] = parts;
  if (!/^\d+$/.test(pid)) {
    return fail(line, `invalid pid "${pid}"`);
  }
  if (!device) {
    return fail(line, "missing device uuid");
  }
  return { ok: true, value: { pid: Number(pid), device, usedMemory: telemetry(usedMemory) } };
}

/** Column positions of a pmon table, taken from its header */
export interface PmonColumns {
  gpu: number;
  pid: number;
  /** Frame-buffer memory column; absent unless memory sampling is on */
  fb?: number;
}

/** Read column positions from pmon's first header line (`# gpu pid type ...`) */
export function parsePmonHeader(line: string): PmonColumns | null {
  const titles = line.replace(/^#/, "").trim().split(/\s+/);
  const gpu = titles.indexOf("gpu");
  const pid = titles.indexOf("pid");
  if (gpu < 0 || pid < 0) return null;
  const fb = titles.indexOf("fb");
  return fb < 0 ? { gpu, pid } : { gpu, pid, fb };
}

/** Parse one pmon data row; rows for idle devices carry "-" as pid */
export function parsePmonLine(line: string, columns: PmonColumns): LineParse<GpuProcessAssoc> {
  const parts = line.trim().split(/\s+/);
  const device = parts[columns.gpu];
  const pid = parts[columns.pid];
  if (device === undefined || !/^\d+$/.test(device)) {
    return fail(line, `invalid device index "${device ?? ""}"`);
  }
  if (pid === undefined || !/^\d+$/.test(pid)) {
    return fail(line, `no process on device ${device}`);
  }
  const fb = columns.fb === undefined ? undefined : parts[columns.fb];
  return {
    ok: true,
    value: {
      pid: Number(pid),
      device,
      usedMemory: fb === undefined || fb === "-" ? NOT_AVAILABLE : fb,
    },
  };
}

// ---------------------------------------------------------------------------
// NvidiaSmi
// ---------------------------------------------------------------------------

export interface NvidiaSmiOptions {
  logger: Logger;
  /** Path to the nvidia-smi binary (default: "nvidia-smi" on PATH) */
  binary?: string;
  /** Budget for one invocation in ms (default: 10000) */
  timeoutMs?: number;
}

export class NvidiaSmi implements GpuTelemetrySource {
  private binary: string;
  private timeoutMs: number;
  private logger: Logger;

  constructor(options: NvidiaSmiOptions) {
    this.binary = options.binary ?? "nvidia-smi";
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.logger = options.logger;
  }

  async listDevices(): Promise<GpuDeviceSnapshot[]> {
    const stdout = await this.run([
      `--query-gpu=${DEVICE_QUERY_FIELDS.join(",")}`,
      "--format=csv,noheader,nounits",
    ]);
    return this.collect(lines(stdout), parseDeviceLine);
  }

  /**
   * Compute processes from `--query-compute-apps`; when that lists none,
   * fall back to a single pmon sample, which some drivers populate when
   * the compute-apps query comes back empty.
   */
  async listProcesses(): Promise<GpuProcessAssoc[]> {
    const stdout = await this.run([
      `--query-compute-apps=${COMPUTE_APPS_FIELDS.join(",")}`,
      "--format=csv,noheader,nounits",
    ]);
    const processes = this.collect(lines(stdout), parseComputeAppLine);
    if (processes.length > 0) return processes;

    this.logger.debug("compute-apps query returned no processes, trying pmon");
    const pmon = await this.run(["pmon", "-c", "1", "-s", "um"]);
    return this.parsePmon(pmon);
  }

  private parsePmon(stdout: string): GpuProcessAssoc[] {
    const all = lines(stdout);
    const header = all.find((l) => l.startsWith("#"));
    const columns = header ? parsePmonHeader(header) : null;
    if (!columns) {
      this.logger.debug({ output: stdout }, "pmon output has no usable header");
      return [];
    }
    const rows = all.filter((l) => !l.startsWith("#"));
    return this.collect(rows, (line) => parsePmonLine(line, columns));
  }

  private collect<T>(rows: string[], parse: (line: string) => LineParse<T>): T[] {
    const values: T[] = [];
    for (const row of rows) {
      const result = parse(row);
      if (result.ok) {
        values.push(result.value);
      } else {
        this.logger.debug(result.failure, "skipping nvidia-smi line");
      }
    }
    return values;
  }

  private async run(args: string[]): Promise<string> {
    const { stdout } = await execFileAsync(this.binary, args, {
      timeout: this.timeoutMs,
      encoding: "utf8",
    });
    return stdout;
  }
}

function lines(output: string): string[] {
  return output
    .split("\n")
    .map((l) => l.trim())
    .filter(Boolean);
}
