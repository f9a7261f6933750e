/**
 * Module Store — append-only CSV sinks partitioned by module and task.
 *
 * Layout: `<outputDir>/<sanitized module>/<task id>.csv`. A sink's
 * directory and file are created on first use. Its handle stays open
 * until close(), or until endCycle() finds it unwritten for `idleCycles`
 * cycles; a later record reopens it. The header is written once, only when the file was empty
 * when first opened. Writes to one sink are strictly serialized; each
 * append is a single write() on the handle, so a crash loses at most the
 * record being written.
 *
 * When the module directory or its file cannot be used, the record goes
 * to `<outputDir>/<task id>.csv` instead; if that fails too it is dropped
 * and logged.
 */

import { mkdir, open, type FileHandle } from "node:fs/promises";
import { dirname, join } from "node:path";
import type { MonitoringRecord } from "@resource-watcher/shared";
import type { Logger } from "../logger.js";
import { PersistenceError, errorMessage } from "../errors.js";
import { headerRow, recordToRow } from "./csv.js";
import { sanitizeModuleName } from "./sanitize.js";

export const SINK_EXTENSION = ".csv";

interface Sink {
  path: string;
  handle: FileHandle;
  /** Set after the first successful write to an empty file; never reset */
  headerWritten: boolean;
  /** Cycle of the last write (or of the open) */
  lastCycle: number;
}

export type AppendOutcome =
  | { status: "written"; path: string }
  | { status: "fallback"; path: string; error: PersistenceError }
  | { status: "dropped"; error: PersistenceError };

export interface ModuleStoreOptions {
  /** Root of the sink tree (default: "module_resource") */
  outputDir?: string;
  /** Cycles a sink may go unwritten before its handle is closed (default: 60) */
  idleCycles?: number;
  logger: Logger;
}

export class ModuleStore {
  private outputDir: string;
  private logger: Logger;
  private idleCycles: number;
  private closed = false;
  private cycle = 0;

  /** Open sinks keyed by file path */
  private sinks = new Map<string, Sink>();

  /** Tail of each sink's write queue */
  private queues = new Map<string, Promise<unknown>>();

  constructor(options: ModuleStoreOptions) {
    this.outputDir = options.outputDir ?? "module_resource";
    this.idleCycles = Math.max(1, options.idleCycles ?? 60);
    this.logger = options.logger;
  }

  /** Path of the sink a record for this module and task is written to */
  sinkPath(moduleName: string, taskId: number): string {
    return join(this.outputDir, sanitizeModuleName(moduleName), `${taskId}${SINK_EXTENSION}`);
  }

  /** Path used when the module's own sink cannot be written */
  fallbackPath(taskId: number): string {
    return join(this.outputDir, `${taskId}${SINK_EXTENSION}`);
  }

  /** Append a record to its sink, falling back to the top-level location */
  async append(record: MonitoringRecord): Promise<AppendOutcome> {
    if (this.closed) {
      const error = new PersistenceError(this.outputDir, "Store is closed");
      this.logger.error({ taskId: record.taskId }, error.message);
      return { status: "dropped", error };
    }

    const primary = this.sinkPath(record.moduleName, record.taskId);
    const primaryError = await this.tryWrite(primary, record);
    if (!primaryError) return { status: "written", path: primary };
    this.logger.warn(
      { taskId: record.taskId, path: primary, err: primaryError },
      "cannot write module sink, using fallback location",
    );

    const fallback = this.fallbackPath(record.taskId);
    const fallbackError = await this.tryWrite(fallback, record);
    if (!fallbackError) return { status: "fallback", path: fallback, error: primaryError };
    this.logger.error(
      { taskId: record.taskId, path: fallback, err: fallbackError },
      "record dropped, fallback sink not writable",
    );
    return { status: "dropped", error: fallbackError };
  }

  /** Paths of the currently open sinks */
  openSinks(): string[] {
    return [...this.sinks.keys()];
  }

  /**
   * Mark the end of a cycle and close the sinks nobody wrote to in the
   * last `idleCycles` cycles. Returns the closed paths.
   */
  async endCycle(): Promise<string[]> {
    if (this.closed) return [];
    this.cycle++;

    const idle = [...this.sinks.values()].filter(
      (sink) => this.cycle - sink.lastCycle > this.idleCycles && !this.queues.has(sink.path),
    );
    for (const sink of idle) this.sinks.delete(sink.path);
    await this.closeSinks(idle);
    if (idle.length > 0) {
      this.logger.debug({ paths: idle.map((s) => s.path) }, "closed idle sinks");
    }
    return idle.map((s) => s.path);
  }

  /** Wait for queued writes, then close every sink */
  async close(): Promise<void> {
    this.closed = true;
    await Promise.allSettled(this.queues.values());
    const sinks = [...this.sinks.values()];
    this.sinks.clear();
    this.queues.clear();
    await this.closeSinks(sinks);
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private async closeSinks(sinks: Sink[]): Promise<void> {
    const results = await Promise.allSettled(sinks.map((s) => s.handle.close()));
    results.forEach((result, i) => {
      if (result.status === "rejected") {
        this.logger.warn({ path: sinks[i].path, err: result.reason }, "failed to close sink");
      }
    });
  }

  private async tryWrite(path: string, record: MonitoringRecord): Promise<PersistenceError | null> {
    try {
      await this.write(path, record);
      return null;
    } catch (err) {
      return new PersistenceError(path, `Cannot append to ${path}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  /** Queue a write behind any pending write to the same sink */
  private write(path: string, record: MonitoringRecord): Promise<void> {
    const previous = this.queues.get(path) ?? Promise.resolve();
    const next = previous.catch(() => undefined).then(() => this.writeNow(path, record));
    this.queues.set(path, next);
    const clear = () => {
      if (this.queues.get(path) === next) this.queues.delete(path);
    };
    void next.then(clear, clear);
    return next;
  }

  private async writeNow(path: string, record: MonitoringRecord): Promise<void> {
    const sink = await this.openSink(path);
    const row = recordToRow(record);
    if (sink.headerWritten) {
      await sink.handle.write(row);
    } else {
      await sink.handle.write(headerRow() + row);
      sink.headerWritten = true;
    }
    sink.lastCycle = this.cycle;
    this.logger.debug({ path, taskId: record.taskId }, "appended record");
  }

  private async openSink(path: string): Promise<Sink> {
    const existing = this.sinks.get(path);
    if (existing) return existing;

    await mkdir(dirname(path), { recursive: true });
    const handle = await open(path, "a");
    let size: number;
    try {
      ({ size } = await handle.stat());
    } catch (err) {
      await handle.close().catch((closeErr: unknown) => {
        this.logger.debug({ path, err: closeErr }, "failed to close sink after stat error");
      });
      throw err;
    }

    const sink: Sink = { path, handle, headerWritten: size > 0, lastCycle: this.cycle };
    this.sinks.set(path, sink);
    if (size === 0) {
      this.logger.info({ path }, "created sink");
    }
    return sink;
  }
}
