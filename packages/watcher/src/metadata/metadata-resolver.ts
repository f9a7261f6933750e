/**
 * Maps a task id to the module its job belongs to.
 *
 * Job metadata lives in `task.json` under one of several worker roots at a
 * path derived from the task id. The answer for a task id, including
 * "Unknown", is cached for the life of the process: a module assignment
 * never changes while its task runs, and each task id is probed on disk
 * at most once.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { UNKNOWN_MODULE, type ModuleAssignment } from "@resource-watcher/shared";
import type { Logger } from "../logger.js";
import { MetadataError, errorMessage } from "../errors.js";

/** The part of task.json the watcher reads */
export const TaskMetadataSchema = Type.Object({
  Module: Type.Object({
    Name: Type.String({ minLength: 1 }),
  }),
});

export type TaskMetadata = Static<typeof TaskMetadataSchema>;

const METADATA_FILE = "task.json";
const BLOB_DIR = "work_blob";

/**
 * Candidate path below one worker root:
 * `<root>/work_blob/<digits -4..-2>/<last 2 digits>/<task id>/task.json`.
 * Ids shorter than four digits are left-padded with zeros for the two
 * bucket directories; the leaf directory is the id itself.
 */
export function metadataPath(workerRoot: string, taskId: number): string {
  const leaf = String(taskId);
  const padded = leaf.padStart(4, "0");
  const suffix2 = padded.slice(-2);
  const prev2 = padded.slice(-4, -2);
  return join(workerRoot, BLOB_DIR, prev2, suffix2, leaf, METADATA_FILE);
}

export interface MetadataResolverOptions {
  /** Directory holding the `Worker.<type>` roots, e.g. "/data/PRG/RCall" */
  metadataRoot: string;
  /** Worker types, tried in order */
  workerTypes: string[];
  logger: Logger;
}

export class MetadataResolver {
  private roots: string[];
  private logger: Logger;

  /** task id → module name (or "Unknown"); never evicted */
  private cache = new Map<number, string>();

  /** Probes in progress, so concurrent callers share one filesystem search */
  private inflight = new Map<number, Promise<string>>();

  constructor(options: MetadataResolverOptions) {
    this.roots = options.workerTypes.map((t) => join(options.metadataRoot, `Worker.${t}`));
    this.logger = options.logger;
  }

  /** Module name for a task id, or "Unknown" */
  async resolve(taskId: number): Promise<string> {
    const cached = this.cache.get(taskId);
    if (cached !== undefined) return cached;

    const pending = this.inflight.get(taskId);
    if (pending) return pending;

    const probe = this.probe(taskId)
      .then((moduleName) => {
        this.cache.set(taskId, moduleName);
        return moduleName;
      })
      .finally(() => this.inflight.delete(taskId));
    this.inflight.set(taskId, probe);
    return probe;
  }

  /** Cached assignments, ordered by task id */
  entries(): ModuleAssignment[] {
    return [...this.cache]
      .sort(([a], [b]) => a - b)
      .map(([taskId, moduleName]) => ({ taskId, moduleName }));
  }

  get size(): number {
    return this.cache.size;
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private async probe(taskId: number): Promise<string> {
    for (const root of this.roots) {
      const path = metadataPath(root, taskId);
      try {
        const metadata = await readTaskMetadata(path);
        if (!metadata) continue;
        this.logger.info({ taskId, moduleName: metadata.Module.Name, path }, "resolved task module");
        return metadata.Module.Name;
      } catch (err) {
        this.logger.warn({ taskId, path, err }, errorMessage(err));
      }
    }

    this.logger.warn({ taskId }, "no usable task metadata found, module is Unknown");
    return UNKNOWN_MODULE;
  }
}

/**
 * Read and validate a task.json. Returns null when the file does not exist;
 * throws MetadataError when it exists but cannot be used.
 */
export async function readTaskMetadata(path: string): Promise<TaskMetadata | null> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    if (isNotFound(err)) return null;
    throw new MetadataError(path, `Cannot read ${path}: ${errorMessage(err)}`, { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new MetadataError(path, `Malformed JSON in ${path}: ${errorMessage(err)}`, { cause: err });
  }

  if (!Value.Check(TaskMetadataSchema, parsed)) {
    throw new MetadataError(path, `${path} has no Module.Name`);
  }
  return parsed;
}

function isNotFound(err: unknown): boolean {
  return (
    err instanceof Error &&
    "code" in err &&
    (err.code === "ENOENT" || err.code === "ENOTDIR")
  );
}
