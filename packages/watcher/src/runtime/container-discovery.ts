/**
 * Finds the running workload containers and parses
 * the task and job identifiers out of their names.
 *
 * Names look like `<prefix>_<type>_<task>_<job>_<n>` or
 * `<prefix>_<task>_<job>_<n>`; the type token and anything after the job
 * id are not used.
 */

import type { WorkloadContainer } from "@resource-watcher/shared";
import type { Logger } from "../logger.js";
import { DiscoveryError, NameParseError, errorMessage } from "../errors.js";
import { withTimeout } from "../util/timeout.js";
import type { ContainerRuntime, ContainerSummary } from "./docker-runtime.js";

const NAME_DELIMITER = "_";
const NUMERIC = /^\d+$/;

export interface DiscoveryResult {
  containers: WorkloadContainer[];
  /** Prefixed containers whose names did not parse */
  skipped: NameParseError[];
}

export interface ContainerDiscoveryOptions {
  prefix: string;
  logger: Logger;
  /** Budget for the list call in ms (default: 10000) */
  timeoutMs?: number;
}

export class ContainerDiscovery {
  private runtime: ContainerRuntime;
  private prefix: string;
  private logger: Logger;
  private timeoutMs: number;

  constructor(runtime: ContainerRuntime, options: ContainerDiscoveryOptions) {
    this.runtime = runtime;
    this.prefix = options.prefix;
    this.logger = options.logger;
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  /**
   * List running containers carrying the prefix. Throws DiscoveryError when
   * the runtime cannot be queried; unparseable names are reported in
   * `skipped` and never abort the listing.
   */
  async discover(): Promise<DiscoveryResult> {
    let running: ContainerSummary[];
    try {
      running = await withTimeout(
        (signal) => this.runtime.listRunning(signal),
        this.timeoutMs,
        "container list",
      );
    } catch (err) {
      throw new DiscoveryError(`Failed to list containers: ${errorMessage(err)}`, { cause: err });
    }

    const containers: WorkloadContainer[] = [];
    const skipped: NameParseError[] = [];

    for (const { id, name } of running) {
      if (!name.startsWith(this.prefix)) continue;
      try {
        const { taskId, jobId } = parseContainerName(name, this.prefix);
        containers.push({ id, name, taskId, jobId });
      } catch (err) {
        if (!(err instanceof NameParseError)) throw err;
        this.logger.warn({ container: name }, err.message);
        skipped.push(err);
      }
    }

    this.logger.debug(
      { found: containers.length, skipped: skipped.length },
      "discovered workload containers",
    );
    return { containers, skipped };
  }
}

/**
 * Parse task and job ids from a container name. The task id is the first
 * all-digit segment after the prefix tokens; the job id is the segment
 * right after it.
 */
export function parseContainerName(
  name: string,
  prefix: string,
): { taskId: number; jobId: number } {
  if (!name.startsWith(prefix)) {
    throw new NameParseError(name, `does not start with "${prefix}"`);
  }

  const prefixTokens = prefix.split(NAME_DELIMITER).length;
  const segments = name.split(NAME_DELIMITER);
  if (segments.length < prefixTokens + 2) {
    throw new NameParseError(
      name,
      `has ${segments.length} segments, expected at least ${prefixTokens + 2}`,
    );
  }

  const rest = segments.slice(prefixTokens);
  const taskIndex = rest.findIndex((s) => NUMERIC.test(s));
  if (taskIndex < 0) {
    throw new NameParseError(name, "has no numeric task id");
  }
  const jobSegment = rest[taskIndex + 1];
  if (jobSegment === undefined || !NUMERIC.test(jobSegment)) {
    throw new NameParseError(name, "has no numeric job id after the task id");
  }

  return {
    taskId: toId(name, rest[taskIndex], "task"),
    jobId: toId(name, jobSegment, "job"),
  };
}

/** A digit segment as an id, refusing values that would not print back the same */
function toId(name: string, segment: string, role: "task" | "job"): number {
  if (segment.length > 1 && segment.startsWith("0")) {
    throw new NameParseError(name, `has a ${role} id with a leading zero: ${segment}`);
  }
  const id = Number(segment);
  if (!Number.isSafeInteger(id)) {
    throw new NameParseError(name, `has a ${role} id too large to represent: ${segment}`);
  }
  return id;
}
