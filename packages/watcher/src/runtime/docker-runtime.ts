/**
 * Container runtime access.
 *
 * The watcher only observes containers: it lists the running ones, takes a
 * single non-streaming stats reading and asks for their host process ids.
 * DockerRuntime implements this over the Docker Engine API using dockerode;
 * tests substitute a fake ContainerRuntime.
 */

import Docker from "dockerode";
import {
  ContainerStatsSchema,
  ContainerSummarySchema,
  ContainerTopSchema,
  PayloadError,
  parsePayload,
  type ContainerStatsPayload,
} from "./schemas.js";

/** A running container as listed by the runtime */
export interface ContainerSummary {
  id: string;
  /** Primary name, without Docker's leading "/" */
  name: string;
}

/**
 * Every call takes an optional AbortSignal; aborting it cancels the request
 * to the runtime.
 */
export interface ContainerRuntime {
  /** List running containers */
  listRunning(signal?: AbortSignal): Promise<ContainerSummary[]>;

  /** Take one point-in-time stats reading */
  stats(containerId: string, signal?: AbortSignal): Promise<ContainerStatsPayload>;

  /** Host process ids of every process inside the container */
  listProcessIds(containerId: string, signal?: AbortSignal): Promise<number[]>;
}

// ---------------------------------------------------------------------------
// DockerRuntime
// ---------------------------------------------------------------------------

export class DockerRuntime implements ContainerRuntime {
  private docker: Docker;

  constructor(options?: { socketPath?: string }) {
    this.docker = new Docker({
      socketPath: options?.socketPath || "/var/run/docker.sock",
    });
  }

  async listRunning(signal?: AbortSignal): Promise<ContainerSummary[]> {
    const containers: unknown[] = await this.docker.listContainers({
      all: false,
      abortSignal: signal,
    });
    return containers.map((raw) => {
      const info = parsePayload(ContainerSummarySchema, raw, "container list");
      return { id: info.Id, name: info.Names[0].replace(/^\//, "") };
    });
  }

  async stats(containerId: string, signal?: AbortSignal): Promise<ContainerStatsPayload> {
    // dockerode reads abortSignal from the options of every call, but its
    // typings for stats() and top() leave it out
    const options = { stream: false as const, abortSignal: signal };
    const raw: unknown = await this.docker.getContainer(containerId).stats(options);
    return parsePayload(ContainerStatsSchema, raw, "container stats");
  }

  async listProcessIds(containerId: string, signal?: AbortSignal): Promise<number[]> {
    const options = { abortSignal: signal };
    const raw: unknown = await this.docker.getContainer(containerId).top(options);
    const top = parsePayload(ContainerTopSchema, raw, "container top");
    return pidsFromTop(top.Titles, top.Processes ?? []);
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Extract host pids from a `docker top` table. The PID column is found by
 * its title because the column order depends on the ps arguments in use.
 */
export function pidsFromTop(titles: string[], processes: string[][]): number[] {
  const column = titles.indexOf("PID");
  if (column < 0) {
    throw new PayloadError("container top", ["no PID column"]);
  }

  const pids: number[] = [];
  for (const row of processes) {
    const value = row[column];
    if (value !== undefined && /^\d+$/.test(value)) {
      pids.push(Number(value));
    }
  }
  return pids;
}
