/**
 * Shapes returned by the status API.
 */

/** Outcome of one discovery → collect → persist pass */
export interface CycleSummary {
  /** ISO 8601 timestamp */
  startedAt: string;
  durationMs: number;
  /** Containers whose name carried the prefix */
  discovered: number;
  /** Containers whose name did not parse */
  skippedNames: number;
  /** Records appended (primary or fallback location) */
  recorded: number;
  statsFailures: number;
  persistFailures: number;
  /** False when the GPU queries failed; null when there was nothing to query for */
  gpuAvailable: boolean | null;
}

export interface HealthResponse {
  status: "ok" | "degraded";
  running: boolean;
  /** ISO 8601 timestamp of the last completed cycle, null before the first */
  lastCycleAt: string | null;
  timestamp: string;
}

export interface StatusResponse {
  intervalSeconds: number;
  cycles: CycleSummary[];
}

export interface ModuleAssignment {
  taskId: number;
  moduleName: string;
}

export interface ModulesResponse {
  modules: ModuleAssignment[];
}
