/**
 * Typed failures of the sampling pipeline.
 *
 * Only ConfigError is fatal, and only at startup. Every other kind is
 * scoped to a cycle, a container, a task id or a single record and is
 * logged and absorbed by the component that raised it.
 */

export type WatcherErrorKind =
  | "config"
  | "discovery"
  | "name-parse"
  | "stats"
  | "gpu-query"
  | "metadata"
  | "persistence";

export abstract class WatcherError extends Error {
  abstract readonly kind: WatcherErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid startup configuration */
export class ConfigError extends WatcherError {
  readonly kind = "config";

  constructor(
    message: string,
    readonly details: { path: string; message: string }[] = [],
  ) {
    super(message);
  }
}

/** The container list could not be fetched; the cycle sees zero containers */
export class DiscoveryError extends WatcherError {
  readonly kind = "discovery";
}

/** A prefixed container name did not carry task and job identifiers */
export class NameParseError extends WatcherError {
  readonly kind = "name-parse";

  constructor(readonly containerName: string, reason: string) {
    super(`Container name "${containerName}" ${reason}`);
  }
}

/** Stats for one container could not be fetched or understood */
export class StatsError extends WatcherError {
  readonly kind = "stats";

  constructor(readonly containerName: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** The cycle-wide GPU device or process query failed */
export class GpuQueryError extends WatcherError {
  readonly kind = "gpu-query";
}

/** A metadata file existed but could not be used */
export class MetadataError extends WatcherError {
  readonly kind = "metadata";

  constructor(readonly path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** A record could not be appended to its sink */
export class PersistenceError extends WatcherError {
  readonly kind = "persistence";

  constructor(readonly path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** Human-readable message of any thrown value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
