/**
 * Watcher configuration.
 *
 * Command-line flags override environment variables, which override
 * defaults. The merged object is converted and validated against
 * WatcherConfigSchema; anything invalid is a ConfigError.
 */

import { Command, CommanderError } from "commander";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigError, errorMessage } from "./errors.js";

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

export const WatcherConfigSchema = Type.Object({
  /** Seconds between cycle starts */
  intervalSeconds: Type.Number({ exclusiveMinimum: 0 }),
  logLevel: Type.Union([
    Type.Literal("DEBUG"),
    Type.Literal("INFO"),
    Type.Literal("WARNING"),
    Type.Literal("ERROR"),
  ]),
  logFile: Type.Optional(Type.String({ minLength: 1 })),
  containerPrefix: Type.String({ minLength: 1 }),
  outputDir: Type.String({ minLength: 1 }),
  metadataRoot: Type.String({ minLength: 1 }),
  workerTypes: Type.Array(Type.String({ minLength: 1 }), { minItems: 1 }),
  /** Containers processed in parallel within one cycle */
  concurrency: Type.Integer({ minimum: 1 }),
  dockerSocket: Type.String({ minLength: 1 }),
  nvidiaSmiPath: Type.String({ minLength: 1 }),
  commandTimeoutMs: Type.Integer({ minimum: 1 }),
  /** Cycles a CSV sink may go unwritten before its file handle is closed */
  sinkIdleCycles: Type.Integer({ minimum: 1 }),
  /** Status API port; the server is disabled when absent */
  statusPort: Type.Optional(Type.Integer({ minimum: 1, maximum: 65535 })),
  statusHost: Type.String({ minLength: 1 }),
});

export type WatcherConfig = Static<typeof WatcherConfigSchema>;

export const DEFAULT_CONFIG: WatcherConfig = {
  intervalSeconds: 5,
  logLevel: "INFO",
  containerPrefix: "wemol_rc_task",
  outputDir: "module_resource",
  metadataRoot: "/data/PRG/RCall",
  workerTypes: ["GPU", "CPU", "AF2", "ALL"],
  concurrency: 1,
  dockerSocket: "/var/run/docker.sock",
  nvidiaSmiPath: "nvidia-smi",
  commandTimeoutMs: 10_000,
  sinkIdleCycles: 60,
  statusHost: "0.0.0.0",
};

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

type RawConfig = Partial<Record<keyof WatcherConfig, unknown>>;

/** Environment variable → config key */
const ENV_KEYS: Record<string, keyof WatcherConfig> = {
  WATCH_INTERVAL: "intervalSeconds",
  LOG_LEVEL: "logLevel",
  LOG_FILE: "logFile",
  CONTAINER_PREFIX: "containerPrefix",
  OUTPUT_DIR: "outputDir",
  METADATA_ROOT: "metadataRoot",
  WATCH_CONCURRENCY: "concurrency",
  DOCKER_SOCKET: "dockerSocket",
  NVIDIA_SMI: "nvidiaSmiPath",
  COMMAND_TIMEOUT_MS: "commandTimeoutMs",
  SINK_IDLE_CYCLES: "sinkIdleCycles",
  STATUS_PORT: "statusPort",
  STATUS_HOST: "statusHost",
};

function fromEnv(env: NodeJS.ProcessEnv): RawConfig {
  const raw: RawConfig = {};
  for (const [name, key] of Object.entries(ENV_KEYS)) {
    const value = env[name];
    if (value !== undefined && value !== "") raw[key] = value;
  }
  return raw;
}

/** Flag values as commander reports them, before conversion */
type FlagValues = {
  interval?: string;
  logLevel?: string;
  logFile?: string;
  prefix?: string;
  outputDir?: string;
  metadataRoot?: string;
  concurrency?: string;
  statusPort?: string;
};

function createProgram(): Command {
  return new Command()
    .name("resource-watcher")
    .description("Sample resource usage of workload containers into per-module CSV files")
    .option("--interval <seconds>", "seconds between cycle starts")
    .option("--log-level <level>", "DEBUG, INFO, WARNING or ERROR")
    .option("--log-file <path>", "also write JSON logs to this file")
    .option("--prefix <prefix>", "container name prefix of workload containers")
    .option("--output-dir <dir>", "root directory of the CSV sinks")
    .option("--metadata-root <dir>", "root directory of task metadata")
    .option("--concurrency <n>", "containers processed in parallel")
    .option("--status-port <port>", "serve the status API on this port")
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({ writeErr: () => {} });
}

/**
 * Parse command-line flags. Usage errors become ConfigError; --help is
 * printed by commander and rethrown as its CommanderError (exit code 0).
 */
function parseFlags(argv: string[]): FlagValues {
  const program = createProgram();
  try {
    program.parse(argv, { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError && err.exitCode === 0) throw err;
    throw new ConfigError(errorMessage(err));
  }
  return program.opts<FlagValues>();
}

function fromArgv(argv: string[]): RawConfig {
  const values = parseFlags(argv);
  const raw: RawConfig = {};
  if (values.interval !== undefined) raw.intervalSeconds = values.interval;
  if (values.logLevel !== undefined) raw.logLevel = values.logLevel;
  if (values.logFile !== undefined) raw.logFile = values.logFile;
  if (values.prefix !== undefined) raw.containerPrefix = values.prefix;
  if (values.outputDir !== undefined) raw.outputDir = values.outputDir;
  if (values.metadataRoot !== undefined) raw.metadataRoot = values.metadataRoot;
  if (values.concurrency !== undefined) raw.concurrency = values.concurrency;
  if (values.statusPort !== undefined) raw.statusPort = values.statusPort;
  return raw;
}

/**
 * Merge defaults, environment and flags, then validate.
 * Log level names are accepted in any case.
 */
export function loadConfig(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
): WatcherConfig {
  const merged: RawConfig = { ...DEFAULT_CONFIG, ...fromEnv(env), ...fromArgv(argv) };
  if (typeof merged.logLevel === "string") {
    merged.logLevel = merged.logLevel.toUpperCase();
  }

  const converted = Value.Convert(WatcherConfigSchema, merged);
  if (!Value.Check(WatcherConfigSchema, converted)) {
    const details = [...Value.Errors(WatcherConfigSchema, converted)].map((e) => ({
      path: e.path || "/",
      message: e.message,
    }));
    const summary = details.map((d) => `${d.path}: ${d.message}`).join("; ");
    throw new ConfigError(`Invalid configuration: ${summary}`, details);
  }
  return converted;
}
