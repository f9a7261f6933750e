import { CommanderError } from "commander";
import { loadConfig, type WatcherConfig } from "./config.js";
import { ConfigError } from "./errors.js";
import { createLogger } from "./logger.js";
import { DockerRuntime } from "./runtime/docker-runtime.js";
import { ContainerDiscovery } from "./runtime/container-discovery.js";
import { StatsCollector } from "./runtime/stats-collector.js";
import { NvidiaSmi } from "./gpu/nvidia-smi.js";
import { GpuCorrelator } from "./gpu/gpu-correlator.js";
import { MetadataResolver } from "./metadata/metadata-resolver.js";
import { ModuleStore } from "./store/module-store.js";
import { ResourceMonitor } from "./monitor/resource-monitor.js";
import { CycleScheduler } from "./monitor/cycle-scheduler.js";
import { buildApp } from "./app.js";

let config: WatcherConfig;
try {
  config = loadConfig();
} catch (err) {
  if (err instanceof CommanderError) process.exit(err.exitCode);
  if (!(err instanceof ConfigError)) throw err;
  console.error(err.message);
  process.exit(1);
}

const logger = createLogger({ level: config.logLevel, logFile: config.logFile });

// ---------------------------------------------------------------------------
// Components
// ---------------------------------------------------------------------------

const runtime = new DockerRuntime({ socketPath: config.dockerSocket });
const timeoutMs = config.commandTimeoutMs;

const discovery = new ContainerDiscovery(runtime, {
  prefix: config.containerPrefix,
  logger: logger.child({ component: "discovery" }),
  timeoutMs,
});
const stats = new StatsCollector(runtime, {
  logger: logger.child({ component: "stats" }),
  timeoutMs,
});
const gpu = new GpuCorrelator(
  new NvidiaSmi({
    binary: config.nvidiaSmiPath,
    logger: logger.child({ component: "nvidia-smi" }),
    timeoutMs,
  }),
  { logger: logger.child({ component: "gpu" }) },
);
const metadata = new MetadataResolver({
  metadataRoot: config.metadataRoot,
  workerTypes: config.workerTypes,
  logger: logger.child({ component: "metadata" }),
});
const store = new ModuleStore({
  outputDir: config.outputDir,
  idleCycles: config.sinkIdleCycles,
  logger: logger.child({ component: "store" }),
});

const monitor = new ResourceMonitor(
  { discovery, runtime, stats, gpu, metadata, store },
  { logger: logger.child({ component: "monitor" }), concurrency: config.concurrency, timeoutMs },
);
const scheduler = new CycleScheduler(() => monitor.runCycle(), {
  intervalMs: config.intervalSeconds * 1000,
  logger: logger.child({ component: "scheduler" }),
});

// ---------------------------------------------------------------------------
// Status API (optional)
// ---------------------------------------------------------------------------

const app =
  config.statusPort === undefined
    ? null
    : await buildApp({
        logger: logger.child({ component: "api" }),
        monitor,
        scheduler,
        metadata,
        intervalSeconds: config.intervalSeconds,
      });

if (app && config.statusPort !== undefined) {
  try {
    await app.listen({ port: config.statusPort, host: config.statusHost });
  } catch (err) {
    logger.error({ err }, "failed to start the status API");
    process.exit(1);
  }
}

// ---------------------------------------------------------------------------
// Start / shutdown
// ---------------------------------------------------------------------------

logger.info(
  {
    intervalSeconds: config.intervalSeconds,
    prefix: config.containerPrefix,
    outputDir: config.outputDir,
    metadataRoot: config.metadataRoot,
  },
  "module resource watcher started",
);
scheduler.start();

let stopping = false;

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  if (stopping) return;
  stopping = true;
  logger.info({ signal }, "stopping after the current cycle");

  await scheduler.stop();
  await store.close();
  if (app) await app.close();
  logger.info("module resource watcher stopped");
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, "shutdown failed");
        process.exit(1);
      },
    );
  });
}
