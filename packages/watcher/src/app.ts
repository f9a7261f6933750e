import Fastify, { type FastifyBaseLogger, type FastifyError } from "fastify";

import type { Logger } from "./logger.js";
import type { ResourceMonitor } from "./monitor/resource-monitor.js";
import type { CycleScheduler } from "./monitor/cycle-scheduler.js";
import type { MetadataResolver } from "./metadata/metadata-resolver.js";
import { healthRoutes } from "./routes/health.js";
import { statusRoutes } from "./routes/status.js";
import { moduleRoutes } from "./routes/modules.js";

const isDev = process.env.NODE_ENV !== "production";

export interface BuildAppOptions {
  logger: Logger;
  monitor: ResourceMonitor;
  scheduler: CycleScheduler;
  metadata: MetadataResolver;
  /** Configured cycle interval, echoed by /api/status */
  intervalSeconds: number;
}

/**
 * Build the status API. Exported separately from the server start so
 * tests can use `app.inject()`.
 */
export async function buildApp(opts: BuildAppOptions) {
  const loggerInstance: FastifyBaseLogger = opts.logger;
  const app = Fastify({ loggerInstance });

  app.decorate("monitor", opts.monitor);
  app.decorate("scheduler", opts.scheduler);
  app.decorate("metadata", opts.metadata);
  app.decorate("intervalSeconds", opts.intervalSeconds);

  // ---------------------------------------------------------------------------
  // Global error handler — normalise error responses
  // ---------------------------------------------------------------------------
  app.setErrorHandler((error: FastifyError, _request, reply) => {
    // Validation errors from Typebox schemas (Fastify AJV)
    if (error.validation) {
      const details = error.validation.map((v) => ({
        field:
          v.instancePath ||
          (typeof v.params.missingProperty === "string" ? v.params.missingProperty : "querystring"),
        message: v.message ?? "Invalid value",
      }));
      reply.status(400).send({ error: "Validation failed", details });
      return;
    }

    if (error.statusCode && error.statusCode < 500) {
      reply.status(error.statusCode).send({ error: error.message });
      return;
    }

    reply.status(error.statusCode ?? 500).send({
      error: isDev ? error.message : "Internal server error",
    });
  });

  // ---------------------------------------------------------------------------
  // API routes
  // ---------------------------------------------------------------------------
  await app.register(healthRoutes, { prefix: "/api/health" });
  await app.register(statusRoutes, { prefix: "/api/status" });
  await app.register(moduleRoutes, { prefix: "/api/modules" });

  return app;
}
