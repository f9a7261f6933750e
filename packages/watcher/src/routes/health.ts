import type { FastifyPluginAsync } from "fastify";
import type { HealthResponse } from "@resource-watcher/shared";

export const healthRoutes: FastifyPluginAsync = async (app) => {
  app.get("/", async (_request, reply) => {
    const running = app.scheduler.isRunning;

    const payload: HealthResponse = {
      status: running ? "ok" : "degraded",
      running,
      lastCycleAt: app.monitor.lastSummary?.startedAt ?? null,
      timestamp: new Date().toISOString(),
    };

    return reply.status(running ? 200 : 503).send(payload);
  });
};
