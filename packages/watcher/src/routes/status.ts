/**
 * Status API routes: recent cycle summaries.
 */

import type { FastifyPluginAsync } from "fastify";
import type { StatusResponse } from "@resource-watcher/shared";
import { StatusQuery, DEFAULT_CYCLE_LIMIT } from "./status.schemas.js";

export const statusRoutes: FastifyPluginAsync = async (app) => {
  // -------------------------------------------------------------------------
  // GET /api/status?limit=60
  // -------------------------------------------------------------------------
  app.get<{ Querystring: StatusQuery }>(
    "/",
    { schema: { querystring: StatusQuery } },
    async (request, reply) => {
      const limit = request.query.limit ?? DEFAULT_CYCLE_LIMIT;
      const payload: StatusResponse = {
        intervalSeconds: app.intervalSeconds,
        cycles: app.monitor.getSummaries(limit),
      };
      return reply.send(payload);
    },
  );
};
