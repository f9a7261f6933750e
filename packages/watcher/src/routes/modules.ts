import type { FastifyPluginAsync } from "fastify";
import type { ModulesResponse } from "@resource-watcher/shared";

/** Module names resolved so far, ordered by task id */
export const moduleRoutes: FastifyPluginAsync = async (app) => {
  app.get("/", async (_request, reply) => {
    const payload: ModulesResponse = { modules: app.metadata.entries() };
    return reply.send(payload);
  });
};
