import "fastify";
import type { ResourceMonitor } from "../monitor/resource-monitor.js";
import type { CycleScheduler } from "../monitor/cycle-scheduler.js";
import type { MetadataResolver } from "../metadata/metadata-resolver.js";

declare module "fastify" {
  interface FastifyInstance {
    monitor: ResourceMonitor;
    scheduler: CycleScheduler;
    metadata: MetadataResolver;
    intervalSeconds: number;
  }
}
