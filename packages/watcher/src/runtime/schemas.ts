/**
 * TypeBox schemas for Docker Engine payloads.
 *
 * Only the fields the watcher reads are declared; everything else in the
 * payload is allowed and ignored. Each schema is the single place where a
 * change in the engine's output format has to be handled.
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

// ---------------------------------------------------------------------------
// Container list entry (GET /containers/json)
// ---------------------------------------------------------------------------

export const ContainerSummarySchema = Type.Object({
  Id: Type.String({ minLength: 1 }),
  Names: Type.Array(Type.String(), { minItems: 1 }),
});

// ---------------------------------------------------------------------------
// Stats (GET /containers/{id}/stats?stream=false)
// ---------------------------------------------------------------------------

const CpuStatsSchema = Type.Object({
  cpu_usage: Type.Object({
    total_usage: Type.Number(),
    percpu_usage: Type.Optional(Type.Union([Type.Array(Type.Number()), Type.Null()])),
  }),
  system_cpu_usage: Type.Optional(Type.Number()),
  online_cpus: Type.Optional(Type.Number()),
});

const BlkioEntrySchema = Type.Object({
  op: Type.String(),
  value: Type.Number(),
});

export const ContainerStatsSchema = Type.Object({
  name: Type.Optional(Type.String()),
  cpu_stats: CpuStatsSchema,
  precpu_stats: Type.Optional(Type.Partial(CpuStatsSchema)),
  memory_stats: Type.Object({
    usage: Type.Optional(Type.Number()),
    limit: Type.Optional(Type.Number()),
    stats: Type.Optional(Type.Record(Type.String(), Type.Number())),
  }),
  networks: Type.Optional(
    Type.Record(
      Type.String(),
      Type.Object({
        rx_bytes: Type.Number(),
        tx_bytes: Type.Number(),
      }),
    ),
  ),
  blkio_stats: Type.Optional(
    Type.Object({
      io_service_bytes_recursive: Type.Optional(
        Type.Union([Type.Array(BlkioEntrySchema), Type.Null()]),
      ),
    }),
  ),
  pids_stats: Type.Optional(
    Type.Object({
      current: Type.Optional(Type.Number()),
    }),
  ),
});

export type ContainerStatsPayload = Static<typeof ContainerStatsSchema>;

// ---------------------------------------------------------------------------
// Processes (GET /containers/{id}/top)
// ---------------------------------------------------------------------------

export const ContainerTopSchema = Type.Object({
  Titles: Type.Array(Type.String()),
  Processes: Type.Union([Type.Array(Type.Array(Type.String())), Type.Null()]),
});

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/** A payload that did not match its schema */
export class PayloadError extends Error {
  constructor(
    readonly payload: string,
    readonly issues: string[],
  ) {
    super(`Unexpected ${payload} payload: ${issues.join("; ")}`);
    this.name = "PayloadError";
  }
}

/** Check a payload against its schema, throwing PayloadError on mismatch */
export function parsePayload<T extends TSchema>(
  schema: T,
  value: unknown,
  payload: string,
): Static<T> {
  if (Value.Check(schema, value)) return value;
  const issues = [...Value.Errors(schema, value)]
    .slice(0, 3)
    .map((e) => `${e.path || "/"} ${e.message}`);
  throw new PayloadError(payload, issues);
}
