/**
 * Typebox schemas for the status API routes.
 */

import { Type, type Static } from "@sinclair/typebox";

// ---------------------------------------------------------------------------
// Query params
// ---------------------------------------------------------------------------

export const DEFAULT_CYCLE_LIMIT = 60;

export const StatusQuery = Type.Object({
  limit: Type.Optional(
    Type.Integer({ minimum: 1, maximum: 360, default: DEFAULT_CYCLE_LIMIT }),
  ),
});

export type StatusQuery = Static<typeof StatusQuery>;
