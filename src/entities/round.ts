import { Schema } from "effect";
import * as Block from "./block";
import * as Primitives from "./primitives";

// ============================================================================
// ROUND AGGREGATE
// ============================================================================

/** Majority picks of one round, rebuilt from scratch every round */
export const RoundAggregateSchema = Schema.Struct({
  majorityHeight: Primitives.NonNegativeIntSchema,
  // most common tip id among nodes at `majorityHeight`
  majorityHash: Block.BlockIdSchema,
});

export type RoundAggregate = typeof RoundAggregateSchema.Type;

export const makeAggregate = RoundAggregateSchema.make;

// ============================================================================
// ROUND RECORD
// ============================================================================

/** One node's observable state after a round, as written to reports */
export const RoundRecordSchema = Schema.Struct({
  round: Primitives.NonNegativeIntSchema,
  nodeId: Schema.propertySignature(Primitives.NodeIdSchema).pipe(
    Schema.fromKey("node_id")
  ),
  height: Primitives.NonNegativeIntSchema,
  // tip id, possibly truncated for display
  hash: Schema.String,
});

export type RoundRecord = typeof RoundRecordSchema.Type;

export const makeRecord = RoundRecordSchema.make;

/** Report file content: records ordered by round, then node order */
export const RoundReportSchema = Schema.Array(RoundRecordSchema);
