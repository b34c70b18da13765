/**
 * Node — a single participant's local chain as immutable state.
 *
 * This module encapsulates:
 * - The `NodeState` schema and its constructors
 * - Pure queries (tip, height)
 * - Pure transformations (append, rollback, rollbackWhile)
 *
 * Every transformation returns a new `NodeState`; rejected operations return
 * the input unchanged instead of failing.
 *
 * Note: proposing needs a fresh block id, so it lives in NodeService.
 */

import { Chunk, Schema } from "effect";
import type { Predicate } from "effect/Predicate";
import * as Block from "./block";
import * as Primitives from "./primitives";

// ============================================================================
// TYPES
// ============================================================================

/** Node state with a `Chunk` chain whose head is always genesis */
export const NodeStateSchema = Schema.Struct({
  nodeId: Primitives.NodeIdSchema,
  chain: Schema.NonEmptyChunk(Block.BlockSchema),
});

export type NodeState = typeof NodeStateSchema.Type;

/** Outcome of a conditional append */
export interface AppendResult {
  readonly appended: boolean;
  readonly node: NodeState;
}

// ============================================================================
// CONSTRUCTORS
// ============================================================================

export const makeState = NodeStateSchema.make;

/** Fresh node holding only the shared genesis block */
export const make = (nodeId: Primitives.NodeId): NodeState =>
  makeState({ nodeId, chain: Chunk.of(Block.genesis) });

// ============================================================================
// QUERIES
// ============================================================================

export const tip = (node: NodeState): Block.Block =>
  Chunk.lastNonEmpty(node.chain);

export const height = (node: NodeState): Primitives.NonNegativeInt =>
  tip(node).height;

// ============================================================================
// TRANSFORMATIONS
// ============================================================================

/**
 * Append `block` iff it sits at `height + 1` and names the tip as its parent.
 * A rejected block leaves the node as it was.
 */
export const append = (node: NodeState, block: Block.Block): AppendResult =>
  Block.extendsBlock(block, tip(node))
    ? {
        appended: true,
        node: makeState({ ...node, chain: Chunk.append(node.chain, block) }),
      }
    : { appended: false, node };

/** Drop the tip; genesis is never removed */
export const rollback = (node: NodeState): NodeState => {
  const rest = Chunk.dropRight(node.chain, 1);
  return Chunk.isNonEmpty(rest) ? makeState({ ...node, chain: rest }) : node;
};

/** Roll back while `predicate` holds and more than genesis remains */
export const rollbackWhile = (
  node: NodeState,
  predicate: Predicate<NodeState>
): NodeState => {
  let current = node;
  while (predicate(current) && Chunk.size(current.chain) > 1)
    current = rollback(current);
  return current;
};
