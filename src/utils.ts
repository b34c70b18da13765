/**
 * Display helpers for blocks, chains and round summaries.
 *
 * @since 0.1.0
 */

import { Chunk, Effect, Option } from "effect";
import type * as Block from "./entities/block";
import * as Node from "./entities/node";

// ============================================================================
// FORMATTING UTILITIES
// ============================================================================

/**
 * Leading characters of an identifier
 *
 * @category Pure
 * @example
 * ```typescript
 * shortenId("3f2a9c1e-...") // "3f2a9c"
 * ```
 */
export const shortenId = (id: string, length = 6): string =>
  id.slice(0, length);

/** `Block(h=1, hash=3f2a9c, parent=000000)`, `parent=None` for genesis */
export const formatBlock = (block: Block.Block): string =>
  `Block(h=${block.height}, hash=${shortenId(block.id)}, parent=${Option.match(
    block.parentId,
    { onNone: () => "None", onSome: (id) => shortenId(id) }
  )})`;

export const formatChain = (node: Node.NodeState): string =>
  `[${Chunk.toReadonlyArray(node.chain).map(formatBlock).join(", ")}]`;

/** One summary line per node, as printed after every round */
export const formatNode = (node: Node.NodeState): string =>
  `Node ${node.nodeId} | height=${Node.height(node)} | chain=${formatChain(node)}`;

export const separator = (length = 70, char = "="): string =>
  char.repeat(length);

/** `=== Round 0 ===` style banner */
export const roundBanner = (round: number): string => `=== Round ${round} ===`;

// ============================================================================
// DISPLAY FUNCTIONS (Effect-wrapped for logging)
// ============================================================================

export const displayRound = (
  round: number,
  nodes: ReadonlyArray<Node.NodeState>
) =>
  Effect.gen(function* () {
    yield* Effect.log(roundBanner(round));
    for (const node of nodes)
      yield* Effect.log(formatNode(node)).pipe(
        Effect.annotateLogs({
          nodeId: node.nodeId,
          height: Node.height(node),
          tip: Node.tip(node).id,
        })
      );
  }).pipe(Effect.annotateLogs({ round }), Effect.withLogSpan("displayRound"));
