/**
 * Node Service — Effect Service Layer
 *
 * Node creation and block proposal. Queries and chain transformations are
 * pure and live in `entities/node`.
 *
 * @module NodeService
 * @since 0.1.0
 */

import { Context, Effect, Layer } from "effect";
import type * as Block from "../entities/block";
import * as Node from "../entities/node";
import type * as Primitives from "../entities/primitives";
import { BlockService, BlockServiceLive } from "./block";

/**
 * @category Services
 * @since 0.1.0
 */
export class NodeService extends Context.Tag("NodeService")<
  NodeService,
  {
    /**
     * New node whose chain holds only genesis.
     *
     * @category Constructors
     * @since 0.1.0
     */
    readonly create: (nodeId: Primitives.NodeId) => Node.NodeState;

    /**
     * Candidate next block: `height + 1`, parented on the current tip.
     * Does not change the node.
     *
     * @category Operations
     * @since 0.1.0
     */
    readonly propose: (node: Node.NodeState) => Effect.Effect<Block.Block>;
  }
>() {}

/**
 * Requires: BlockIdGenerator
 *
 * @category Layers
 * @since 0.1.0
 */
export const NodeServiceLive = Layer.effect(
  NodeService,
  Effect.gen(function* () {
    const blocks = yield* BlockService;

    return NodeService.of({
      create: Node.make,

      propose: (node) => {
        const latest = Node.tip(node);
        return blocks.create(latest.height + 1, latest.id);
      },
    });
  })
).pipe(Layer.provide(BlockServiceLive));
