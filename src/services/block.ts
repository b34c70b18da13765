/**
 * Block Service — Effect Service Layer
 *
 * Provides block creation as an Effect service. Identifier generation is
 * injected through `BlockIdGenerator` and captured during layer construction.
 *
 * @module BlockService
 * @since 0.1.0
 */

import { Context, Effect, Layer, Option } from "effect";
import * as Block from "../entities/block";
import { BlockIdGenerator } from "./randomness";

// ============================================================================
// SERVICE INTERFACE
// ============================================================================

/**
 * Block service providing block creation operations.
 *
 * @category Services
 * @since 0.1.0
 */
export class BlockService extends Context.Tag("BlockService")<
  BlockService,
  {
    /**
     * Create a block at `height` claiming `parentId` as parent, with a fresh id.
     *
     * @category Constructors
     * @since 0.1.0
     */
    readonly create: (
      height: number,
      parentId: Block.BlockId
    ) => Effect.Effect<Block.Block>;
  }
>() {}

// ============================================================================
// SERVICE IMPLEMENTATION
// ============================================================================

/**
 * Live implementation of BlockService.
 *
 * Requires: BlockIdGenerator (resolved here, not leaked through the interface)
 *
 * @category Layers
 * @since 0.1.0
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const service = yield* BlockService;
 *   const block = yield* service.create(1, Block.GENESIS_ID);
 *   yield* Effect.log(`Created ${block.id} at height ${block.height}`);
 * });
 *
 * Effect.runPromise(
 *   program.pipe(
 *     Effect.provide(BlockServiceLive),
 *     Effect.provide(BlockIdGeneratorLive)
 *   )
 * );
 * ```
 */
export const BlockServiceLive = Layer.effect(
  BlockService,
  Effect.gen(function* () {
    const ids = yield* BlockIdGenerator;

    return BlockService.of({
      create: (height, parentId) =>
        ids.next.pipe(
          Effect.map((id) =>
            Block.makeBlock({ height, parentId: Option.some(parentId), id })
          )
        ),
    });
  })
);
