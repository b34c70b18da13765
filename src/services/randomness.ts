/**
 * Randomness — the simulation's only source of nondeterminism.
 *
 * Capabilities:
 * - BlockIdGenerator — fresh, practically unique block identifiers
 * - CandidateSelector — uniform pick among phase-2 candidates
 *
 * Both live layers draw from Effect's `Random` service, so a run becomes
 * reproducible under `Effect.withRandom(Random.make(seed))`. Tests swap in
 * scripted implementations with `Layer.succeed`.
 *
 * @module Randomness
 * @since 0.1.0
 */

import { Array, Context, Effect, Layer, Option, Random } from "effect";
import { uuidV4 } from "ethers";
import * as Block from "../entities/block";

// ============================================================================
// CAPABILITY: BLOCK ID GENERATOR
// ============================================================================

/**
 * BlockIdGenerator capability — identifiers for newly proposed blocks
 *
 * @category Capabilities
 * @since 0.1.0
 */
export class BlockIdGenerator extends Context.Tag(
  "@services/randomness/BlockIdGenerator"
)<
  BlockIdGenerator,
  {
    readonly next: Effect.Effect<Block.BlockId>;
  }
>() {}

/** 16 random bytes, one `Random` draw per byte */
const randomBytes = Effect.replicateEffect(Random.nextIntBetween(0, 256), 16);

/**
 * Live implementation of BlockIdGenerator (version-4 UUID strings)
 *
 * @category Services
 * @since 0.1.0
 */
export const BlockIdGeneratorLive = Layer.succeed(
  BlockIdGenerator,
  BlockIdGenerator.of({
    next: randomBytes.pipe(
      Effect.map((bytes) => Block.makeBlockId(uuidV4(Uint8Array.from(bytes))))
    ),
  })
);

// ============================================================================
// CAPABILITY: CANDIDATE SELECTOR
// ============================================================================

/**
 * CandidateSelector capability — chooses one of several proposed blocks
 *
 * @category Capabilities
 * @since 0.1.0
 */
export class CandidateSelector extends Context.Tag(
  "@services/randomness/CandidateSelector"
)<
  CandidateSelector,
  {
    readonly pick: (
      candidates: Array.NonEmptyReadonlyArray<Block.Block>
    ) => Effect.Effect<Block.Block>;
  }
>() {}

/**
 * Live implementation of CandidateSelector, equal probability per candidate
 *
 * @category Services
 * @since 0.1.0
 */
export const CandidateSelectorLive = Layer.succeed(
  CandidateSelector,
  CandidateSelector.of({
    pick: (candidates) =>
      Random.nextIntBetween(0, candidates.length).pipe(
        Effect.map((i) =>
          Array.get(candidates, i).pipe(
            Option.getOrElse(() => Array.headNonEmpty(candidates))
          )
        )
      ),
  })
);

export const RandomnessLive = Layer.mergeAll(
  BlockIdGeneratorLive,
  CandidateSelectorLive
);
