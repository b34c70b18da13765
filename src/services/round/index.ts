export { RoundEngine, RoundEngineLive } from "./engine";
export { aggregate, majorityOf, tally } from "./aggregate";
export { selectOrCorrect } from "./select";
export { adopt, findReference, reconcile, reconcileNode } from "./reconcile";

/**
 * Round Service — Effect-Based Capabilities
 *
 * Capabilities:
 * - RoundEngine — runs one round of propose / select / aggregate / reconcile
 *
 * `ConsensusServices` bundles the RoundEngine with the node service it needs.
 *
 * Phase functions are exported for direct use in tests and tooling; they take
 * their dependencies as arguments instead of reading them from the context.
 *
 * @module RoundService
 * @since 0.1.0
 */

import { Layer } from "effect";
import { NodeServiceLive } from "../node";
import { RandomnessLive } from "../randomness";
import { RoundEngineLive } from "./engine";

/**
 * RoundEngine and NodeService over whichever randomness is provided
 *
 * Requires: BlockIdGenerator, CandidateSelector
 *
 * @category Services
 * @since 0.1.0
 */
export const ConsensusServices = RoundEngineLive.pipe(
  Layer.provideMerge(NodeServiceLive)
);

/**
 * Consensus services backed by Effect's `Random`
 *
 * @category Services
 * @since 0.1.0
 */
export const ConsensusLive = ConsensusServices.pipe(
  Layer.provide(RandomnessLive)
);
