import { Context, Effect, Layer, Option } from "effect";
import type * as Node from "../../entities/node";
import { NodeService } from "../node";
import { CandidateSelector } from "../randomness";
import { aggregate } from "./aggregate";
import { reconcile } from "./reconcile";
import { selectOrCorrect } from "./select";

// ============================================================================
// CAPABILITY: ROUND ENGINE
// ============================================================================

/**
 * RoundEngine capability — runs one consensus round over an ordered set of
 * nodes and returns their next states, in the same order.
 *
 * Phases run strictly in sequence: propose, select-or-correct, aggregate,
 * reconcile. No phase fails; an empty node set or a missing reference block
 * ends the round early with the nodes as they are.
 *
 * @category Capabilities
 * @since 0.1.0
 */
export class RoundEngine extends Context.Tag("@services/round/RoundEngine")<
  RoundEngine,
  {
    readonly runRound: (
      nodes: ReadonlyArray<Node.NodeState>
    ) => Effect.Effect<ReadonlyArray<Node.NodeState>>;
  }
>() {}

/**
 * Requires: NodeService, CandidateSelector
 *
 * @category Services
 * @since 0.1.0
 */
export const RoundEngineLive = Layer.effect(
  RoundEngine,
  Effect.gen(function* () {
    const nodeService = yield* NodeService;
    const selector = yield* CandidateSelector;

    const runRound = (nodes: ReadonlyArray<Node.NodeState>) =>
      Effect.gen(function* () {
        const proposals = yield* Effect.forEach(nodes, (node) =>
          nodeService.propose(node)
        );
        const selected = yield* selectOrCorrect(nodes, proposals, selector);

        const majority = aggregate(selected);
        if (Option.isNone(majority)) return selected;

        yield* Effect.logDebug("Round majority").pipe(
          Effect.annotateLogs({
            majorityHeight: majority.value.majorityHeight,
            majorityHash: majority.value.majorityHash,
          })
        );

        return yield* reconcile(selected, majority.value);
      }).pipe(Effect.withLogSpan("round"));

    return RoundEngine.of({ runRound });
  })
);
