/**
 * Phase 2 — select or self-correct.
 *
 * Each node, in order, filters the proposals by height alone and picks one.
 * The parent is only checked by `append`, so a node can pick a block that
 * extends another node's tip and stay where it is for the round.
 *
 * @module RoundService/Select
 * @since 0.1.0
 */

import { Array, Context, Effect } from "effect";
import type * as Block from "../../entities/block";
import * as Node from "../../entities/node";
import type { CandidateSelector } from "../randomness";

export const selectOrCorrect = (
  nodes: ReadonlyArray<Node.NodeState>,
  proposals: ReadonlyArray<Block.Block>,
  selector: Context.Tag.Service<CandidateSelector>
): Effect.Effect<ReadonlyArray<Node.NodeState>> =>
  Effect.gen(function* () {
    // working copy: later nodes see the progress of earlier ones
    const current = [...nodes];

    for (let i = 0; i < current.length; i++) {
      const node = current[i];
      const height = Node.height(node);
      const candidates = proposals.filter((b) => b.height === height + 1);

      if (Array.isNonEmptyReadonlyArray(candidates)) {
        const chosen = yield* selector.pick(candidates);
        const result = Node.append(node, chosen);

        if (!result.appended)
          yield* Effect.logDebug("Selected block does not extend local tip").pipe(
            Effect.annotateLogs({
              nodeId: node.nodeId,
              height,
              block: chosen.id,
            })
          );

        current[i] = result.node;
        continue;
      }

      const networkHeight = Math.max(...current.map(Node.height));
      if (networkHeight > height) {
        yield* Effect.logInfo(
          `Node ${node.nodeId} discarding last block (behind network: ${height} < ${networkHeight})`
        ).pipe(
          Effect.annotateLogs({ nodeId: node.nodeId, height, networkHeight })
        );
        current[i] = Node.rollback(node);
      }
    }

    return current;
  }).pipe(Effect.withLogSpan("select"));
