/**
 * Phase 4 — reconcile nodes against the round's majority.
 *
 * Adoption copies the reference block's height and id but parents it on the
 * adopting node's own tip. Chains therefore agree on height and tip id above
 * the adoption point, not on ancestry.
 *
 * @module RoundService/Reconcile
 * @since 0.1.0
 */

import { Array, Effect, Option } from "effect";
import * as Block from "../../entities/block";
import * as Node from "../../entities/node";
import type * as Round from "../../entities/round";
import { shortenId } from "../../utils";

/** Tip of the first node holding the majority height and hash */
export const findReference = (
  nodes: ReadonlyArray<Node.NodeState>,
  aggregate: Round.RoundAggregate
): Option.Option<Block.Block> =>
  Array.findFirst(
    nodes,
    (node) =>
      Node.height(node) === aggregate.majorityHeight &&
      Node.tip(node).id === aggregate.majorityHash
  ).pipe(Option.map(Node.tip));

/** Append a copy of `reference` re-parented on the node's tip, if it fits */
export const adopt = (
  node: Node.NodeState,
  reference: Block.Block
): Node.NodeState => {
  const local = Node.tip(node);
  if (local.height + 1 !== reference.height) return node;

  const adopted = Block.makeBlock({
    height: reference.height,
    parentId: Option.some(local.id),
    id: reference.id,
  });
  return Node.append(node, adopted).node;
};

export const reconcileNode = (
  node: Node.NodeState,
  aggregate: Round.RoundAggregate,
  reference: Block.Block
): Effect.Effect<Node.NodeState> => {
  const { majorityHeight, majorityHash } = aggregate;
  const height = Node.height(node);
  const localHash = Node.tip(node).id;

  if (height < majorityHeight) {
    const trimmed = Node.rollbackWhile(
      node,
      (n) => Node.height(n) >= majorityHeight
    );
    const next = adopt(trimmed, reference);

    return next === trimmed
      ? Effect.succeed(next)
      : Effect.logDebug(`Node ${node.nodeId} catching up to majority`).pipe(
          Effect.annotateLogs({ nodeId: node.nodeId, height, majorityHeight }),
          Effect.as(next)
        );
  }

  if (height === majorityHeight && localHash !== majorityHash)
    return Effect.logInfo(
      `Node ${node.nodeId} is at majority_height but with a different hash (${shortenId(localHash)}), adopting majority (${shortenId(majorityHash)})`
    ).pipe(
      Effect.annotateLogs({ nodeId: node.nodeId, localHash, majorityHash }),
      Effect.as(adopt(Node.rollback(node), reference))
    );

  return Effect.succeed(node);
};

/** No reference block means no changes this round */
export const reconcile = (
  nodes: ReadonlyArray<Node.NodeState>,
  aggregate: Round.RoundAggregate
): Effect.Effect<ReadonlyArray<Node.NodeState>> => {
  const run: Effect.Effect<ReadonlyArray<Node.NodeState>> = Option.match(
    findReference(nodes, aggregate),
    {
      onNone: () => Effect.succeed(nodes),
      onSome: (reference) =>
        Effect.forEach(nodes, (node) =>
          reconcileNode(node, aggregate, reference)
        ),
    }
  );
  return run.pipe(Effect.withLogSpan("reconcile"));
};
