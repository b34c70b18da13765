/**
 * Round aggregation — majority height and majority hash.
 *
 * Counting preserves the order in which keys are first seen while scanning
 * nodes, and a later key only wins with a strictly higher count, so ties go
 * to the key encountered first.
 *
 * @module RoundService/Aggregate
 * @since 0.1.0
 */

import { Option } from "effect";
import * as Node from "../../entities/node";
import * as Round from "../../entities/round";

/** Occurrences per key, iterated in first-seen order */
export const tally = <K>(keys: Iterable<K>): ReadonlyMap<K, number> => {
  const counts = new Map<K, number>();
  for (const key of keys) counts.set(key, (counts.get(key) ?? 0) + 1);
  return counts;
};

/** Most frequent key, first-seen wins ties; `None` for no keys */
export const majorityOf = <K>(keys: Iterable<K>): Option.Option<K> => {
  let best: Option.Option<K> = Option.none();
  let bestCount = 0;

  for (const [key, count] of tally(keys)) {
    if (count > bestCount) {
      best = Option.some(key);
      bestCount = count;
    }
  }

  return best;
};

/**
 * Majority height over all nodes, then majority tip id among the nodes at
 * that height. `None` when there are no nodes.
 */
export const aggregate = (
  nodes: ReadonlyArray<Node.NodeState>
): Option.Option<Round.RoundAggregate> =>
  Option.gen(function* () {
    const majorityHeight = yield* majorityOf(nodes.map(Node.height));
    const majorityHash = yield* majorityOf(
      nodes
        .filter((node) => Node.height(node) === majorityHeight)
        .map((node) => Node.tip(node).id)
    );

    return Round.makeAggregate({ majorityHeight, majorityHash });
  });
