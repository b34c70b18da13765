import { assert } from "@effect/vitest";
import { Array, Effect, Layer } from "effect";
import * as Option from "effect/Option";
import * as Block from "../../src/entities/block";
import * as Node from "../../src/entities/node";
import {
  BlockIdGenerator,
  CandidateSelector,
} from "../../src/services/randomness";
import { ConsensusServices } from "../../src/services/round";

/**
 * Assert that an Option is Some and return its value.
 * Fails the test if the Option is None.
 */
export const assertSome = <T>(
  option: Option.Option<T>,
  message: string = "Expected Some, got None"
): T => {
  return Option.match(option, {
    onNone: () => assert.fail(message),
    onSome: (value) => value,
  });
};

/**
 * Assert that an Option is None.
 * Fails the test if the Option is Some.
 */
export const assertNone = <T>(
  option: Option.Option<T>,
  message: string = "Expected None, got Some"
): void => {
  Option.match(option, {
    onNone: () => {},
    onSome: () => assert.fail(message),
  });
};

// ============================================================================
// NODE FIXTURES
// ============================================================================

/** Node whose chain is genesis followed by blocks with the given ids */
export const nodeWithChain = (
  nodeId: number,
  ids: ReadonlyArray<string>
): Node.NodeState =>
  ids.reduce((node, id) => {
    const tip = Node.tip(node);
    const result = Node.append(
      node,
      Block.makeBlock({
        height: tip.height + 1,
        parentId: Option.some(tip.id),
        id: Block.makeBlockId(id),
      })
    );
    assert.isTrue(result.appended, `fixture block ${id} must extend the tip`);
    return result.node;
  }, Node.make(nodeId));

export const heights = (nodes: ReadonlyArray<Node.NodeState>) =>
  nodes.map(Node.height);

export const tipIds = (nodes: ReadonlyArray<Node.NodeState>) =>
  nodes.map((node) => Node.tip(node).id);

// ============================================================================
// SCRIPTED RANDOMNESS
// ============================================================================

/** Hands out `ids` in order, then `extra-<n>` */
export const scriptedIds = (ids: ReadonlyArray<string>) => {
  let issued = 0;
  return Layer.succeed(
    BlockIdGenerator,
    BlockIdGenerator.of({
      next: Effect.sync(() => {
        const id = issued < ids.length ? ids[issued] : `extra-${issued}`;
        issued++;
        return Block.makeBlockId(id);
      }),
    })
  );
};

/**
 * Selector picking, on its n-th call, the candidate whose id is `wanted[n]`,
 * falling back to the first candidate.
 */
export const pickById = (wanted: ReadonlyArray<string>) => {
  let turn = 0;
  return CandidateSelector.of({
    pick: (candidates) =>
      Effect.sync(() => {
        const id = wanted[turn];
        turn++;
        return Option.getOrElse(
          Array.findFirst(candidates, (block) => block.id === id),
          () => Array.headNonEmpty(candidates)
        );
      }),
  });
};

/** RoundEngine and NodeService over scripted ids and picks */
export const scriptedConsensus = (
  ids: ReadonlyArray<string>,
  picks: ReadonlyArray<string>
) =>
  ConsensusServices.pipe(
    Layer.provide(
      Layer.mergeAll(
        scriptedIds(ids),
        Layer.succeed(CandidateSelector, pickById(picks))
      )
    )
  );
