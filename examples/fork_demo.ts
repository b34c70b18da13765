import * as NodeRuntime from "@effect/platform-node/NodeRuntime";
import { Effect, Option, Random } from "effect";
import * as Block from "../src/entities/block";
import * as Node from "../src/entities/node";
import { ConsensusLive, RoundEngine, aggregate } from "../src/services/round";
import { displayRound, formatNode, separator } from "../src/utils";

// Extend a fresh node with blocks carrying the given ids
const forkedNode = (nodeId: number, ids: ReadonlyArray<string>) =>
  ids.reduce((node, id) => {
    const tip = Node.tip(node);
    return Node.append(
      node,
      Block.makeBlock({
        height: tip.height + 1,
        parentId: Option.some(tip.id),
        id: Block.makeBlockId(id),
      })
    ).node;
  }, Node.make(nodeId));

const program = Effect.gen(function* () {
  yield* Effect.logInfo(
    `${separator()}\nFORK RESOLUTION DEMONSTRATION\n${separator()}\n`
  );

  // two nodes on fork "a", three on fork "b"
  let nodes: ReadonlyArray<Node.NodeState> = [
    forkedNode(0, ["fork-a-1"]),
    forkedNode(1, ["fork-a-1"]),
    forkedNode(2, ["fork-b-1"]),
    forkedNode(3, ["fork-b-1"]),
    forkedNode(4, ["fork-b-1"]),
  ];

  yield* Effect.log("\nInitial state:");
  for (const node of nodes) yield* Effect.log(formatNode(node));

  const engine = yield* RoundEngine;
  for (let round = 0; round < 3; round++) {
    nodes = yield* engine.runRound(nodes);
    yield* displayRound(round, nodes);
  }

  yield* Option.match(aggregate(nodes), {
    onNone: () => Effect.log("No nodes"),
    onSome: ({ majorityHeight, majorityHash }) =>
      Effect.log(`\nMajority after 3 rounds: height=${majorityHeight}`).pipe(
        Effect.annotateLogs({ majorityHash })
      ),
  });
}).pipe(Effect.withRandom(Random.make("fork-demo")));

program.pipe(Effect.provide(ConsensusLive), NodeRuntime.runMain);
