import { assert, describe, it } from "@effect/vitest";
import { Effect, Layer, Option, Random } from "effect";
import * as Node from "../src/entities/node";
import { ConsensusLive } from "../src/services/round";
import {
  Simulation,
  SimulationLive,
  snapshot,
} from "../src/services/simulation";
import { heights, nodeWithChain, scriptedConsensus, tipIds } from "./utils/helpers";

const TestLayer = SimulationLive.pipe(Layer.provide(ConsensusLive));

describe("snapshot", () => {
  it("should record each node's height and truncated tip id", () => {
    const records = snapshot(
      2,
      [nodeWithChain(7, ["abcdefgh"]), Node.make(8)],
      Option.some(3)
    );

    assert.deepStrictEqual(records, [
      { round: 2, nodeId: 7, height: 1, hash: "abc" },
      { round: 2, nodeId: 8, height: 0, hash: "000" },
    ]);
  });

  it("should keep full ids without a prefix length", () => {
    const [record] = snapshot(0, [nodeWithChain(0, ["abcdefgh"])], Option.none());
    assert.strictEqual(record.hash, "abcdefgh");
  });
});

describe("Simulation", () => {
  it.effect("should record one entry per node per round, in order", () =>
    Effect.gen(function* () {
      const simulation = yield* Simulation;
      const result = yield* simulation.run({
        nodes: 3,
        rounds: 4,
        hashPrefixLength: Option.some(6),
      });

      assert.strictEqual(result.records.length, 12);
      result.records.forEach((record, i) => {
        assert.strictEqual(record.round, Math.floor(i / 3));
        assert.strictEqual(record.nodeId, i % 3);
        assert.strictEqual(record.hash.length, 6);
      });
    }).pipe(Effect.provide(TestLayer))
  );

  it.effect("should grow one shared block per round from a common start", () =>
    Effect.gen(function* () {
      const simulation = yield* Simulation;
      const result = yield* simulation
        .run({ nodes: 5, rounds: 5, hashPrefixLength: Option.none() })
        .pipe(Effect.withRandom(Random.make("test-seed")));

      assert.deepStrictEqual(heights(result.nodes), [5, 5, 5, 5, 5]);
      assert.strictEqual(new Set(tipIds(result.nodes)).size, 1);
    }).pipe(Effect.provide(TestLayer))
  );

  it.effect("should reproduce a run under the same seed", () =>
    Effect.gen(function* () {
      const simulation = yield* Simulation;
      const run = () =>
        simulation
          .run({ nodes: 4, rounds: 3, hashPrefixLength: Option.none() })
          .pipe(Effect.withRandom(Random.make("test-seed")));

      const first = yield* run();
      const second = yield* run();

      assert.deepStrictEqual(first.records, second.records);
    }).pipe(Effect.provide(TestLayer))
  );

  it.effect("should report the scripted three-node round", () =>
    Effect.gen(function* () {
      const simulation = yield* Simulation;
      const result = yield* simulation.run({
        nodes: 3,
        rounds: 1,
        hashPrefixLength: Option.none(),
      });

      assert.deepStrictEqual(result.records, [
        { round: 0, nodeId: 0, height: 1, hash: "X" },
        { round: 0, nodeId: 1, height: 1, hash: "X" },
        { round: 0, nodeId: 2, height: 1, hash: "X" },
      ]);
    }).pipe(
      Effect.provide(
        SimulationLive.pipe(
          Layer.provide(scriptedConsensus(["X", "Y", "Z"], ["X", "X", "Z"]))
        )
      )
    )
  );

  it.effect("should run nothing for zero nodes", () =>
    Effect.gen(function* () {
      const simulation = yield* Simulation;
      const result = yield* simulation.run({
        nodes: 0,
        rounds: 2,
        hashPrefixLength: Option.none(),
      });

      assert.deepStrictEqual(result.nodes, []);
      assert.deepStrictEqual(result.records, []);
    }).pipe(Effect.provide(TestLayer))
  );
});
