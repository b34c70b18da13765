import { assert, describe, it } from "@effect/vitest";
import { ConfigError, ConfigProvider, Effect, Option } from "effect";
import { SimulationConfig } from "../src/config";

const withEntries = (entries: ReadonlyArray<readonly [string, string]>) =>
  Effect.withConfigProvider(ConfigProvider.fromMap(new Map(entries)));

describe("SimulationConfig", () => {
  it.effect("should fall back to five nodes and five rounds", () =>
    Effect.gen(function* () {
      const config = yield* SimulationConfig.pipe(withEntries([]));

      assert.strictEqual(config.nodes, 5);
      assert.strictEqual(config.rounds, 5);
      assert.strictEqual(config.hashPrefixLength, 6);
      assert.isTrue(Option.isNone(config.seed));
      assert.isTrue(Option.isNone(config.output));
    })
  );

  it.effect("should read values nested under CONSENSUS", () =>
    Effect.gen(function* () {
      const config = yield* SimulationConfig.pipe(
        withEntries([
          ["CONSENSUS.NODES", "3"],
          ["CONSENSUS.ROUNDS", "10"],
          ["CONSENSUS.SEED", "test-seed"],
          ["CONSENSUS.OUTPUT", "consensus_data.json"],
          ["CONSENSUS.HASH_PREFIX", "8"],
        ])
      );

      assert.strictEqual(config.nodes, 3);
      assert.strictEqual(config.rounds, 10);
      assert.strictEqual(config.hashPrefixLength, 8);
      assert.strictEqual(Option.getOrNull(config.seed), "test-seed");
      assert.strictEqual(Option.getOrNull(config.output), "consensus_data.json");
    })
  );

  it.effect("should reject a non-positive node count", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(
        SimulationConfig.pipe(withEntries([["CONSENSUS.NODES", "0"]]))
      );

      assert.isTrue(ConfigError.isConfigError(error));
    })
  );

  it.effect("should reject a non-integer round count", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(
        SimulationConfig.pipe(withEntries([["CONSENSUS.ROUNDS", "many"]]))
      );

      assert.isTrue(ConfigError.isConfigError(error));
    })
  );
});
