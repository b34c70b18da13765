import * as NodeFileSystem from "@effect/platform-node/NodeFileSystem";
import * as NodeRuntime from "@effect/platform-node/NodeRuntime";
import { Effect, Layer, Logger, Option, Random } from "effect";
import { SimulationConfig } from "./config";
import { RoundReport, RoundReportLive } from "./services/report";
import type { ReportWriteError } from "./services/report";
import { ConsensusLive } from "./services/round";
import { Simulation, SimulationLive } from "./services/simulation";
import type { SimulationResult } from "./services/simulation";

const program = Effect.gen(function* () {
  const config = yield* SimulationConfig;
  const simulation = yield* Simulation;

  yield* Effect.log("Starting consensus simulation").pipe(
    Effect.annotateLogs({
      nodes: config.nodes,
      rounds: config.rounds,
      seeded: Option.isSome(config.seed),
    }),
    Effect.withLogSpan("initialization")
  );

  const run = simulation.run({
    nodes: config.nodes,
    rounds: config.rounds,
    hashPrefixLength: Option.some(config.hashPrefixLength),
  });

  const result: SimulationResult = yield* Option.match(config.seed, {
    onNone: () => run,
    onSome: (seed) => run.pipe(Effect.withRandom(Random.make(seed))),
  });

  const writeReport: Effect.Effect<void, ReportWriteError, RoundReport> =
    Option.match(config.output, {
      onNone: () => Effect.void,
      onSome: (path) =>
        RoundReport.pipe(
          Effect.flatMap((report) => report.write(path, result.records))
        ),
    });

  yield* writeReport;
}).pipe(Effect.withSpan("consensus-simulation"));

const MainLive = Layer.mergeAll(
  Logger.structured,
  SimulationLive.pipe(Layer.provide(ConsensusLive)),
  RoundReportLive.pipe(Layer.provide(NodeFileSystem.layer))
);

program.pipe(Effect.orDie, Effect.provide(MainLive), NodeRuntime.runMain);
