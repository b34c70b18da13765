import { Config } from "effect";

const positiveInt = (name: string) =>
  Config.integer(name).pipe(
    Config.validate({
      message: `${name} must be a positive integer`,
      validation: (n: number) => n > 0,
    })
  );

/**
 * Simulation driver settings, read from `CONSENSUS_*` environment variables
 * by the default config provider.
 *
 * @since 0.1.0
 */
export const SimulationConfig = Config.all({
  nodes: positiveInt("NODES").pipe(Config.withDefault(5)),
  rounds: positiveInt("ROUNDS").pipe(Config.withDefault(5)),
  // seeds Effect's `Random` for a reproducible run
  seed: Config.option(Config.string("SEED")),
  // report path; no report file when unset
  output: Config.option(Config.string("OUTPUT")),
  hashPrefixLength: positiveInt("HASH_PREFIX").pipe(Config.withDefault(6)),
}).pipe(Config.nested("CONSENSUS"));

export type SimulationConfig = Config.Config.Success<typeof SimulationConfig>;
