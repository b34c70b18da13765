/**
 * Simulation Service — drives rounds over a fresh set of nodes
 *
 * Builds `nodes` nodes with ids `0..nodes-1`, runs `rounds` rounds through
 * the RoundEngine, logs each round's summary and records every node's
 * observable state after every round.
 *
 * @module Simulation
 * @since 0.1.0
 */

import { Context, Effect, Layer, Option } from "effect";
import * as Node from "../entities/node";
import * as Round from "../entities/round";
import { displayRound } from "../utils";
import { NodeService } from "./node";
import { RoundEngine } from "./round";

// ============================================================================
// TYPES
// ============================================================================

export interface SimulationParams {
  readonly nodes: number;
  readonly rounds: number;
  /** Truncate record hashes to this many characters; `None` keeps full ids */
  readonly hashPrefixLength: Option.Option<number>;
}

export interface SimulationResult {
  readonly nodes: ReadonlyArray<Node.NodeState>;
  /** Ordered by round, then node order */
  readonly records: ReadonlyArray<Round.RoundRecord>;
}

// ============================================================================
// PURE HELPERS
// ============================================================================

/** One record per node, in node order */
export const snapshot = (
  round: number,
  nodes: ReadonlyArray<Node.NodeState>,
  hashPrefixLength: Option.Option<number>
): ReadonlyArray<Round.RoundRecord> =>
  nodes.map((node) => {
    const id = Node.tip(node).id;
    return Round.makeRecord({
      round,
      nodeId: node.nodeId,
      height: Node.height(node),
      hash: Option.match(hashPrefixLength, {
        onNone: () => id,
        onSome: (length) => id.slice(0, length),
      }),
    });
  });

// ============================================================================
// SERVICE INTERFACE
// ============================================================================

/**
 * @category Services
 * @since 0.1.0
 */
export class Simulation extends Context.Tag("@services/simulation/Simulation")<
  Simulation,
  {
    readonly run: (params: SimulationParams) => Effect.Effect<SimulationResult>;
  }
>() {}

// ============================================================================
// SERVICE IMPLEMENTATION
// ============================================================================

/**
 * Requires: RoundEngine, NodeService
 *
 * @category Layers
 * @since 0.1.0
 */
export const SimulationLive = Layer.effect(
  Simulation,
  Effect.gen(function* () {
    const engine = yield* RoundEngine;
    const nodeService = yield* NodeService;

    return Simulation.of({
      run: ({ nodes: count, rounds, hashPrefixLength }) =>
        Effect.gen(function* () {
          let nodes: ReadonlyArray<Node.NodeState> = Array.from(
            { length: count },
            (_, i) => nodeService.create(i)
          );
          const records: Array<Round.RoundRecord> = [];

          for (let round = 0; round < rounds; round++) {
            nodes = yield* engine.runRound(nodes);
            records.push(...snapshot(round, nodes, hashPrefixLength));
            yield* displayRound(round, nodes);
          }

          return { nodes, records };
        }).pipe(
          Effect.annotateLogs({ nodes: count, rounds }),
          Effect.withLogSpan("simulation")
        ),
    });
  })
);
