/**
 * Round Report — JSON persistence of round records
 *
 * Records are encoded through `RoundReportSchema`, so the file carries the
 * wire field names (`node_id`), and written through `@effect/platform`'s
 * `FileSystem`.
 *
 * @module RoundReport
 * @since 0.1.0
 */

import { FileSystem } from "@effect/platform";
import { Context, Data, Effect, Layer, Schema } from "effect";
import * as Round from "../entities/round";

// ============================================================================
// ERRORS
// ============================================================================

/**
 * Error raised when the report cannot be encoded or written.
 *
 * @category Errors
 * @since 0.1.0
 */
export class ReportWriteError extends Data.TaggedError("ReportWriteError")<{
  readonly path: string;
  readonly reason: string;
  readonly cause?: unknown;
}> {}

// ============================================================================
// SERVICE INTERFACE
// ============================================================================

/**
 * @category Services
 * @since 0.1.0
 */
export class RoundReport extends Context.Tag("@services/report/RoundReport")<
  RoundReport,
  {
    readonly write: (
      path: string,
      records: ReadonlyArray<Round.RoundRecord>
    ) => Effect.Effect<void, ReportWriteError>;
  }
>() {}

// ============================================================================
// SERVICE IMPLEMENTATION
// ============================================================================

const encodeReport = Schema.encode(
  Schema.parseJson(Round.RoundReportSchema, { space: 2 })
);

/**
 * Requires: FileSystem
 *
 * @category Layers
 * @since 0.1.0
 */
export const RoundReportLive = Layer.effect(
  RoundReport,
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;

    return RoundReport.of({
      write: (path, records) =>
        encodeReport(records).pipe(
          Effect.mapError(
            (error) =>
              new ReportWriteError({
                path,
                reason: "Invalid round records",
                cause: error,
              })
          ),
          Effect.flatMap((json) =>
            fs.writeFileString(path, json).pipe(
              Effect.mapError(
                (error) =>
                  new ReportWriteError({
                    path,
                    reason: error.message,
                    cause: error,
                  })
              )
            )
          ),
          Effect.zipRight(
            Effect.logInfo("Round report written").pipe(
              Effect.annotateLogs({ path, records: records.length })
            )
          )
        ),
    });
  })
);
