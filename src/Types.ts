/**
 * Shared value schemas
 *
 * Small literal and record schemas reused by the model, the engine and the
 * scenario runner, plus the `TimeSeries` output record every run produces.
 *
 * @since 0.1.0
 */

import { Schema } from "effect"

/**
 * Finite number; rejects `NaN` and infinities on decode.
 *
 * @since 0.1.0
 * @category Schemas
 */
export const FiniteNumber = Schema.Number.pipe(Schema.finite())

/**
 * Role a flow plays for the stock it is connected to.
 *
 * @since 0.1.0
 * @category Schemas
 */
export const FlowDirection = Schema.Literal("inflow", "outflow")

/**
 * @since 0.1.0
 * @category Schemas
 */
export type FlowDirection = typeof FlowDirection.Type

/**
 * How auxiliaries are resolved within a step: `ordered` evaluates the
 * dependency graph in topological order and relaxes only cyclic blocks;
 * `relaxation` sweeps every auxiliary a fixed number of times.
 *
 * @since 0.1.0
 * @category Schemas
 */
export const ResolverStrategy = Schema.Literal("ordered", "relaxation")

/**
 * @since 0.1.0
 * @category Schemas
 */
export type ResolverStrategy = typeof ResolverStrategy.Type

/**
 * Lifecycle of one engine run.
 *
 * @since 0.1.0
 * @category Schemas
 */
export const EngineStatus = Schema.Literal("Initialized", "Stepping", "Completed", "Failed")

/**
 * @since 0.1.0
 * @category Schemas
 */
export type EngineStatus = typeof EngineStatus.Type

/**
 * Ordered per-step records of a run. Each row maps `time` and every stock,
 * auxiliary and flow name to its value at the start of that step; `columns`
 * lists those keys in declaration order. `complete` is `false` when the run
 * aborted and the rows are only the prefix recorded before the failure.
 *
 * @since 0.1.0
 * @category Simulation
 */
export class TimeSeries extends Schema.Class<TimeSeries>("TimeSeries")({
  columns: Schema.Array(Schema.String),
  rows: Schema.Array(Schema.Record({ key: Schema.String, value: Schema.Number })),
  complete: Schema.Boolean,
}) {
  get length(): number {
    return this.rows.length
  }

  /**
   * Values of one column across all rows; empty for an unknown column.
   */
  column(name: string): ReadonlyArray<number> {
    return this.rows.flatMap((row) => {
      const value = row[name]
      return value === undefined ? [] : [value]
    })
  }
}
