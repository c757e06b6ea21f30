/**
 * Engine error hierarchy.
 *
 * Captures the failure modes of building and running a model as tagged errors
 * so callers can pattern match with `Effect.catchTag`. Messages name the
 * entity and formula at fault; the structured fields carry the same data for
 * programmatic handling.
 *
 * @since 0.1.0
 */

import { Data } from "effect"
import type { EquationEvaluationError, EquationParseError } from "./internal/equations/errors.js"
import type { TimeSeries } from "./Types.js"

/**
 * Unique symbol used to tag the solver service within the context graph.
 *
 * @since 0.1.0
 */
export const SolverTypeId = Symbol.for("stock-flow-engine/Solver")

/**
 * Raised when a model configuration is structurally invalid: undecodable
 * input, duplicate or unknown names, a bad connection direction, invalid
 * time settings or a formula that does not parse. Raised before any step
 * runs.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * const error = new ConfigError({ reason: "Duplicate name \"Capital\"", entity: "Capital" })
 * yield* Effect.fail(error)
 * ```
 */
export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly reason: string
  readonly entity?: string
  readonly formula?: string
  readonly cause?: EquationParseError
}> {
  override get message(): string {
    return `Invalid model configuration: ${this.reason}`
  }
}

/**
 * Raised when a flow or auxiliary formula fails to evaluate during a step.
 * `partial` holds the rows recorded before the failing step and is always
 * marked incomplete.
 *
 * @category Errors
 * @since 0.1.0
 */
export class SimulationError extends Data.TaggedError("SimulationError")<{
  readonly entity: string
  readonly kind: "flow" | "auxiliary"
  readonly formula: string
  readonly time: number
  readonly cause: EquationEvaluationError
  readonly partial?: TimeSeries
}> {
  override get message(): string {
    return `Error calculating ${this.kind} "${this.entity}" with formula "${this.formula}" at t=${this.time}: ${this.cause.problem}`
  }
}

/**
 * Raised when a cyclic block of auxiliaries does not settle within the pass
 * budget.
 *
 * @category Errors
 * @since 0.1.0
 */
export class ConvergenceError extends Data.TaggedError("ConvergenceError")<{
  readonly members: ReadonlyArray<string>
  readonly time: number
  readonly passes: number
  readonly delta: number
  readonly partial?: TimeSeries
}> {
  override get message(): string {
    return `Auxiliaries ${this.members.join(", ")} did not converge at t=${this.time} after ${this.passes} passes (last change ${this.delta})`
  }
}

/**
 * Failures a running engine can raise.
 *
 * @category Errors
 * @since 0.1.0
 */
export type SimulationFailure = SimulationError | ConvergenceError
