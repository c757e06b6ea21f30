/**
 * Scenario runner
 *
 * Runs independent variants of a model concurrently. Each scenario decodes
 * its own configuration, applies its parameter overrides and runs its own
 * engine, so nothing mutable crosses scenario boundaries. Every failure is
 * turned into a `ScenarioFailure` record; results come back in input order.
 *
 * @since 0.1.0
 */

import { Context, Data, Duration, Effect, Either, Layer, Option, ParseResult, Schema } from "effect"
import { ConfigError, type SimulationFailure } from "./Errors.js"
import { BareParameterDef, decodeModelConfig, ModelConfig, ParameterDef } from "./Model.js"
import { EngineSettings, defaultEngineSettings } from "./Settings.js"
import { defaultResolverOptions, makeEngine, type SimulationResult } from "./Simulation.js"
import { Solver } from "./Solver.js"
import { FiniteNumber, TimeSeries } from "./Types.js"
import type { ResolverOptions } from "./internal/equations/GraphEngine.js"

/**
 * Label given to the unmodified model by `scenariosFromVariations`.
 *
 * @since 0.1.0
 * @category Scenarios
 */
export const BASE_CASE_LABEL = "Base Case Scenario"

/**
 * New value for one parameter: a bare number, or `{ value, unit? }` whose
 * unit must match the base model's.
 *
 * @since 0.1.0
 * @category Scenarios
 */
export const ParameterOverride = Schema.Union(
  FiniteNumber,
  Schema.Struct({ value: FiniteNumber, unit: Schema.optional(Schema.String) }),
)

/**
 * @since 0.1.0
 * @category Scenarios
 */
export type ParameterOverride = typeof ParameterOverride.Type

/**
 * @since 0.1.0
 * @category Scenarios
 */
export const ParameterOverrides = Schema.Record({ key: Schema.String, value: ParameterOverride })

/**
 * A parameter variation as produced upstream.
 *
 * @since 0.1.0
 * @category Scenarios
 */
export class ParameterVariation extends Schema.Class<ParameterVariation>("ParameterVariation")({
  scenario_description: Schema.String,
  parameters: ParameterOverrides,
}) {}

/**
 * One scenario to run. `config` and `overrides` are decoded when the
 * scenario runs, so invalid input fails only this scenario.
 *
 * @since 0.1.0
 * @category Scenarios
 */
export interface ScenarioInput {
  readonly label: string
  readonly config: unknown
  /** Decoded with `ParameterOverrides`. */
  readonly overrides?: unknown
}

/**
 * Raised when an override names an unknown parameter or changes its unit.
 *
 * @category Errors
 * @since 0.1.0
 */
export class ScenarioOverrideError extends Data.TaggedError("ScenarioOverrideError")<{
  readonly label: string
  readonly parameter: string
  readonly reason: string
}> {
  override get message(): string {
    return `Scenario "${this.label}" cannot override parameter "${this.parameter}": ${this.reason}`
  }
}

/**
 * Raised when a scenario exceeds its time budget.
 *
 * @category Errors
 * @since 0.1.0
 */
export class ScenarioTimeoutError extends Data.TaggedError("ScenarioTimeoutError")<{
  readonly label: string
  readonly timeout: Duration.Duration
}> {
  override get message(): string {
    return `Scenario "${this.label}" timed out after ${Duration.format(this.timeout)}`
  }
}

/**
 * Anything that can fail a single scenario.
 *
 * @since 0.1.0
 * @category Scenarios
 */
export type ScenarioError = ConfigError | SimulationFailure | ScenarioOverrideError | ScenarioTimeoutError

/**
 * Structured description of why a scenario failed.
 *
 * @since 0.1.0
 * @category Scenarios
 */
export class ScenarioErrorDetail extends Schema.Class<ScenarioErrorDetail>("ScenarioErrorDetail")({
  kind: Schema.String,
  message: Schema.String,
  entity: Schema.optional(Schema.String),
  formula: Schema.optional(Schema.String),
  cause: Schema.optional(Schema.String),
}) {}

/**
 * @since 0.1.0
 * @category Scenarios
 */
export class ScenarioSuccess extends Schema.Class<ScenarioSuccess>("ScenarioSuccess")({
  label: Schema.String,
  status: Schema.tag("success"),
  timeSeries: TimeSeries,
  units: Schema.Record({ key: Schema.String, value: Schema.String }),
  timeUnit: Schema.String,
}) {}

/**
 * Failed scenario. `partial` holds the rows recorded before a simulation
 * failure, when there were any.
 *
 * @since 0.1.0
 * @category Scenarios
 */
export class ScenarioFailure extends Schema.Class<ScenarioFailure>("ScenarioFailure")({
  label: Schema.String,
  status: Schema.tag("failure"),
  error: ScenarioErrorDetail,
  partial: Schema.optional(TimeSeries),
}) {}

/**
 * @since 0.1.0
 * @category Scenarios
 */
export const ScenarioOutcome = Schema.Union(ScenarioSuccess, ScenarioFailure)

/**
 * @since 0.1.0
 * @category Scenarios
 */
export type ScenarioOutcome = typeof ScenarioOutcome.Type

/**
 * @since 0.1.0
 * @category Scenarios
 */
export interface RunScenariosOptions {
  /** Maximum scenarios in flight. */
  readonly concurrency?: number
  /** Per-scenario budget; a scenario over budget is interrupted between steps. */
  readonly timeout?: Duration.DurationInput
  readonly resolver?: Partial<ResolverOptions>
}

/**
 * Build the scenario list for a base model and its variations: the base case
 * first, then one scenario per variation in order.
 *
 * @since 0.1.0
 * @category Scenarios
 */
export const scenariosFromVariations = (
  base: unknown,
  variations: ReadonlyArray<ParameterVariation>,
): ReadonlyArray<ScenarioInput> => [
  { label: BASE_CASE_LABEL, config: base },
  ...variations.map(
    (variation): ScenarioInput => ({
      label: variation.scenario_description,
      config: base,
      overrides: variation.parameters,
    }),
  ),
]

/**
 * Replace parameter values. Parameters not named keep their base value.
 *
 * @since 0.1.0
 * @category Scenarios
 */
export const applyOverrides = (
  label: string,
  config: ModelConfig,
  overrides: Readonly<Record<string, ParameterOverride>>,
): Either.Either<ModelConfig, ScenarioOverrideError> => {
  const parameters: Record<string, ParameterDef> = { ...config.parameters }
  for (const [name, override] of Object.entries(overrides)) {
    const current = Object.prototype.hasOwnProperty.call(parameters, name) ? parameters[name] : undefined
    if (current === undefined) {
      return Either.left(new ScenarioOverrideError({ label, parameter: name, reason: "no such parameter" }))
    }
    const value = typeof override === "number" ? override : override.value
    const unit = typeof override === "number" ? undefined : override.unit
    if (unit !== undefined && unit !== current.unit) {
      return Either.left(
        new ScenarioOverrideError({
          label,
          parameter: name,
          reason: `unit "${unit}" differs from "${current.unit}"`,
        }),
      )
    }
    const replacement = { value, unit: current.unit, description: current.description }
    parameters[name] =
      current instanceof BareParameterDef ? new BareParameterDef(replacement) : new ParameterDef(replacement)
  }
  return Either.right(
    new ModelConfig({
      stocks: config.stocks,
      parameters,
      auxiliaries: config.auxiliaries,
      flows: config.flows,
      flow_connections: config.flow_connections,
      simulation_settings: config.simulation_settings,
      problem_description: config.problem_description,
    }),
  )
}

const errorDetail = (error: ScenarioError): ScenarioErrorDetail => {
  switch (error._tag) {
    case "ConfigError":
      return new ScenarioErrorDetail({
        kind: error._tag,
        message: error.message,
        entity: error.entity,
        formula: error.formula,
        cause: error.cause?.message,
      })
    case "SimulationError":
      return new ScenarioErrorDetail({
        kind: error._tag,
        message: error.message,
        entity: error.entity,
        formula: error.formula,
        cause: error.cause.problem,
      })
    case "ConvergenceError":
      return new ScenarioErrorDetail({
        kind: error._tag,
        message: error.message,
        entity: error.members.join(", "),
      })
    case "ScenarioOverrideError":
      return new ScenarioErrorDetail({ kind: error._tag, message: error.message, entity: error.parameter })
    case "ScenarioTimeoutError":
      return new ScenarioErrorDetail({ kind: error._tag, message: error.message })
  }
}

const partialOf = (error: ScenarioError): TimeSeries | undefined =>
  error._tag === "SimulationError" || error._tag === "ConvergenceError" ? error.partial : undefined

const decodeOverrides = (
  label: string,
  input: unknown,
): Either.Either<Readonly<Record<string, ParameterOverride>>, ScenarioOverrideError> =>
  Either.mapLeft(Schema.decodeUnknownEither(ParameterOverrides)(input), (error) => {
    const [issue] = ParseResult.ArrayFormatter.formatErrorSync(error)
    const key = issue?.path[0]
    return new ScenarioOverrideError({
      label,
      parameter: key === undefined ? "" : String(key),
      reason: `invalid value (${issue?.message ?? ParseResult.TreeFormatter.formatErrorSync(error)})`,
    })
  })

const runOne = (
  input: ScenarioInput,
  resolver: ResolverOptions,
): Effect.Effect<SimulationResult, ScenarioError, Solver> =>
  Effect.gen(function* () {
    const decoded = yield* decodeModelConfig(input.config)
    const config =
      input.overrides === undefined
        ? decoded
        : yield* Either.flatMap(decodeOverrides(input.label, input.overrides), (overrides) =>
            applyOverrides(input.label, decoded, overrides),
          )
    const engine = yield* makeEngine(config, resolver)
    yield* Effect.logDebug(`Running ${engine.model.rowCount} steps`)
    return yield* engine.run
  })

/**
 * Run one scenario and turn any failure, including a defect, into a
 * `ScenarioFailure`. Never fails.
 *
 * @since 0.1.0
 * @category Scenarios
 */
export const runScenario = (
  input: ScenarioInput,
  options: RunScenariosOptions = {},
): Effect.Effect<ScenarioOutcome, never, Solver> => {
  const resolver: ResolverOptions = { ...defaultResolverOptions, ...options.resolver }
  const timeout = options.timeout
  const attempt =
    timeout === undefined
      ? runOne(input, resolver)
      : runOne(input, resolver).pipe(
          Effect.timeoutFail({
            duration: timeout,
            onTimeout: () => new ScenarioTimeoutError({ label: input.label, timeout: Duration.decode(timeout) }),
          }),
        )

  return attempt.pipe(
    Effect.tap(() => Effect.logDebug("Scenario completed")),
    Effect.map(
      (result): ScenarioOutcome =>
        new ScenarioSuccess({
          label: input.label,
          timeSeries: result.timeSeries,
          units: result.units,
          timeUnit: result.timeUnit,
        }),
    ),
    Effect.catchAll((error) =>
      Effect.as(
        Effect.logWarning(`Scenario failed: ${error.message}`),
        new ScenarioFailure({ label: input.label, error: errorDetail(error), partial: partialOf(error) }),
      ),
    ),
    Effect.catchAllDefect((defect) =>
      Effect.as(
        Effect.logWarning("Scenario died", defect),
        new ScenarioFailure({
          label: input.label,
          error: new ScenarioErrorDetail({
            kind: "Defect",
            message: defect instanceof Error ? defect.message : String(defect),
          }),
        }),
      ),
    ),
    Effect.withLogSpan("scenario"),
    Effect.annotateLogs("scenario", input.label),
  )
}

/**
 * Run scenarios concurrently. The result has one entry per input, in input
 * order; a failing scenario never affects its siblings.
 *
 * @since 0.1.0
 * @category Scenarios
 * @example
 * ```ts
 * const outcomes = yield* runScenarios(scenariosFromVariations(config, variations), { concurrency: 4 })
 * ```
 */
export const runScenarios = (
  inputs: ReadonlyArray<ScenarioInput>,
  options: RunScenariosOptions = {},
): Effect.Effect<ReadonlyArray<ScenarioOutcome>, never, Solver> =>
  Effect.forEach(inputs, (input) => runScenario(input, options), {
    concurrency: Math.max(1, options.concurrency ?? defaultEngineSettings.concurrency),
  })

/**
 * @since 0.1.0
 * @category Services
 */
export interface ScenarioRunnerService {
  readonly run: (inputs: ReadonlyArray<ScenarioInput>) => Effect.Effect<ReadonlyArray<ScenarioOutcome>>
}

/**
 * Scenario runner configured from `EngineSettings`.
 *
 * @category Services
 * @since 0.1.0
 */
export class ScenarioRunner extends Context.Tag("stock-flow-engine/ScenarioRunner")<
  ScenarioRunner,
  ScenarioRunnerService
>() {
  static readonly layer = Layer.effect(
    this,
    Effect.gen(function* () {
      const settings = yield* EngineSettings
      const solver = yield* Solver
      const options: RunScenariosOptions = {
        concurrency: settings.concurrency,
        timeout: Option.getOrUndefined(settings.scenarioTimeout),
        resolver: {
          strategy: settings.resolverStrategy,
          passes: settings.resolverPasses,
          cyclePasses: settings.cyclePasses,
          tolerance: settings.tolerance,
        },
      }
      return {
        run: (inputs: ReadonlyArray<ScenarioInput>) =>
          runScenarios(inputs, options).pipe(Effect.provideService(Solver, solver)),
      }
    }),
  )
}

/**
 * Per-column digest of a time series.
 *
 * @since 0.1.0
 * @category Summaries
 */
export class ColumnSummary extends Schema.Class<ColumnSummary>("ColumnSummary")({
  name: Schema.String,
  unit: Schema.String,
  initial: Schema.Number,
  final: Schema.Number,
  min: Schema.Number,
  max: Schema.Number,
  trend: Schema.Literal("increasing", "decreasing", "stable"),
}) {}

/**
 * Summarize every column except `time`. Empty for a series without rows.
 *
 * @since 0.1.0
 * @category Summaries
 */
export const summarizeTimeSeries = (
  timeSeries: TimeSeries,
  units: Readonly<Record<string, string>> = {},
): ReadonlyArray<ColumnSummary> =>
  timeSeries.columns
    .filter((name) => name !== "time")
    .flatMap((name) => {
      const values = timeSeries.column(name)
      const initial = values[0]
      const final = values[values.length - 1]
      if (initial === undefined || final === undefined) {
        return []
      }
      return [
        new ColumnSummary({
          name,
          unit: units[name] ?? "unknown_unit",
          initial,
          final,
          min: Math.min(...values),
          max: Math.max(...values),
          trend: initial < final ? "increasing" : initial > final ? "decreasing" : "stable",
        }),
      ]
    })

/**
 * Final-value differences of one scenario against the baseline.
 *
 * @since 0.1.0
 * @category Summaries
 */
export class ScenarioComparison extends Schema.Class<ScenarioComparison>("ScenarioComparison")({
  label: Schema.String,
  deltas: Schema.Record({ key: Schema.String, value: Schema.Number }),
}) {}

const finalRow = (timeSeries: TimeSeries): Readonly<Record<string, number>> =>
  timeSeries.rows[timeSeries.rows.length - 1] ?? {}

/**
 * Compare the final row of each scenario with the baseline's. Only columns
 * present in both are reported.
 *
 * @since 0.1.0
 * @category Summaries
 */
export const compareScenarios = (
  baseline: ScenarioSuccess,
  others: ReadonlyArray<ScenarioSuccess>,
): ReadonlyArray<ScenarioComparison> => {
  const base = finalRow(baseline.timeSeries)
  return others.map((other) => {
    const last = finalRow(other.timeSeries)
    const deltas: Record<string, number> = {}
    for (const name of other.timeSeries.columns) {
      const before = base[name]
      const after = last[name]
      if (name !== "time" && before !== undefined && after !== undefined) {
        deltas[name] = after - before
      }
    }
    return new ScenarioComparison({ label: other.label, deltas })
  })
}
