/**
 * Stock-flow engine
 *
 * Compiles a `ModelConfig` into runtime registries (stocks, flows,
 * auxiliaries, parameters and the auxiliary resolver plan) and drives the
 * solver over fixed steps. Every run records one row per step, taken before
 * the step's updates are applied, so row `i` is the state at the start of the
 * interval `[i·dt, (i+1)·dt)`.
 *
 * @since 0.1.0
 */

import { Chunk, Effect, Either, Option, Ref, Schema, Stream } from "effect"
import { ConfigError, ConvergenceError, SimulationError, type SimulationFailure } from "./Errors.js"
import { BareParameterDef, checkModelConfig, type ModelConfig } from "./Model.js"
import { EngineSettings, defaultEngineSettings, type EngineSettingsService } from "./Settings.js"
import { Solver } from "./Solver.js"
import { TimeSeries, type EngineStatus } from "./Types.js"
import type { FormulaNode } from "./internal/equations/Ast.js"
import type { ScopeEntry } from "./internal/equations/Evaluator.js"
import {
  compileResolverPlan,
  type AuxiliaryNode,
  type ResolverOptions,
  type ResolverPlan,
} from "./internal/equations/GraphEngine.js"
import { parseFormulaEither } from "./internal/equations/Parser.js"

/**
 * Steps closer than this to a whole number count as whole when deriving the
 * row count from `end_time / dt`.
 */
const STEP_EPSILON = 1e-9

/**
 * Runtime stock. Flows are referenced by name; stocks never own them.
 *
 * @since 0.1.0
 * @category Simulation
 */
export interface StockNode {
  readonly name: string
  readonly unit: string
  readonly initialValue: number
  readonly inflows: ReadonlyArray<string>
  readonly outflows: ReadonlyArray<string>
}

/**
 * @since 0.1.0
 * @category Simulation
 */
export interface FlowNode {
  readonly name: string
  readonly unit: string
  readonly formula: FormulaNode
}

/**
 * Registries for one run. Built once per run and never shared.
 *
 * @since 0.1.0
 * @category Simulation
 */
export interface CompiledModel {
  readonly stocks: ReadonlyArray<StockNode>
  readonly auxiliaries: ReadonlyArray<AuxiliaryNode>
  readonly flows: ReadonlyArray<FlowNode>
  /** Bare parameters bind as numbers, the rest as `{ value, unit }`. */
  readonly parameters: Readonly<Record<string, ScopeEntry>>
  readonly plan: ResolverPlan
  readonly dt: number
  readonly endTime: number
  readonly rowCount: number
  readonly timeUnit: string
  /** Unit of every stock, auxiliary, flow and parameter. */
  readonly units: Readonly<Record<string, string>>
  /** `time` followed by stock, auxiliary and flow names in declaration order. */
  readonly columns: ReadonlyArray<string>
}

/**
 * Snapshot of a run at the start of step `step`. Auxiliary and flow values
 * are the ones computed during the previous step (zero before the first).
 *
 * @since 0.1.0
 * @category Simulation
 */
export interface SimState {
  readonly step: number
  readonly time: number
  readonly stocks: Readonly<Record<string, number>>
  readonly auxiliaries: Readonly<Record<string, number>>
  readonly flows: Readonly<Record<string, number>>
}

/**
 * Successful run output.
 *
 * @since 0.1.0
 * @category Simulation
 */
export class SimulationResult extends Schema.Class<SimulationResult>("SimulationResult")({
  timeSeries: TimeSeries,
  units: Schema.Record({ key: Schema.String, value: Schema.String }),
  timeUnit: Schema.String,
}) {}

const resolverOptionsFrom = (settings: EngineSettingsService): ResolverOptions => ({
  strategy: settings.resolverStrategy,
  passes: settings.resolverPasses,
  cyclePasses: settings.cyclePasses,
  tolerance: settings.tolerance,
})

/**
 * Resolver options used when none are given.
 *
 * @since 0.1.0
 * @category Simulation
 */
export const defaultResolverOptions: ResolverOptions = resolverOptionsFrom(defaultEngineSettings)

const parseEntityFormula = (
  kind: "auxiliary" | "flow",
  name: string,
  source: string,
): Either.Either<FormulaNode, ConfigError> =>
  Either.mapLeft(
    parseFormulaEither(source),
    (cause) =>
      new ConfigError({
        reason: `Formula of ${kind} "${name}" does not parse: ${cause.message}`,
        entity: name,
        formula: source,
        cause,
      }),
  )

/**
 * Validate a configuration and build its runtime registries. Every formula
 * is parsed here, so a malformed one fails before any step runs.
 *
 * @since 0.1.0
 * @category Simulation
 */
export const compileModel = (
  config: ModelConfig,
  options: ResolverOptions = defaultResolverOptions,
): Either.Either<CompiledModel, ConfigError> =>
  Either.gen(function* () {
    yield* checkModelConfig(config)

    const auxiliaries: Array<AuxiliaryNode> = []
    for (const aux of config.auxiliaries) {
      const formula = yield* parseEntityFormula("auxiliary", aux.name, aux.formula)
      auxiliaries.push({ name: aux.name, unit: aux.unit, formula })
    }

    const flows: Array<FlowNode> = []
    for (const flow of config.flows) {
      const formula = yield* parseEntityFormula("flow", flow.name, flow.formula)
      flows.push({ name: flow.name, unit: flow.unit, formula })
    }

    const stocks: Array<StockNode> = config.stocks.map((stock) => {
      const inflows: Array<string> = []
      const outflows: Array<string> = []
      for (const connection of config.flow_connections) {
        if (connection.stock_name !== stock.name) {
          continue
        }
        if (connection.direction === "inflow") {
          inflows.push(connection.flow_name)
        } else {
          outflows.push(connection.flow_name)
        }
      }
      return { name: stock.name, unit: stock.unit, initialValue: stock.initial_value, inflows, outflows }
    })

    const parameters: Record<string, ScopeEntry> = {}
    const units: Record<string, string> = {}
    for (const stock of stocks) {
      units[stock.name] = stock.unit
    }
    for (const aux of auxiliaries) {
      units[aux.name] = aux.unit
    }
    for (const flow of flows) {
      units[flow.name] = flow.unit
    }
    for (const [name, parameter] of Object.entries(config.parameters)) {
      parameters[name] =
        parameter instanceof BareParameterDef ? parameter.value : { value: parameter.value, unit: parameter.unit }
      units[name] = parameter.unit
    }

    const { dt, end_time } = config.simulation_settings
    return {
      stocks,
      auxiliaries,
      flows,
      parameters,
      plan: compileResolverPlan(auxiliaries, options),
      dt: dt.value,
      endTime: end_time.value,
      rowCount: Math.floor(end_time.value / dt.value + STEP_EPSILON) + 1,
      timeUnit: dt.unit,
      units,
      columns: [
        "time",
        ...stocks.map((stock) => stock.name),
        ...auxiliaries.map((aux) => aux.name),
        ...flows.map((flow) => flow.name),
      ],
    }
  })

/**
 * State before the first step: stocks at their initial values, auxiliaries
 * and flow rates at zero.
 *
 * @since 0.1.0
 * @category Simulation
 */
export const initialState = (model: CompiledModel): SimState => ({
  step: 0,
  time: 0,
  stocks: Object.fromEntries(model.stocks.map((stock) => [stock.name, stock.initialValue] as const)),
  auxiliaries: Object.fromEntries(model.auxiliaries.map((aux) => [aux.name, 0] as const)),
  flows: Object.fromEntries(model.flows.map((flow) => [flow.name, 0] as const)),
})

/**
 * Flatten a state into an output row keyed by column name.
 *
 * @since 0.1.0
 * @category Simulation
 */
export const stateToRow = (model: CompiledModel, state: SimState): Record<string, number> => {
  const row: Record<string, number> = { time: state.time }
  for (const stock of model.stocks) {
    row[stock.name] = state.stocks[stock.name] ?? 0
  }
  for (const aux of model.auxiliaries) {
    row[aux.name] = state.auxiliaries[aux.name] ?? 0
  }
  for (const flow of model.flows) {
    row[flow.name] = state.flows[flow.name] ?? 0
  }
  return row
}

const withPartial = (error: SimulationFailure, partial: TimeSeries): SimulationFailure =>
  error._tag === "SimulationError"
    ? new SimulationError({
        entity: error.entity,
        kind: error.kind,
        formula: error.formula,
        time: error.time,
        cause: error.cause,
        partial,
      })
    : new ConvergenceError({
        members: error.members,
        time: error.time,
        passes: error.passes,
        delta: error.delta,
        partial,
      })

/**
 * A compiled model bound to a solver.
 *
 * @since 0.1.0
 * @category Simulation
 */
export interface SimulationEngine {
  readonly model: CompiledModel
  /** Lifecycle of the most recent `run`. */
  readonly status: Effect.Effect<EngineStatus>
  /**
   * Pre-step states, one per row. Every step is computed before its state is
   * emitted, so a failure in step `i` surfaces before row `i` is produced.
   */
  readonly stream: Stream.Stream<SimState, SimulationFailure>
  /**
   * Run to completion. On failure the error carries the rows recorded so far
   * as an incomplete `TimeSeries`.
   */
  readonly run: Effect.Effect<SimulationResult, SimulationFailure>
}

/**
 * Build an engine for one run.
 *
 * @since 0.1.0
 * @category Simulation
 * @example
 * ```ts
 * const result = yield* Effect.flatMap(makeEngine(config), (engine) => engine.run)
 * result.timeSeries.column("Capital") // [100, 110, 120, 130]
 * ```
 */
export const makeEngine = (
  config: ModelConfig,
  options: ResolverOptions = defaultResolverOptions,
): Effect.Effect<SimulationEngine, ConfigError, Solver> =>
  Effect.gen(function* () {
    const model = yield* compileModel(config, options)
    const solver = yield* Solver
    const status = yield* Ref.make<EngineStatus>("Initialized")

    const stream = Stream.unfoldEffect(initialState(model), (state) =>
      state.step >= model.rowCount
        ? Effect.succeed(Option.none<readonly [SimState, SimState]>())
        : Effect.map(solver.step(model, state), (next) => Option.some([state, next] as const)),
    )

    const run = Effect.gen(function* () {
      yield* Ref.set(status, "Stepping")
      const rows: Array<Record<string, number>> = []
      const outcome = yield* Stream.runForEach(stream, (state) =>
        Effect.sync(() => {
          rows.push(stateToRow(model, state))
        }),
      ).pipe(Effect.either)

      if (Either.isLeft(outcome)) {
        yield* Ref.set(status, "Failed")
        const partial = new TimeSeries({ columns: model.columns, rows, complete: false })
        return yield* Effect.fail(withPartial(outcome.left, partial))
      }

      yield* Ref.set(status, "Completed")
      return new SimulationResult({
        timeSeries: new TimeSeries({ columns: model.columns, rows, complete: true }),
        units: model.units,
        timeUnit: model.timeUnit,
      })
    }).pipe(Effect.onInterrupt(() => Ref.set(status, "Failed")))

    return {
      model,
      status: Ref.get(status),
      stream,
      run,
    }
  })

/**
 * Compile and run a model with the resolver configured by `EngineSettings`.
 *
 * @since 0.1.0
 * @category Simulation
 */
export const simulate = (
  config: ModelConfig,
): Effect.Effect<SimulationResult, ConfigError | SimulationFailure, Solver | EngineSettings> =>
  Effect.gen(function* () {
    const settings = yield* EngineSettings
    const engine = yield* makeEngine(config, resolverOptionsFrom(settings))
    return yield* engine.run
  })

/**
 * Collect the states of a run without building a `TimeSeries`.
 *
 * @since 0.1.0
 * @category Simulation
 */
export const simulateStates = (
  config: ModelConfig,
  options: ResolverOptions = defaultResolverOptions,
): Effect.Effect<ReadonlyArray<SimState>, ConfigError | SimulationFailure, Solver> =>
  Effect.flatMap(makeEngine(config, options), (engine) =>
    Stream.runCollect(engine.stream).pipe(Effect.map(Chunk.toReadonlyArray)),
  )
