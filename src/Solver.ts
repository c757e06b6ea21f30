/**
 * Solver service.
 *
 * Exposes the integration step as a `Context.Tag` so the engine can be run
 * against alternative step implementations. `Solver.Euler` is the fixed-step
 * forward Euler scheme used by every run.
 *
 * @since 0.1.0
 */

import { Context, Effect, Layer } from "effect"
import { ConvergenceError, SimulationError, SolverTypeId, type SimulationFailure } from "./Errors.js"
import type { CompiledModel, SimState } from "./Simulation.js"
import { EquationEvaluationError } from "./internal/equations/errors.js"
import { evaluateFormulaAst, type ScopeEntry } from "./internal/equations/Evaluator.js"
import { resolveAuxiliaries } from "./internal/equations/GraphEngine.js"

const solverIdentifier = Symbol.keyFor(SolverTypeId) ?? "stock-flow-engine/Solver"

/**
 * Scope for one step: current stocks, auxiliaries and flow rates carried
 * from the previous step, parameters (bare ones as numbers) and `time`.
 */
const buildScope = (model: CompiledModel, state: SimState): Record<string, ScopeEntry> => {
  const scope: Record<string, ScopeEntry> = {}
  for (const stock of model.stocks) {
    scope[stock.name] = state.stocks[stock.name] ?? 0
  }
  for (const aux of model.auxiliaries) {
    scope[aux.name] = state.auxiliaries[aux.name] ?? 0
  }
  for (const flow of model.flows) {
    scope[flow.name] = state.flows[flow.name] ?? 0
  }
  for (const [name, parameter] of Object.entries(model.parameters)) {
    scope[name] = parameter
  }
  scope.time = state.time
  return scope
}

const sumRates = (names: ReadonlyArray<string>, rates: Readonly<Record<string, number>>): number => {
  let total = 0
  for (const name of names) {
    total += rates[name] ?? 0
  }
  return total
}

/**
 * Advance one forward Euler step. Throws `SimulationError` or
 * `ConvergenceError`; `Solver.Euler` lifts them into the error channel.
 *
 * Flow rates are evaluated against the scope after auxiliaries resolve but
 * are not written back, so a flow reading another flow sees the previous
 * step's rate.
 *
 * @since 0.1.0
 * @category Solver
 */
export const eulerStep = (model: CompiledModel, state: SimState): SimState => {
  const scope = buildScope(model, state)
  const auxiliaries = resolveAuxiliaries(model.plan, scope, state.time)

  const flows: Record<string, number> = {}
  for (const flow of model.flows) {
    try {
      flows[flow.name] = Math.max(0, evaluateFormulaAst(flow.formula, scope))
    } catch (error) {
      if (error instanceof EquationEvaluationError) {
        throw new SimulationError({
          entity: flow.name,
          kind: "flow",
          formula: flow.formula.source,
          time: state.time,
          cause: error,
        })
      }
      throw error
    }
  }

  const stocks: Record<string, number> = {}
  for (const stock of model.stocks) {
    const net = sumRates(stock.inflows, flows) - sumRates(stock.outflows, flows)
    stocks[stock.name] = Math.max(0, (state.stocks[stock.name] ?? 0) + net * model.dt)
  }

  const step = state.step + 1
  return {
    step,
    time: step * model.dt,
    stocks,
    auxiliaries,
    flows,
  }
}

const isSimulationFailure = (error: unknown): error is SimulationFailure =>
  error instanceof SimulationError || error instanceof ConvergenceError

/**
 * @since 0.1.0
 * @category Solver
 */
export interface SolverService {
  readonly name: string
  readonly step: (model: CompiledModel, state: SimState) => Effect.Effect<SimState, SimulationFailure>
}

/**
 * Solver service tag.
 *
 * @since 0.1.0
 * @category Solver
 */
export class Solver extends Context.Tag(solverIdentifier)<Solver, SolverService>() {
  /**
   * Fixed-step forward Euler. Errors other than simulation failures are
   * defects.
   *
   * @since 0.1.0
   */
  static readonly Euler = Layer.succeed(this, {
    name: "euler",
    step: (model: CompiledModel, state: SimState) =>
      Effect.try({
        try: () => eulerStep(model, state),
        catch: (error) => error,
      }).pipe(
        Effect.catchAll((error) => (isSimulationFailure(error) ? Effect.fail(error) : Effect.die(error))),
      ),
  })
}
