/**
 * @since 0.1.0
 */

import { Layer } from "effect"
import { EquationEvaluator } from "./Equations.js"
import { ScenarioRunner } from "./Scenarios.js"
import { EngineSettings } from "./Settings.js"
import { Solver } from "./Solver.js"

export * from "./Equations.js"
export * from "./Errors.js"
export * from "./Model.js"
export * from "./Resolver.js"
export * from "./Scenarios.js"
export * from "./Settings.js"
export * from "./Simulation.js"
export * from "./Solver.js"
export * from "./Types.js"

/**
 * Every service with its default implementation: default settings, the Euler
 * solver, the formula evaluator and the scenario runner.
 *
 * @since 0.1.0
 * @category Layers
 */
export const StockFlowLive = Layer.mergeAll(
  ScenarioRunner.layer.pipe(Layer.provideMerge(Layer.merge(EngineSettings.layer, Solver.Euler))),
  EquationEvaluator.layer,
)
