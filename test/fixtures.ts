import { Either } from "effect"
import { decodeModelConfigEither, type ModelConfig, type ModelConfigInput } from "../src/Model.js"
import { compileModel, defaultResolverOptions, type CompiledModel } from "../src/Simulation.js"
import type { ResolverOptions } from "../src/internal/equations/GraphEngine.js"

/**
 * Capital grows by a constant inflow of 10 per day.
 */
export const capitalConfig = (endTime = 3, dt = 1): ModelConfigInput => ({
  stocks: [{ name: "Capital", initial_value: 100, unit: "USD" }],
  flows: [{ name: "Inflow", formula: "10", unit: "USD/day" }],
  flow_connections: [["Inflow", "Capital", "inflow"]],
  simulation_settings: {
    end_time: { value: endTime, unit: "days" },
    dt: { value: dt, unit: "days" },
  },
})

/**
 * A tank drained faster than it holds, so the clamp at zero is reached.
 */
export const drainConfig: ModelConfigInput = {
  stocks: [{ name: "Tank", initial_value: 5, unit: "litres" }],
  parameters: { DrainRate: { value: 3, unit: "litres/minute" } },
  flows: [{ name: "Drain", formula: "DrainRate.value", unit: "litres/minute" }],
  flow_connections: [{ flow_name: "Drain", stock_name: "Tank", direction: "outflow" }],
  simulation_settings: {
    end_time: { value: 4, unit: "minutes" },
    dt: { value: 1, unit: "minutes" },
  },
}

/**
 * Decode a configuration in tests, failing loudly when it is invalid.
 */
export const decodeOrThrow = (input: unknown): ModelConfig =>
  Either.getOrThrowWith(decodeModelConfigEither(input), (error) => error)

export const compileOrThrow = (
  input: ModelConfigInput,
  options: Partial<ResolverOptions> = {},
): CompiledModel =>
  Either.getOrThrowWith(
    compileModel(decodeOrThrow(input), { ...defaultResolverOptions, ...options }),
    (error) => error,
  )
