import { describe, it, expect } from "@effect/vitest"
import { Effect } from "effect"
import { ConfigError, ConvergenceError, SimulationError, SolverTypeId } from "../src/Errors.js"
import { EquationEvaluationError } from "../src/internal/equations/errors.js"
import { TimeSeries } from "../src/Types.js"

describe("Engine errors", () => {
  it("prefixes configuration errors", () => {
    const error = new ConfigError({ reason: "dt must be greater than 0, received 0" })
    expect(error.message).toBe("Invalid model configuration: dt must be greater than 0, received 0")
    expect(error._tag).toBe("ConfigError")
  })

  it("names the entity, formula and time of a simulation error", () => {
    const error = new SimulationError({
      entity: "Hiring",
      kind: "flow",
      formula: "Budget / Salary",
      time: 2.5,
      cause: new EquationEvaluationError({ expression: "Budget / Salary", problem: "Division by zero", symbol: "/" }),
    })
    expect(error.message).toBe(
      'Error calculating flow "Hiring" with formula "Budget / Salary" at t=2.5: Division by zero',
    )
    expect(error.partial).toBeUndefined()
  })

  it("lists the members of a cycle that does not converge", () => {
    const error = new ConvergenceError({
      members: ["Demand", "Price"],
      time: 4,
      passes: 100,
      delta: 0.5,
      partial: new TimeSeries({ columns: ["time"], rows: [], complete: false }),
    })
    expect(error.message).toBe("Auxiliaries Demand, Price did not converge at t=4 after 100 passes (last change 0.5)")
    expect(error.partial?.complete).toBe(false)
  })

  it("keys the solver service by a registered symbol", () => {
    expect(Symbol.keyFor(SolverTypeId)).toBe("stock-flow-engine/Solver")
  })

  it.effect("can be recovered by tag", () =>
    Effect.gen(function* () {
      const recovered = yield* Effect.fail(new ConfigError({ reason: "bad", entity: "Capital" })).pipe(
        Effect.catchTag("ConfigError", (error) => Effect.succeed(error.entity)),
      )
      expect(recovered).toBe("Capital")
    }),
  )
})
