import { describe, it } from "@effect/vitest"
import { Arbitrary, Effect, Schema } from "effect"
import * as FastCheck from "effect/FastCheck"
import type { ModelConfigInput } from "../src/Model.js"
import { makeEngine, type SimulationResult } from "../src/Simulation.js"
import { Solver } from "../src/Solver.js"
import { decodeOrThrow } from "./fixtures.js"

const TankSample = Schema.Struct({
  initial: Schema.Int.pipe(Schema.between(0, 1_000)),
  inflow: Schema.Int.pipe(Schema.between(-50, 50)),
  outflow: Schema.Int.pipe(Schema.between(0, 200)),
  steps: Schema.Int.pipe(Schema.between(0, 60)),
  dt: Schema.Literal(0.1, 0.25, 0.5, 1, 2),
})

type TankSample = typeof TankSample.Type

const tankConfig = (sample: TankSample): ModelConfigInput => ({
  stocks: [{ name: "Tank", initial_value: sample.initial, unit: "litres" }],
  flows: [
    { name: "Fill", formula: String(sample.inflow), unit: "litres/day" },
    { name: "Drain", formula: String(sample.outflow), unit: "litres/day" },
  ],
  flow_connections: [
    ["Fill", "Tank", "inflow"],
    ["Drain", "Tank", "outflow"],
  ],
  simulation_settings: {
    end_time: { value: sample.steps * sample.dt, unit: "days" },
    dt: { value: sample.dt, unit: "days" },
  },
})

const runTank = (sample: TankSample): SimulationResult =>
  Effect.runSync(
    Effect.flatMap(makeEngine(decodeOrThrow(tankConfig(sample))), (engine) => engine.run).pipe(
      Effect.provide(Solver.Euler),
    ),
  )

const tankArbitrary = Arbitrary.make(TankSample)

describe("simulation properties", () => {
  it("records one row per step plus the initial row", () => {
    FastCheck.assert(
      FastCheck.property(tankArbitrary, (sample) => runTank(sample).timeSeries.length === sample.steps + 1),
      { numRuns: 50 },
    )
  })

  it("derives each row's time from its index", () => {
    FastCheck.assert(
      FastCheck.property(tankArbitrary, (sample) =>
        runTank(sample)
          .timeSeries.column("time")
          .every((time, index) => time === index * sample.dt),
      ),
      { numRuns: 50 },
    )
  })

  it("keeps stocks and flow rates non-negative", () => {
    FastCheck.assert(
      FastCheck.property(tankArbitrary, (sample) => {
        const { timeSeries } = runTank(sample)
        return ["Tank", "Fill", "Drain"].every((name) => timeSeries.column(name).every((value) => value >= 0))
      }),
      { numRuns: 50 },
    )
  })
})
