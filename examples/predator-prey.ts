import { Effect } from "effect"
import { mkdirSync, writeFileSync } from "node:fs"
import { ParameterVariation, runScenarios, scenariosFromVariations, summarizeTimeSeries } from "../src/Scenarios.js"
import { Solver } from "../src/Solver.js"
import { buildPredatorPreyConfig } from "./predator-prey-model.js"

const config = buildPredatorPreyConfig()

const variations = [
  new ParameterVariation({
    scenario_description: "Scarce prey",
    parameters: { PreyBirthRate: { value: 0.05, unit: "1/week" } },
  }),
  new ParameterVariation({
    scenario_description: "Efficient predators",
    parameters: { PredatorEfficiency: 0.2 },
  }),
]

const outDir = new URL("./out/", import.meta.url)

const program = Effect.gen(function* () {
  const outcomes = yield* runScenarios(scenariosFromVariations(config, variations))
  yield* Effect.sync(() => mkdirSync(outDir, { recursive: true }))

  for (const outcome of outcomes) {
    if (outcome.status === "failure") {
      yield* Effect.logWarning(`${outcome.label}: ${outcome.error.message}`)
      continue
    }
    const summary = summarizeTimeSeries(outcome.timeSeries, outcome.units)
    const fileName = `${outcome.label.toLowerCase().replace(/[^a-z0-9]+/g, "-")}.json`
    yield* Effect.sync(() =>
      writeFileSync(
        new URL(fileName, outDir),
        JSON.stringify({ label: outcome.label, summary, rows: outcome.timeSeries.rows }, null, 2),
        "utf-8",
      ),
    )
    yield* Effect.log(`${outcome.label}: ${outcome.timeSeries.length} rows written to ${fileName}`)
  }
}).pipe(Effect.provide(Solver.Euler))

Effect.runPromise(program).catch((error) => {
  console.error("Failed to run predator-prey example", error)
  process.exitCode = 1
})
