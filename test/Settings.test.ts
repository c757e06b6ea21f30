import { describe, it, expect } from "@effect/vitest"
import { ConfigProvider, Duration, Effect, Exit, Option } from "effect"
import { EngineSettings, defaultEngineSettings } from "../src/Settings.js"

const fromEnv = (entries: ReadonlyArray<readonly [string, string]>) =>
  Effect.withConfigProvider(ConfigProvider.fromMap(new Map(entries)))

const readSettings = Effect.gen(function* () {
  return yield* EngineSettings
})

describe("EngineSettings", () => {
  it.effect("provides the defaults", () =>
    Effect.gen(function* () {
      const settings = yield* readSettings
      expect(settings.resolverStrategy).toBe("ordered")
      expect(settings.resolverPasses).toBe(5)
      expect(settings.cyclePasses).toBe(100)
      expect(settings.tolerance).toBe(1e-9)
      expect(settings.concurrency).toBeGreaterThanOrEqual(1)
      expect(Option.isNone(settings.scenarioTimeout)).toBe(true)
    }).pipe(Effect.provide(EngineSettings.layer)),
  )

  it.effect("merges overrides onto the defaults", () =>
    Effect.gen(function* () {
      const settings = yield* readSettings
      expect(settings.resolverStrategy).toBe("relaxation")
      expect(settings.cyclePasses).toBe(defaultEngineSettings.cyclePasses)
    }).pipe(Effect.provide(EngineSettings.make({ resolverStrategy: "relaxation" }))),
  )

  it.effect("reads settings from the config provider", () =>
    Effect.gen(function* () {
      const settings = yield* readSettings.pipe(
        Effect.provide(EngineSettings.fromConfig),
        fromEnv([
          ["STOCKFLOW_RESOLVER_STRATEGY", "relaxation"],
          ["STOCKFLOW_RESOLVER_PASSES", "8"],
          ["STOCKFLOW_CONCURRENCY", "2"],
          ["STOCKFLOW_SCENARIO_TIMEOUT", "5 seconds"],
        ]),
      )
      expect(settings.resolverStrategy).toBe("relaxation")
      expect(settings.resolverPasses).toBe(8)
      expect(settings.concurrency).toBe(2)
      expect(settings.tolerance).toBe(1e-9)
      expect(Option.map(settings.scenarioTimeout, Duration.toMillis)).toEqual(Option.some(5000))
    }),
  )

  it.effect("rejects invalid values", () =>
    Effect.gen(function* () {
      const badPasses = yield* readSettings.pipe(
        Effect.provide(EngineSettings.fromConfig),
        fromEnv([["STOCKFLOW_RESOLVER_PASSES", "0"]]),
        Effect.exit,
      )
      expect(Exit.isFailure(badPasses)).toBe(true)

      const badStrategy = yield* readSettings.pipe(
        Effect.provide(EngineSettings.fromConfig),
        fromEnv([["STOCKFLOW_RESOLVER_STRATEGY", "fastest"]]),
        Effect.exit,
      )
      expect(Exit.isFailure(badStrategy)).toBe(true)
    }),
  )
})
