/**
 * Engine settings
 *
 * Tunables shared by the engine and the scenario runner. `EngineSettings.layer`
 * supplies the defaults; `EngineSettings.fromConfig` reads overrides through
 * Effect's `Config` module so they can come from environment variables or any
 * other `ConfigProvider`.
 *
 * @since 0.1.0
 */

import { availableParallelism } from "node:os"
import { Config, Context, Duration, Effect, Layer, Option } from "effect"
import type { ResolverStrategy } from "./Types.js"

/**
 * @since 0.1.0
 * @category Settings
 */
export interface EngineSettingsService {
  readonly resolverStrategy: ResolverStrategy
  /** Sweeps per step for the `relaxation` strategy. */
  readonly resolverPasses: number
  /** Pass budget for each cyclic block under the `ordered` strategy. */
  readonly cyclePasses: number
  readonly tolerance: number
  readonly concurrency: number
  readonly scenarioTimeout: Option.Option<Duration.Duration>
}

/**
 * @since 0.1.0
 * @category Settings
 */
export const defaultEngineSettings: EngineSettingsService = {
  resolverStrategy: "ordered",
  resolverPasses: 5,
  cyclePasses: 100,
  tolerance: 1e-9,
  concurrency: Math.max(1, availableParallelism()),
  scenarioTimeout: Option.none(),
}

const settingsConfig = Config.all({
  resolverStrategy: Config.literal("ordered", "relaxation")("STOCKFLOW_RESOLVER_STRATEGY").pipe(
    Config.withDefault(defaultEngineSettings.resolverStrategy),
  ),
  resolverPasses: Config.integer("STOCKFLOW_RESOLVER_PASSES").pipe(
    Config.validate({ message: "must be a positive integer", validation: (n) => n > 0 }),
    Config.withDefault(defaultEngineSettings.resolverPasses),
  ),
  cyclePasses: Config.integer("STOCKFLOW_RESOLVER_CYCLE_PASSES").pipe(
    Config.validate({ message: "must be a positive integer", validation: (n) => n > 0 }),
    Config.withDefault(defaultEngineSettings.cyclePasses),
  ),
  tolerance: Config.number("STOCKFLOW_RESOLVER_TOLERANCE").pipe(
    Config.validate({ message: "must be a positive number", validation: (n) => n > 0 }),
    Config.withDefault(defaultEngineSettings.tolerance),
  ),
  concurrency: Config.integer("STOCKFLOW_CONCURRENCY").pipe(
    Config.validate({ message: "must be a positive integer", validation: (n) => n > 0 }),
    Config.withDefault(defaultEngineSettings.concurrency),
  ),
  scenarioTimeout: Config.option(Config.duration("STOCKFLOW_SCENARIO_TIMEOUT")),
})

/**
 * Service tag for engine settings.
 *
 * @since 0.1.0
 * @category Settings
 * @example
 * ```ts
 * const program = Effect.gen(function* () {
 *   const settings = yield* EngineSettings
 *   return settings.resolverStrategy
 * }).pipe(Effect.provide(EngineSettings.fromConfig))
 * ```
 */
export class EngineSettings extends Context.Tag("stock-flow-engine/EngineSettings")<
  EngineSettings,
  EngineSettingsService
>() {
  static readonly layer = Layer.succeed(this, defaultEngineSettings)

  static readonly make = (overrides: Partial<EngineSettingsService>) =>
    Layer.succeed(this, { ...defaultEngineSettings, ...overrides })

  static readonly fromConfig = Layer.effect(
    this,
    Effect.map(settingsConfig, (settings): EngineSettingsService => settings),
  )
}
