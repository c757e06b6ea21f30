/**
 * Model configuration schemas
 *
 * The declarative description of a stock-flow model as upstream generators
 * emit it:
 * - Stock: an accumulator with an initial value
 * - Parameter: a named constant `{ value, unit }`
 * - Auxiliary: a derived quantity recomputed every step
 * - Flow: a rate moving material into or out of stocks
 * - FlowConnection: which stock a flow feeds or drains
 * - SimulationSettings: horizon and time step
 *
 * Field names follow the wire format (`initial_value`, `flow_connections`, ...)
 * so decoded JSON needs no renaming.
 *
 * @since 0.1.0
 */

import { Effect, Either, ParseResult, Schema } from "effect"
import { ConfigError } from "./Errors.js"
import { FiniteNumber, FlowDirection } from "./Types.js"

/**
 * Scope name bound to the current simulation time; no entity may use it.
 *
 * @since 0.1.0
 * @category Models
 */
export const RESERVED_TIME_NAME = "time"

// Assigning this key on a plain object replaces its prototype instead of adding a column.
const RESERVED_NAMES: ReadonlySet<string> = new Set([RESERVED_TIME_NAME, "__proto__"])

/**
 * Unit assigned to parameters given as a bare number.
 *
 * @since 0.1.0
 * @category Models
 */
export const DIMENSIONLESS = "dimensionless"

/**
 * Stock: an accumulator whose value changes only through its connected flows.
 *
 * @since 0.1.0
 * @category Models
 * @example
 * ```ts
 * const capital = new StockDef({ name: "Capital", initial_value: 100, unit: "USD" })
 * ```
 */
export class StockDef extends Schema.Class<StockDef>("StockDef")({
  name: Schema.String,
  initial_value: FiniteNumber,
  unit: Schema.String,
  description: Schema.optional(Schema.String),
}) {}

/**
 * Auxiliary: a named formula over stocks, parameters, other auxiliaries, flow
 * rates of the previous step and `time`.
 *
 * @since 0.1.0
 * @category Models
 */
export class AuxiliaryDef extends Schema.Class<AuxiliaryDef>("AuxiliaryDef")({
  name: Schema.String,
  formula: Schema.String,
  unit: Schema.String,
  description: Schema.optional(Schema.String),
}) {}

/**
 * Flow: a named rate formula. Negative results are clamped to zero.
 *
 * @since 0.1.0
 * @category Models
 * @example
 * ```ts
 * const inflow = new FlowDef({ name: "Inflow", formula: "Rate.value * Capital", unit: "USD/day" })
 * ```
 */
export class FlowDef extends Schema.Class<FlowDef>("FlowDef")({
  name: Schema.String,
  formula: Schema.String,
  unit: Schema.String,
  description: Schema.optional(Schema.String),
}) {}

/**
 * Parameter: a constant exposed to formulas as a structure, read through
 * `.value` or `['value']`. See `BareParameterDef` for the bare-number form.
 *
 * @since 0.1.0
 * @category Models
 */
export class ParameterDef extends Schema.Class<ParameterDef>("ParameterDef")({
  value: FiniteNumber,
  unit: Schema.String,
  description: Schema.optional(Schema.String),
}) {}

/**
 * Parameter given as a bare number. Formulas read it as a plain number rather
 * than a structure; its unit is dimensionless.
 *
 * @since 0.1.0
 * @category Models
 */
export class BareParameterDef extends ParameterDef.extend<BareParameterDef>("BareParameterDef")({}) {}

const BareParameter = Schema.transform(FiniteNumber, Schema.typeSchema(BareParameterDef), {
  strict: true,
  decode: (value) => new BareParameterDef({ value, unit: DIMENSIONLESS }),
  encode: (parameter) => parameter.value,
})

/**
 * Accepts `{ value, unit }` or a bare number, which becomes dimensionless.
 *
 * @since 0.1.0
 * @category Models
 */
export const ParameterInput = Schema.Union(ParameterDef, BareParameter)

/**
 * Connection of a flow to a stock. `direction` stays a plain string here and
 * is checked by `validateModelConfig`.
 *
 * @since 0.1.0
 * @category Models
 */
export class FlowConnection extends Schema.Class<FlowConnection>("FlowConnection")({
  flow_name: Schema.String,
  stock_name: Schema.String,
  direction: Schema.String,
}) {}

const FlowConnectionTuple = Schema.transform(
  Schema.Tuple(Schema.String, Schema.String, Schema.String),
  Schema.typeSchema(FlowConnection),
  {
    strict: true,
    decode: ([flow_name, stock_name, direction]) => new FlowConnection({ flow_name, stock_name, direction }),
    encode: (connection) => [connection.flow_name, connection.stock_name, connection.direction] as const,
  },
)

/**
 * Accepts the object form or the `[flow, stock, direction]` tuple form.
 *
 * @since 0.1.0
 * @category Models
 */
export const FlowConnectionInput = Schema.Union(FlowConnection, FlowConnectionTuple)

/**
 * @since 0.1.0
 * @category Models
 */
export class TimeSetting extends Schema.Class<TimeSetting>("TimeSetting")({
  value: FiniteNumber,
  unit: Schema.optionalWith(Schema.String, { default: () => "days" }),
}) {}

/**
 * Horizon and step size. Missing entries default to 100 days and 1 day.
 *
 * @since 0.1.0
 * @category Models
 */
export class SimulationSettings extends Schema.Class<SimulationSettings>("SimulationSettings")({
  end_time: Schema.optionalWith(TimeSetting, { default: () => new TimeSetting({ value: 100 }) }),
  dt: Schema.optionalWith(TimeSetting, { default: () => new TimeSetting({ value: 1 }) }),
}) {}

/**
 * A complete model. Entity lists keep their declaration order, which fixes
 * evaluation order and output column order.
 *
 * @since 0.1.0
 * @category Models
 * @example
 * ```ts
 * const config = yield* decodeModelConfig({
 *   stocks: [{ name: "Capital", initial_value: 100, unit: "USD" }],
 *   parameters: { Rate: { value: 0.1, unit: "1/day" } },
 *   flows: [{ name: "Inflow", formula: "Rate.value * 100", unit: "USD/day" }],
 *   flow_connections: [["Inflow", "Capital", "inflow"]],
 *   simulation_settings: { end_time: { value: 3, unit: "days" }, dt: { value: 1, unit: "days" } }
 * })
 * ```
 */
export class ModelConfig extends Schema.Class<ModelConfig>("ModelConfig")({
  stocks: Schema.optionalWith(Schema.Array(StockDef), { default: () => [] }),
  parameters: Schema.optionalWith(Schema.Record({ key: Schema.String, value: ParameterInput }), {
    default: () => ({}),
  }),
  auxiliaries: Schema.optionalWith(Schema.Array(AuxiliaryDef), { default: () => [] }),
  flows: Schema.optionalWith(Schema.Array(FlowDef), { default: () => [] }),
  flow_connections: Schema.optionalWith(Schema.Array(FlowConnectionInput), { default: () => [] }),
  simulation_settings: Schema.optionalWith(SimulationSettings, {
    default: () => new SimulationSettings({}),
  }),
  problem_description: Schema.optional(Schema.String),
}) {}

/**
 * Encoded (wire) shape of a model configuration.
 *
 * @since 0.1.0
 * @category Models
 */
export type ModelConfigInput = typeof ModelConfig.Encoded

const decodeUnknown = Schema.decodeUnknownEither(ModelConfig)

const toConfigError = (error: ParseResult.ParseError): ConfigError =>
  new ConfigError({ reason: ParseResult.TreeFormatter.formatErrorSync(error) })

interface Entity {
  readonly name: string
  readonly kind: "stock" | "parameter" | "auxiliary" | "flow"
}

const entitiesOf = (config: ModelConfig): ReadonlyArray<Entity> => [
  ...config.stocks.map((stock): Entity => ({ name: stock.name, kind: "stock" })),
  ...Object.keys(config.parameters).map((name): Entity => ({ name, kind: "parameter" })),
  ...config.auxiliaries.map((aux): Entity => ({ name: aux.name, kind: "auxiliary" })),
  ...config.flows.map((flow): Entity => ({ name: flow.name, kind: "flow" })),
]

const isFlowDirection = Schema.is(FlowDirection)

const liftEither = <A>(either: Either.Either<A, ConfigError>): Effect.Effect<A, ConfigError> =>
  Either.match(either, {
    onLeft: (error) => Effect.fail(error),
    onRight: (value) => Effect.succeed(value),
  })

/**
 * Structural checks that the schema alone cannot express. Returns the first
 * problem found.
 *
 * @since 0.1.0
 * @category Models
 */
export const checkModelConfig = (config: ModelConfig): Either.Either<ModelConfig, ConfigError> => {
  const seen = new Map<string, Entity["kind"]>()
  for (const entity of entitiesOf(config)) {
    if (entity.name.trim().length === 0) {
      return Either.left(new ConfigError({ reason: `Empty ${entity.kind} name` }))
    }
    if (RESERVED_NAMES.has(entity.name)) {
      return Either.left(
        new ConfigError({
          reason: `Name "${entity.name}" is reserved (declared as ${entity.kind})`,
          entity: entity.name,
        }),
      )
    }
    const previous = seen.get(entity.name)
    if (previous !== undefined) {
      return Either.left(
        new ConfigError({
          reason: `Duplicate name "${entity.name}" (declared as ${previous} and as ${entity.kind})`,
          entity: entity.name,
        }),
      )
    }
    seen.set(entity.name, entity.kind)
  }

  const { dt, end_time } = config.simulation_settings
  if (dt.value <= 0) {
    return Either.left(new ConfigError({ reason: `dt must be greater than 0, received ${dt.value}` }))
  }
  if (end_time.value < 0) {
    return Either.left(
      new ConfigError({ reason: `end_time must not be negative, received ${end_time.value}` }),
    )
  }

  for (const connection of config.flow_connections) {
    if (seen.get(connection.flow_name) !== "flow") {
      return Either.left(
        new ConfigError({
          reason: `Connection references unknown flow "${connection.flow_name}"`,
          entity: connection.flow_name,
        }),
      )
    }
    if (seen.get(connection.stock_name) !== "stock") {
      return Either.left(
        new ConfigError({
          reason: `Connection references unknown stock "${connection.stock_name}"`,
          entity: connection.stock_name,
        }),
      )
    }
    if (!isFlowDirection(connection.direction)) {
      return Either.left(
        new ConfigError({
          reason: `Connection of flow "${connection.flow_name}" has invalid direction "${connection.direction}"; expected "inflow" or "outflow"`,
          entity: connection.flow_name,
        }),
      )
    }
  }

  return Either.right(config)
}

/**
 * Effectful form of `checkModelConfig`.
 *
 * @since 0.1.0
 * @category Models
 */
export const validateModelConfig = (config: ModelConfig): Effect.Effect<ModelConfig, ConfigError> =>
  liftEither(checkModelConfig(config))

/**
 * Synchronous decode plus validation.
 *
 * @since 0.1.0
 * @category Models
 */
export const decodeModelConfigEither = (input: unknown): Either.Either<ModelConfig, ConfigError> =>
  decodeUnknown(input).pipe(Either.mapLeft(toConfigError), Either.flatMap(checkModelConfig))

/**
 * Decode an unknown value (typically parsed JSON) into a validated
 * `ModelConfig`.
 *
 * @since 0.1.0
 * @category Models
 */
export const decodeModelConfig = (input: unknown): Effect.Effect<ModelConfig, ConfigError> =>
  liftEither(decodeModelConfigEither(input))

/**
 * Decode a JSON document into a validated `ModelConfig`.
 *
 * @since 0.1.0
 * @category Models
 */
export const decodeModelConfigJson = (json: string): Effect.Effect<ModelConfig, ConfigError> =>
  liftEither(
    Either.try({
      try: (): unknown => JSON.parse(json),
      catch: (error) =>
        new ConfigError({
          reason: `Model configuration is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        }),
    }).pipe(Either.flatMap(decodeModelConfigEither)),
  )
