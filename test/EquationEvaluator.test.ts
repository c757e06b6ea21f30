import { describe, it, expect } from "@effect/vitest"
import { Effect } from "effect"
import {
  compileFormula,
  EquationEvaluationError,
  EquationEvaluator,
  EquationParseError,
  evaluateFormula,
  type Scope,
} from "../src/Equations.js"

const rate: Scope = { Rate: { value: 0.1, unit: "1/day" } }

const evaluationFailure = (source: string, scope: Scope = {}) =>
  evaluateFormula(source, scope).pipe(
    Effect.flip,
    Effect.map((error) => {
      expect(error).toBeInstanceOf(EquationEvaluationError)
      return error instanceof EquationEvaluationError ? error : undefined
    }),
  )

describe("FormulaEvaluator", () => {
  it.effect("evaluates arithmetic with precedence", () =>
    Effect.gen(function* () {
      expect(yield* evaluateFormula("1 + 2 * 3")).toBe(7)
      expect(yield* evaluateFormula("(1 + 2) * 3")).toBe(9)
      expect(yield* evaluateFormula("10 / 4 - 1")).toBe(1.5)
      expect(yield* evaluateFormula("7 % 3")).toBe(1)
    }),
  )

  it.effect("takes the sign of the divisor for modulo", () =>
    Effect.gen(function* () {
      expect(yield* evaluateFormula("-7 % 3")).toBe(2)
      expect(yield* evaluateFormula("7 % -3")).toBe(-2)
    }),
  )

  it.effect("evaluates powers", () =>
    Effect.gen(function* () {
      expect(yield* evaluateFormula("-2 ** 2")).toBe(-4)
      expect(yield* evaluateFormula("2 ** -1")).toBe(0.5)
      expect(yield* evaluateFormula("2 ** 3 ** 2")).toBe(512)
    }),
  )

  it.effect("evaluates comparisons to 1 or 0", () =>
    Effect.gen(function* () {
      expect(yield* evaluateFormula("3 > 2")).toBe(1)
      expect(yield* evaluateFormula("2 >= 3")).toBe(0)
      expect(yield* evaluateFormula("A == 1", { A: 1 })).toBe(1)
      expect(yield* evaluateFormula("1 != 1")).toBe(0)
      expect(yield* evaluateFormula("(A > 0) * 5", { A: 2 })).toBe(5)
    }),
  )

  it.effect("holds a chained comparison only when every adjacent pair holds", () =>
    Effect.gen(function* () {
      expect(yield* evaluateFormula("0 < X < 10", { X: 20 })).toBe(0)
      expect(yield* evaluateFormula("0 < X < 10", { X: 5 })).toBe(1)
      expect(yield* evaluateFormula("0 < X < 10", { X: -1 })).toBe(0)
      expect(yield* evaluateFormula("1 <= X == 1", { X: 1 })).toBe(1)
    }),
  )

  it.effect("stops a chain at the first pair that does not hold", () =>
    Effect.gen(function* () {
      expect(yield* evaluateFormula("1 > 2 > Missing")).toBe(0)
      const error = yield* evaluationFailure("2 > 1 > Missing")
      expect(error?.symbol).toBe("Missing")
    }),
  )

  it.effect("fails when arithmetic produces NaN instead of comparing it", () =>
    Effect.gen(function* () {
      const error = yield* evaluationFailure("(X - 5) ** 0.5 > 1", { X: 1 })
      expect(error?.symbol).toBe("**")
      expect(error?.problem).toBe('Operator "**" produced a non-numeric result (NaN)')
      expect(yield* evaluateFormula("(X - 5) ** 0.5 > 1", { X: 9 })).toBe(1)
    }),
  )

  it.effect("rejects a NaN operand of a comparison", () =>
    Effect.gen(function* () {
      const error = yield* evaluationFailure("X < 1", { X: Number.NaN })
      expect(error?.symbol).toBe("<")
      expect(error?.problem).toBe('Operator "<" received a non-numeric operand (NaN)')
    }),
  )

  it.effect("calls allow-listed functions", () =>
    Effect.gen(function* () {
      expect(yield* evaluateFormula("max(1, 5, 3)")).toBe(5)
      expect(yield* evaluateFormula("min(4, -2)")).toBe(-2)
      expect(yield* evaluateFormula("abs(-3.5)")).toBe(3.5)
    }),
  )

  it.effect("reads numeric fields of structures", () =>
    Effect.gen(function* () {
      expect(yield* evaluateFormula("Rate.value * 100", rate)).toBeCloseTo(10)
      expect(yield* evaluateFormula("Rate['value'] * 100", rate)).toBeCloseTo(10)
    }),
  )

  it.effect("fails on names missing from scope instead of treating them as zero", () =>
    Effect.gen(function* () {
      const error = yield* evaluationFailure("A + B", { A: 1 })
      expect(error?.symbol).toBe("B")
      expect(error?.problem).toBe('Identifier "B" is not defined in scope')
      expect(error?.message).toBe('Formula evaluation error in "A + B": Identifier "B" is not defined in scope')
    }),
  )

  it.effect("does not resolve inherited object members", () =>
    Effect.gen(function* () {
      const error = yield* evaluationFailure("constructor")
      expect(error?.symbol).toBe("constructor")
    }),
  )

  it.effect("rejects structures used as numbers", () =>
    Effect.gen(function* () {
      const error = yield* evaluationFailure("Rate + 1", rate)
      expect(error?.problem).toBe('"Rate" is a structure; read a numeric field such as .value')
      expect(error?.symbol).toBe("Rate")
    }),
  )

  it.effect("rejects missing, non-numeric and scalar field reads", () =>
    Effect.gen(function* () {
      expect((yield* evaluationFailure("Rate.missing", rate))?.problem).toBe(
        'Field "missing" is not defined on "Rate"',
      )
      expect((yield* evaluationFailure("Rate.unit", rate))?.problem).toBe('Field "unit" of "Rate" is not numeric')
      expect((yield* evaluationFailure("A.value", { A: 1 }))?.problem).toBe('Cannot read field "value" of a number')
    }),
  )

  it.effect("fails on division and modulo by zero", () =>
    Effect.gen(function* () {
      const division = yield* evaluationFailure("1 / 0")
      expect(division?.problem).toBe("Division by zero")
      expect(division?.symbol).toBe("/")

      const modulo = yield* evaluationFailure("A % 0", { A: 3 })
      expect(modulo?.problem).toBe("Modulo by zero")
      expect(modulo?.symbol).toBe("%")
    }),
  )

  it.effect("rejects functions outside the allow-list", () =>
    Effect.gen(function* () {
      const error = yield* evaluationFailure("pow(2, 3)")
      expect(error?.symbol).toBe("pow")
      expect(error?.problem).toBe('Unknown function "pow"; allowed functions are min, max, abs')
    }),
  )

  it.effect("checks function arity", () =>
    Effect.gen(function* () {
      expect((yield* evaluationFailure("abs(1, 2)"))?.problem).toBe(
        'Function "abs" expects 1 argument(s) but received 2',
      )
      expect((yield* evaluationFailure("max()"))?.problem).toBe(
        'Function "max" expects at least 1 argument(s) but received 0',
      )
    }),
  )

  it.effect("rejects non-finite results", () =>
    Effect.gen(function* () {
      const error = yield* evaluationFailure("10 ** 400")
      expect(error?.problem).toBe("Formula produced a non-finite result (Infinity)")
    }),
  )

  it.effect("surfaces syntax errors as parse errors", () =>
    Effect.gen(function* () {
      const error = yield* evaluateFormula("1 +").pipe(Effect.flip)
      expect(error).toBeInstanceOf(EquationParseError)
      expect(error._tag).toBe("EquationParseError")
    }),
  )
})

describe("compileFormula", () => {
  it.effect("parses once and evaluates against different scopes", () =>
    Effect.gen(function* () {
      const growth = yield* compileFormula("Capital * Rate.value")
      expect(Array.from(growth.references).sort()).toEqual(["Capital", "Rate"])
      expect(yield* growth.evaluate({ ...rate, Capital: 200 })).toBeCloseTo(20)
      expect(yield* growth.evaluate({ ...rate, Capital: 50 })).toBeCloseTo(5)
    }),
  )
})

describe("EquationEvaluator service", () => {
  it.effect("evaluates through the default layer", () =>
    Effect.gen(function* () {
      const evaluator = yield* EquationEvaluator
      expect(yield* evaluator.evaluate("A * 2", { A: 21 })).toBe(42)
    }).pipe(Effect.provide(EquationEvaluator.layer)),
  )
})
