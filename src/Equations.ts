/**
 * Formula language
 *
 * Parses and evaluates the restricted arithmetic language used by auxiliary
 * and flow formulas. Formulas can only read names bound in the scope and call
 * `min`, `max` and `abs`; anything else is rejected with a tagged error.
 *
 * @since 0.1.0
 */

import { Context, Effect, Either, Layer } from "effect"
import { collectReferences, type FormulaNode } from "./internal/equations/Ast.js"
import { EquationEvaluationError, EquationParseError } from "./internal/equations/errors.js"
import { allowedFunctions, evaluateFormulaAst, type Scope } from "./internal/equations/Evaluator.js"
import { parseFormulaEither } from "./internal/equations/Parser.js"

export { EquationEvaluationError, EquationParseError } from "./internal/equations/errors.js"
export type { Expr, FormulaNode } from "./internal/equations/Ast.js"
export type { Scope, ScopeEntry, Structure } from "./internal/equations/Evaluator.js"
export { allowedFunctions, collectReferences }

/**
 * @since 0.1.0
 * @category Errors
 */
export type EquationError = EquationParseError | EquationEvaluationError

/**
 * A formula parsed once and evaluated many times.
 *
 * @since 0.1.0
 * @category Equations
 */
export interface CompiledFormula {
  readonly source: string
  readonly ast: FormulaNode
  /** Root names the formula reads. */
  readonly references: ReadonlySet<string>
  readonly evaluate: (scope: Scope) => Effect.Effect<number, EquationEvaluationError>
}

/**
 * @since 0.1.0
 * @category Equations
 */
export const parseFormula = (source: string): Effect.Effect<FormulaNode, EquationParseError> =>
  Either.match(parseFormulaEither(source), {
    onLeft: (error) => Effect.fail(error),
    onRight: (ast) => Effect.succeed(ast),
  })

const evaluateAst = (ast: FormulaNode, scope: Scope): Effect.Effect<number, EquationEvaluationError> =>
  Effect.try({
    try: () => evaluateFormulaAst(ast, scope),
    catch: (error) =>
      error instanceof EquationEvaluationError
        ? error
        : new EquationEvaluationError({
            expression: ast.source,
            problem: error instanceof Error ? error.message : String(error),
          }),
  })

/**
 * Parse a formula and return an evaluator bound to its syntax tree.
 *
 * @since 0.1.0
 * @category Equations
 * @example
 * ```ts
 * const growth = yield* compileFormula("Rate.value * Capital")
 * const rate = yield* growth.evaluate({ Capital: 100, Rate: { value: 0.1, unit: "1/day" } })
 * ```
 */
export const compileFormula = (source: string): Effect.Effect<CompiledFormula, EquationParseError> =>
  Effect.map(parseFormula(source), (ast) => ({
    source,
    ast,
    references: collectReferences(ast),
    evaluate: (scope: Scope) => evaluateAst(ast, scope),
  }))

/**
 * Parse and evaluate a formula in one go.
 *
 * @since 0.1.0
 * @category Equations
 */
export const evaluateFormula = (source: string, scope: Scope = {}): Effect.Effect<number, EquationError> =>
  Effect.flatMap(parseFormula(source), (ast) => evaluateAst(ast, scope))

/**
 * @since 0.1.0
 * @category Equations
 */
export interface EquationEvaluatorService {
  readonly evaluate: (source: string, scope?: Scope) => Effect.Effect<number, EquationError>
  readonly compile: (source: string) => Effect.Effect<CompiledFormula, EquationParseError>
}

/**
 * Service tag for formula evaluation.
 *
 * @since 0.1.0
 * @category Equations
 */
export class EquationEvaluator extends Context.Tag("stock-flow-engine/EquationEvaluator")<
  EquationEvaluator,
  EquationEvaluatorService
>() {
  static readonly layer = Layer.succeed(this, {
    evaluate: evaluateFormula,
    compile: compileFormula,
  })
}
