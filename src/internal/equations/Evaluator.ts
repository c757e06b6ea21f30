import { EquationEvaluationError } from "./errors.js"
import type { BinaryNode, CallNode, CompareNode, ComparisonOp, Expr, FormulaNode, MemberNode } from "./Ast.js"

/**
 * Structured scope entry such as a parameter `{ value, unit }`.
 */
export type Structure = Readonly<Record<string, number | string>>

export type ScopeEntry = number | Structure

export type Scope = Readonly<Record<string, ScopeEntry>>

type Value = number | Structure

interface EvalContext {
  readonly scope: Scope
  readonly source: string
}

interface BuiltinFunction {
  readonly minArgs: number
  readonly maxArgs: number
  readonly apply: (args: ReadonlyArray<number>) => number
}

const BUILTIN_FUNCTIONS: ReadonlyMap<string, BuiltinFunction> = new Map<string, BuiltinFunction>([
  ["min", { minArgs: 1, maxArgs: Infinity, apply: (args) => Math.min(...args) }],
  ["max", { minArgs: 1, maxArgs: Infinity, apply: (args) => Math.max(...args) }],
  ["abs", { minArgs: 1, maxArgs: 1, apply: (args) => Math.abs(args[0] ?? 0) }],
])

export const allowedFunctions: ReadonlyArray<string> = Array.from(BUILTIN_FUNCTIONS.keys())

const fail = (ctx: EvalContext, problem: string, symbol?: string): never => {
  throw new EquationEvaluationError({ expression: ctx.source, problem, symbol })
}

const hasOwn = (record: object, key: string): boolean =>
  Object.prototype.hasOwnProperty.call(record, key)

const label = (expr: Expr): string => {
  switch (expr._tag) {
    case "Ref":
      return expr.name
    case "Member":
      return `${label(expr.object)}.${expr.field}`
    case "Compare":
      return "comparison"
    default:
      return "expression"
  }
}

const lookupReference = (name: string, ctx: EvalContext): Value => {
  if (!hasOwn(ctx.scope, name)) {
    return fail(ctx, `Identifier "${name}" is not defined in scope`, name)
  }
  const entry = ctx.scope[name]
  if (typeof entry === "number") {
    return entry
  }
  if (typeof entry === "object" && entry !== null) {
    return entry
  }
  return fail(ctx, `Identifier "${name}" does not hold a numeric value`, name)
}

const evaluateMember = (node: MemberNode, ctx: EvalContext): number => {
  const target = evaluateExpr(node.object, ctx)
  if (typeof target === "number") {
    return fail(ctx, `Cannot read field "${node.field}" of a number`, node.field)
  }
  if (!hasOwn(target, node.field)) {
    return fail(ctx, `Field "${node.field}" is not defined on "${label(node.object)}"`, node.field)
  }
  const field = target[node.field]
  if (typeof field !== "number") {
    return fail(ctx, `Field "${node.field}" of "${label(node.object)}" is not numeric`, node.field)
  }
  return field
}

const evaluateNumber = (expr: Expr, ctx: EvalContext): number => {
  const value = evaluateExpr(expr, ctx)
  if (typeof value !== "number") {
    const symbol = expr._tag === "Ref" ? expr.name : undefined
    return fail(ctx, `"${label(expr)}" is a structure; read a numeric field such as .value`, symbol)
  }
  return value
}

const evaluateCall = (node: CallNode, ctx: EvalContext): number => {
  const fn = BUILTIN_FUNCTIONS.get(node.name)
  if (!fn) {
    return fail(
      ctx,
      `Unknown function "${node.name}"; allowed functions are ${allowedFunctions.join(", ")}`,
      node.name,
    )
  }
  if (node.args.length < fn.minArgs || node.args.length > fn.maxArgs) {
    const expected = fn.minArgs === fn.maxArgs ? `${fn.minArgs}` : `at least ${fn.minArgs}`
    return fail(
      ctx,
      `Function "${node.name}" expects ${expected} argument(s) but received ${node.args.length}`,
      node.name,
    )
  }
  return fn.apply(node.args.map((arg) => evaluateNumber(arg, ctx)))
}

const applyBinary = (node: BinaryNode, left: number, right: number, ctx: EvalContext): number => {
  switch (node.op) {
    case "+":
      return left + right
    case "-":
      return left - right
    case "*":
      return left * right
    case "/":
      if (right === 0) {
        return fail(ctx, "Division by zero", "/")
      }
      return left / right
    case "%":
      if (right === 0) {
        return fail(ctx, "Modulo by zero", "%")
      }
      // Floored modulo: the result takes the sign of the divisor.
      return left - right * Math.floor(left / right)
    case "**":
      if (left === 0 && right < 0) {
        return fail(ctx, "Zero raised to a negative power", "**")
      }
      return left ** right
  }
}

// NaN compares false against everything, so it must stop here rather than
// reach a comparison and come out as 0.
const evaluateBinary = (node: BinaryNode, ctx: EvalContext): number => {
  const result = applyBinary(node, evaluateNumber(node.left, ctx), evaluateNumber(node.right, ctx), ctx)
  if (Number.isNaN(result)) {
    return fail(ctx, `Operator "${node.op}" produced a non-numeric result (NaN)`, node.op)
  }
  return result
}

const compare = (op: ComparisonOp, left: number, right: number): boolean => {
  switch (op) {
    case "<":
      return left < right
    case "<=":
      return left <= right
    case ">":
      return left > right
    case ">=":
      return left >= right
    case "==":
      return left === right
    case "!=":
      return left !== right
  }
}

const comparisonOperand = (expr: Expr, op: ComparisonOp, ctx: EvalContext): number => {
  const value = evaluateNumber(expr, ctx)
  if (Number.isNaN(value)) {
    return fail(ctx, `Operator "${op}" received a non-numeric operand (NaN)`, op)
  }
  return value
}

// `a < b < c` holds when `a < b` and `b < c`; evaluation stops at the first
// pair that does not hold.
const evaluateCompare = (node: CompareNode, ctx: EvalContext): number => {
  const [head] = node.links
  if (!head) {
    return evaluateNumber(node.first, ctx)
  }
  let left = comparisonOperand(node.first, head.op, ctx)
  for (const link of node.links) {
    const right = comparisonOperand(link.right, link.op, ctx)
    if (!compare(link.op, left, right)) {
      return 0
    }
    left = right
  }
  return 1
}

const evaluateExpr = (expr: Expr, ctx: EvalContext): Value => {
  switch (expr._tag) {
    case "Number":
      return expr.value
    case "Ref":
      return lookupReference(expr.name, ctx)
    case "Member":
      return evaluateMember(expr, ctx)
    case "Unary": {
      const operand = evaluateNumber(expr.expr, ctx)
      return expr.op === "Neg" ? -operand : operand
    }
    case "Binary":
      return evaluateBinary(expr, ctx)
    case "Compare":
      return evaluateCompare(expr, ctx)
    case "Call":
      return evaluateCall(expr, ctx)
  }
}

/**
 * Evaluate a parsed formula against a scope. Throws
 * `EquationEvaluationError` for unknown names, disallowed calls, division by
 * zero and non-finite results.
 */
export const evaluateFormulaAst = (formula: FormulaNode, scope: Scope): number => {
  const ctx: EvalContext = { scope, source: formula.source }
  const result = evaluateNumber(formula.expr, ctx)
  if (!Number.isFinite(result)) {
    return fail(ctx, `Formula produced a non-finite result (${result})`)
  }
  return result
}
