import { describe, it, expect } from "@effect/vitest"
import { Either } from "effect"
import { parseFormulaAst, parseFormulaEither } from "../src/internal/equations/Parser.js"
import {
  collectReferences,
  type BinaryNode,
  type CallNode,
  type CompareNode,
  type Expr,
  type MemberNode,
} from "../src/internal/equations/Ast.js"
import { EquationParseError } from "../src/internal/equations/errors.js"

const isBinary = (expr: Expr): expr is BinaryNode => expr._tag === "Binary"
const isCompare = (expr: Expr): expr is CompareNode => expr._tag === "Compare"
const isCall = (expr: Expr): expr is CallNode => expr._tag === "Call"
const isMember = (expr: Expr): expr is MemberNode => expr._tag === "Member"

const rootExpr = (source: string): Expr => parseFormulaAst(source).expr

const parseFailure = (source: string): EquationParseError => {
  const result = parseFormulaEither(source)
  if (Either.isRight(result)) {
    throw new Error(`expected "${source}" to fail parsing`)
  }
  return result.left
}

describe("FormulaParser", () => {
  it("parses numeric literals", () => {
    const expr = rootExpr("1.5e2")
    expect(expr._tag).toBe("Number")
    if (expr._tag === "Number") {
      expect(expr.value).toBe(150)
    }
  })

  it("parses references", () => {
    const expr = rootExpr("Population")
    expect(expr._tag).toBe("Ref")
    if (expr._tag === "Ref") {
      expect(expr.name).toBe("Population")
    }
  })

  it("binds multiplication tighter than addition", () => {
    const expr = rootExpr("1 + 2 * 3")
    expect(isBinary(expr)).toBe(true)
    if (isBinary(expr)) {
      expect(expr.op).toBe("+")
      expect(expr.left._tag).toBe("Number")
      expect(isBinary(expr.right) && expr.right.op).toBe("*")
    }
  })

  it("binds power tighter than a leading minus", () => {
    const expr = rootExpr("-2 ** 2")
    expect(expr._tag).toBe("Unary")
    if (expr._tag === "Unary") {
      expect(expr.op).toBe("Neg")
      expect(isBinary(expr.expr) && expr.expr.op).toBe("**")
    }
  })

  it("parses power as right associative", () => {
    const expr = rootExpr("2 ** 3 ** 2")
    expect(isBinary(expr)).toBe(true)
    if (isBinary(expr)) {
      expect(expr.left._tag).toBe("Number")
      expect(isBinary(expr.right) && expr.right.op).toBe("**")
    }
  })

  it("parses a run of comparisons into one chain below arithmetic", () => {
    const expr = rootExpr("A < B + 1 == 1")
    expect(isCompare(expr)).toBe(true)
    if (isCompare(expr)) {
      expect(expr.first._tag).toBe("Ref")
      expect(expr.links.map((link) => link.op)).toEqual(["<", "=="])
      expect(expr.links[0]?.right._tag).toBe("Binary")
      expect(expr.links[1]?.right._tag).toBe("Number")
    }
  })

  it("keeps a parenthesised comparison as an operand", () => {
    const expr = rootExpr("(A > 0) * 5")
    expect(isBinary(expr)).toBe(true)
    if (isBinary(expr)) {
      expect(expr.op).toBe("*")
      expect(isCompare(expr.left)).toBe(true)
    }
  })

  it("parses dotted and subscripted field access", () => {
    for (const source of ["Rate.value", "Rate['value']", 'Rate["value"]']) {
      const expr = rootExpr(source)
      expect(isMember(expr)).toBe(true)
      if (isMember(expr)) {
        expect(expr.field).toBe("value")
        expect(expr.object._tag === "Ref" && expr.object.name).toBe("Rate")
      }
    }
  })

  it("parses function calls", () => {
    const expr = rootExpr("max(A, B, 3)")
    expect(isCall(expr)).toBe(true)
    if (isCall(expr)) {
      expect(expr.name).toBe("max")
      expect(expr.args).toHaveLength(3)
    }
  })

  it("records source spans", () => {
    const expr = rootExpr("A + Rate.value")
    expect(expr.span).toEqual({ start: 0, end: 14, line: 1, column: 1 })
  })

  it("collects root references, excluding function names", () => {
    const references = collectReferences(parseFormulaAst("max(A, Rate.value) + B * A"))
    expect(Array.from(references).sort()).toEqual(["A", "B", "Rate"])
  })
})

describe("FormulaParser errors", () => {
  it("rejects an empty formula", () => {
    const error = parseFailure("")
    expect(error.problem).toBe("Formula is empty")
    expect(error.line).toBe(1)
    expect(error.column).toBe(1)
  })

  it("reports an unexpected end of input with its position", () => {
    const error = parseFailure("1 +")
    expect(error.problem).toBe("Unexpected end of input")
    expect(error.column).toBe(4)
    expect(error.snippet).toBe("1 +\n   ^")
    expect(error.message).toBe("Formula parse error at line 1, column 4: Unexpected end of input")
  })

  it("reports an unclosed group", () => {
    const error = parseFailure("(1 + 2")
    expect(error.problem).toBe("Expected ')' to close group")
    expect(error.column).toBe(7)
  })

  it("reports trailing tokens", () => {
    const error = parseFailure("1 2")
    expect(error.problem).toBe('Unexpected token "2" after expression')
    expect(error.column).toBe(3)
  })

  it("rejects characters outside the language", () => {
    const error = parseFailure("A $ B")
    expect(error.problem).toBe('Unexpected character "$"')
    expect(error.line).toBe(1)
  })

  it("requires quoted subscripts", () => {
    const error = parseFailure("Rate[value]")
    expect(error.problem).toBe("Expected quoted field name inside '[ ]'")
    expect(error.column).toBe(6)
  })

  it("only allows bare identifiers as callees", () => {
    const error = parseFailure("Rate.value(2)")
    expect(error.problem).toBe('Unexpected token "(" after expression')
  })

  it("rejects assignment and attribute tricks", () => {
    expect(parseFailure("A = 1").problem).toBe('Unexpected character "="')
    expect(parseFailure("A; B").problem).toBe('Unexpected character ";"')
  })
})
