export interface Span {
  readonly start: number
  readonly end: number
  readonly line: number
  readonly column: number
}

export type UnaryOp = "Neg" | "Pos"
export type BinaryOp = "+" | "-" | "*" | "/" | "%" | "**"
export type ComparisonOp = "<" | "<=" | ">" | ">=" | "==" | "!="

export interface NumberNode {
  readonly _tag: "Number"
  readonly value: number
  readonly span: Span
}

export interface ReferenceNode {
  readonly _tag: "Ref"
  readonly name: string
  readonly span: Span
}

/**
 * Field read on a structured scope entry, written either `Name.value` or
 * `Name['value']`.
 */
export interface MemberNode {
  readonly _tag: "Member"
  readonly object: Expr
  readonly field: string
  readonly span: Span
}

export interface UnaryNode {
  readonly _tag: "Unary"
  readonly op: UnaryOp
  readonly expr: Expr
  readonly span: Span
}

export interface BinaryNode {
  readonly _tag: "Binary"
  readonly op: BinaryOp
  readonly left: Expr
  readonly right: Expr
  readonly span: Span
}

export interface ComparisonLink {
  readonly op: ComparisonOp
  readonly right: Expr
}

/**
 * A run of comparisons such as `0 < X <= 10`. Holds when every adjacent pair
 * holds; each operand is evaluated at most once.
 */
export interface CompareNode {
  readonly _tag: "Compare"
  readonly first: Expr
  readonly links: ReadonlyArray<ComparisonLink>
  readonly span: Span
}

export interface CallNode {
  readonly _tag: "Call"
  readonly name: string
  readonly args: ReadonlyArray<Expr>
  readonly span: Span
}

export type Expr = NumberNode | ReferenceNode | MemberNode | UnaryNode | BinaryNode | CompareNode | CallNode

export interface FormulaNode {
  readonly _tag: "Formula"
  readonly source: string
  readonly expr: Expr
}

const visitReferences = (expr: Expr, into: Set<string>): void => {
  switch (expr._tag) {
    case "Number":
      return
    case "Ref":
      into.add(expr.name)
      return
    case "Member":
      visitReferences(expr.object, into)
      return
    case "Unary":
      visitReferences(expr.expr, into)
      return
    case "Binary":
      visitReferences(expr.left, into)
      visitReferences(expr.right, into)
      return
    case "Compare":
      visitReferences(expr.first, into)
      for (const link of expr.links) {
        visitReferences(link.right, into)
      }
      return
    case "Call":
      for (const arg of expr.args) {
        visitReferences(arg, into)
      }
      return
  }
}

/**
 * Root names read by a formula. Function names are not references; for
 * `P.value` only `P` is reported.
 */
export const collectReferences = (formula: FormulaNode): ReadonlySet<string> => {
  const names = new Set<string>()
  visitReferences(formula.expr, names)
  return names
}
