import { Either } from "effect"
import type { IToken, TokenType } from "chevrotain"
import {
  BangEq,
  Comma,
  Dot,
  DoubleStar,
  EqEq,
  FormulaLexer,
  Gt,
  GtEq,
  Identifier,
  LBracket,
  LParen,
  Lt,
  LtEq,
  Minus,
  NumberLiteral,
  Percent,
  Plus,
  RBracket,
  RParen,
  Slash,
  Star,
  StringLiteral,
} from "./tokens.js"
import type {
  BinaryNode,
  BinaryOp,
  ComparisonLink,
  ComparisonOp,
  Expr,
  FormulaNode,
  Span,
  UnaryNode,
  UnaryOp,
} from "./Ast.js"
import { EquationParseError } from "./errors.js"

interface BinaryInfo {
  readonly precedence: number
  readonly op: BinaryOp
}

// Comparisons sit below every arithmetic operator and chain instead of nesting.
const ComparisonOperators = new Map<TokenType, ComparisonOp>([
  [EqEq, "=="],
  [BangEq, "!="],
  [Lt, "<"],
  [LtEq, "<="],
  [Gt, ">"],
  [GtEq, ">="],
])

// `**` is not listed: it binds tighter than unary minus and is handled in parsePower.
const BinaryOperators = new Map<TokenType, BinaryInfo>([
  [Plus, { precedence: 1, op: "+" }],
  [Minus, { precedence: 1, op: "-" }],
  [Star, { precedence: 2, op: "*" }],
  [Slash, { precedence: 2, op: "/" }],
  [Percent, { precedence: 2, op: "%" }],
])

const snippet = (source: string, line: number, column: number): string => {
  const lines = source.split(/\r?\n/)
  const target = lines[Math.max(0, line - 1)] ?? ""
  return `${target}\n${" ".repeat(Math.max(0, column - 1))}^`
}

const endPosition = (source: string): { readonly line: number; readonly column: number } => {
  const lines = source.split(/\r?\n/)
  const last = lines[lines.length - 1] ?? ""
  return { line: lines.length, column: last.length + 1 }
}

const parseError = (source: string, token: IToken | undefined, problem: string): EquationParseError => {
  const { line, column } = token
    ? { line: token.startLine ?? 1, column: token.startColumn ?? 1 }
    : endPosition(source)
  return new EquationParseError({
    expression: source,
    line,
    column,
    snippet: snippet(source, line, column),
    problem,
  })
}

const spanFromToken = (token: IToken): Span => ({
  start: token.startOffset,
  end: (token.endOffset ?? token.startOffset) + 1,
  line: token.startLine ?? 1,
  column: token.startColumn ?? 1,
})

const combineSpans = (start: Span, end: Span): Span => ({
  start: start.start,
  end: end.end,
  line: start.line,
  column: start.column,
})

class TokenStream {
  readonly #tokens: ReadonlyArray<IToken>
  readonly #source: string
  #index = 0

  constructor(tokens: ReadonlyArray<IToken>, source: string) {
    this.#tokens = tokens
    this.#source = source
  }

  peek(): IToken | undefined {
    return this.#tokens[this.#index]
  }

  previous(): IToken | undefined {
    return this.#tokens[this.#index - 1]
  }

  consume(): IToken {
    const token = this.peek()
    if (!token) {
      throw parseError(this.#source, undefined, "Unexpected end of input")
    }
    this.#index += 1
    return token
  }

  match(tokenType: TokenType): boolean {
    if (this.peek()?.tokenType === tokenType) {
      this.#index += 1
      return true
    }
    return false
  }

  expect(tokenType: TokenType, problem: string): IToken {
    const token = this.peek()
    if (!token || token.tokenType !== tokenType) {
      throw parseError(this.#source, token, problem)
    }
    this.#index += 1
    return token
  }

  get done(): boolean {
    return this.#index >= this.#tokens.length
  }
}

class FormulaPrattParser {
  readonly #stream: TokenStream
  readonly #source: string

  constructor(tokens: ReadonlyArray<IToken>, source: string) {
    this.#stream = new TokenStream(tokens, source)
    this.#source = source
  }

  parseFormula(): FormulaNode {
    if (this.#stream.done) {
      throw parseError(this.#source, undefined, "Formula is empty")
    }
    const expr = this.parseComparison()
    if (!this.#stream.done) {
      const token = this.#stream.peek()
      throw parseError(this.#source, token, `Unexpected token "${token?.image ?? "<eof>"}" after expression`)
    }
    return { _tag: "Formula", source: this.#source, expr }
  }

  parseComparison(): Expr {
    const first = this.parseExpression(0)
    const links: Array<ComparisonLink> = []
    while (true) {
      const token = this.#stream.peek()
      const op = token ? ComparisonOperators.get(token.tokenType) : undefined
      if (!op) {
        break
      }
      this.#stream.consume()
      links.push({ op, right: this.parseExpression(0) })
    }
    const last = links[links.length - 1]
    if (!last) {
      return first
    }
    return { _tag: "Compare", first, links, span: combineSpans(first.span, last.right.span) }
  }

  parseExpression(minPrecedence: number): Expr {
    let left = this.parseUnary()
    while (true) {
      const token = this.#stream.peek()
      const info = token ? BinaryOperators.get(token.tokenType) : undefined
      if (!token || !info || info.precedence < minPrecedence) {
        break
      }
      this.#stream.consume()
      const right = this.parseExpression(info.precedence + 1)
      left = this.makeBinaryNode(info.op, left, right)
    }
    return left
  }

  parseUnary(): Expr {
    const token = this.#stream.peek()
    if (token && (token.tokenType === Plus || token.tokenType === Minus)) {
      this.#stream.consume()
      const op: UnaryOp = token.tokenType === Plus ? "Pos" : "Neg"
      const expr = this.parseUnary()
      return this.makeUnaryNode(op, expr, token)
    }
    return this.parsePower()
  }

  // Right associative; the exponent may carry its own sign (`2 ** -1`).
  parsePower(): Expr {
    const base = this.parsePostfix()
    if (this.#stream.match(DoubleStar)) {
      const exponent = this.parseUnary()
      return this.makeBinaryNode("**", base, exponent)
    }
    return base
  }

  parsePostfix(): Expr {
    let expr = this.parsePrimary()
    while (true) {
      if (this.#stream.match(Dot)) {
        const field = this.#stream.expect(Identifier, "Expected field name after '.'")
        expr = {
          _tag: "Member",
          object: expr,
          field: field.image,
          span: combineSpans(expr.span, spanFromToken(field)),
        }
        continue
      }
      if (this.#stream.match(LBracket)) {
        const field = this.#stream.expect(StringLiteral, "Expected quoted field name inside '[ ]'")
        const closing = this.#stream.expect(RBracket, "Expected ']' after field name")
        expr = {
          _tag: "Member",
          object: expr,
          field: field.image.slice(1, -1),
          span: combineSpans(expr.span, spanFromToken(closing)),
        }
        continue
      }
      return expr
    }
  }

  parsePrimary(): Expr {
    const token = this.#stream.peek()
    if (!token) {
      throw parseError(this.#source, undefined, "Unexpected end of input")
    }

    switch (token.tokenType) {
      case NumberLiteral: {
        this.#stream.consume()
        const value = Number(token.image)
        if (!Number.isFinite(value)) {
          throw parseError(this.#source, token, `Invalid number literal: ${token.image}`)
        }
        return { _tag: "Number", value, span: spanFromToken(token) }
      }
      case Identifier: {
        this.#stream.consume()
        return this.parseIdentifierOrCall(token)
      }
      case LParen: {
        this.#stream.consume()
        const expr = this.parseComparison()
        this.#stream.expect(RParen, "Expected ')' to close group")
        return expr
      }
      default:
        throw parseError(this.#source, token, `Unexpected token "${token.image}"`)
    }
  }

  parseIdentifierOrCall(token: IToken): Expr {
    if (!this.#stream.match(LParen)) {
      return { _tag: "Ref", name: token.image, span: spanFromToken(token) }
    }
    const args: Array<Expr> = []
    if (!this.#stream.match(RParen)) {
      do {
        args.push(this.parseComparison())
      } while (this.#stream.match(Comma))
      this.#stream.expect(RParen, "Expected ')' closing function arguments")
    }
    const endToken = this.#stream.previous() ?? token
    return {
      _tag: "Call",
      name: token.image,
      args,
      span: combineSpans(spanFromToken(token), spanFromToken(endToken)),
    }
  }

  makeUnaryNode(op: UnaryOp, expr: Expr, token: IToken): UnaryNode {
    return {
      _tag: "Unary",
      op,
      expr,
      span: combineSpans(spanFromToken(token), expr.span),
    }
  }

  makeBinaryNode(op: BinaryOp, left: Expr, right: Expr): BinaryNode {
    return {
      _tag: "Binary",
      op,
      left,
      right,
      span: combineSpans(left.span, right.span),
    }
  }
}

/**
 * Parse a formula into its syntax tree, throwing `EquationParseError` on any
 * lexing or syntax problem.
 */
export const parseFormulaAst = (source: string): FormulaNode => {
  const { tokens, errors } = FormulaLexer.tokenize(source)
  const lexError = errors[0]
  if (lexError) {
    const line = lexError.line ?? 1
    const column = lexError.column ?? 1
    throw new EquationParseError({
      expression: source,
      line,
      column,
      snippet: snippet(source, line, column),
      problem: `Unexpected character "${source.slice(lexError.offset, lexError.offset + lexError.length)}"`,
    })
  }
  return new FormulaPrattParser(tokens, source).parseFormula()
}

export const parseFormulaEither = (source: string): Either.Either<FormulaNode, EquationParseError> =>
  Either.try({
    try: () => parseFormulaAst(source),
    catch: (error) =>
      error instanceof EquationParseError
        ? error
        : new EquationParseError({
            expression: source,
            line: 1,
            column: 1,
            snippet: snippet(source, 1, 1),
            problem: error instanceof Error ? error.message : String(error),
          }),
  })
