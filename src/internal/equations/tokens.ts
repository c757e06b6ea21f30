import { createToken, Lexer, type TokenType } from "chevrotain"

/**
 * Token definitions for the formula language. Only arithmetic, comparison,
 * grouping, calls and field access are lexed; anything else is a lexing error
 * surfaced by the parser.
 */
export const WhiteSpace = createToken({
  name: "WhiteSpace",
  pattern: /\s+/,
  group: Lexer.SKIPPED,
})

export const NumberLiteral = createToken({
  name: "NumberLiteral",
  pattern: /(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/,
})

export const StringLiteral = createToken({
  name: "StringLiteral",
  pattern: /'[^'\\\r\n]*'|"[^"\\\r\n]*"/,
})

export const Identifier = createToken({
  name: "Identifier",
  pattern: /[A-Za-z_][A-Za-z0-9_]*/,
})

export const DoubleStar = createToken({ name: "DoubleStar", pattern: /\*\*/ })
export const Star = createToken({ name: "Star", pattern: /\*/ })
export const Slash = createToken({ name: "Slash", pattern: /\// })
export const Percent = createToken({ name: "Percent", pattern: /%/ })
export const Plus = createToken({ name: "Plus", pattern: /\+/ })
export const Minus = createToken({ name: "Minus", pattern: /-/ })
export const EqEq = createToken({ name: "EqEq", pattern: /==/ })
export const BangEq = createToken({ name: "BangEq", pattern: /!=/ })
export const LtEq = createToken({ name: "LtEq", pattern: /<=/ })
export const GtEq = createToken({ name: "GtEq", pattern: />=/ })
export const Lt = createToken({ name: "Lt", pattern: /</ })
export const Gt = createToken({ name: "Gt", pattern: />/ })
export const LParen = createToken({ name: "LParen", pattern: /\(/ })
export const RParen = createToken({ name: "RParen", pattern: /\)/ })
export const LBracket = createToken({ name: "LBracket", pattern: /\[/ })
export const RBracket = createToken({ name: "RBracket", pattern: /\]/ })
export const Comma = createToken({ name: "Comma", pattern: /,/ })
export const Dot = createToken({ name: "Dot", pattern: /\./ })

// Order matters: longer operators before their prefixes, numbers before Dot.
export const FormulaTokens: Array<TokenType> = [
  WhiteSpace,
  NumberLiteral,
  StringLiteral,
  Identifier,
  DoubleStar,
  Star,
  Slash,
  Percent,
  Plus,
  Minus,
  EqEq,
  BangEq,
  LtEq,
  GtEq,
  Lt,
  Gt,
  LParen,
  RParen,
  LBracket,
  RBracket,
  Comma,
  Dot,
]

export const FormulaLexer = new Lexer(FormulaTokens, { positionTracking: "full" })
