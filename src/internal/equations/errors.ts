import { Data } from "effect"

export class EquationParseError extends Data.TaggedError("EquationParseError")<{
  readonly expression: string
  readonly line: number
  readonly column: number
  readonly snippet: string
  readonly problem: string
}> {
  override get message(): string {
    return `Formula parse error at line ${this.line}, column ${this.column}: ${this.problem}`
  }
}

/**
 * Raised while evaluating a parsed formula. `symbol` names the identifier,
 * field, operator or function at fault when there is one.
 */
export class EquationEvaluationError extends Data.TaggedError("EquationEvaluationError")<{
  readonly expression: string
  readonly problem: string
  readonly symbol?: string
}> {
  override get message(): string {
    return `Formula evaluation error in "${this.expression}": ${this.problem}`
  }
}
