import { ConvergenceError, SimulationError } from "../../Errors.js"
import type { ResolverStrategy } from "../../Types.js"
import { collectReferences, type FormulaNode } from "./Ast.js"
import { EquationEvaluationError } from "./errors.js"
import { evaluateFormulaAst, type ScopeEntry } from "./Evaluator.js"

export interface AuxiliaryNode {
  readonly name: string
  readonly unit: string
  readonly formula: FormulaNode
}

export interface ResolverOptions {
  readonly strategy: ResolverStrategy
  /** Sweeps per step under `relaxation`. */
  readonly passes: number
  /** Pass budget for one cyclic block under `ordered`. */
  readonly cyclePasses: number
  readonly tolerance: number
}

export type ResolverBlock =
  | { readonly _tag: "Single"; readonly node: AuxiliaryNode }
  | { readonly _tag: "Cycle"; readonly nodes: ReadonlyArray<AuxiliaryNode> }

export interface ResolverPlan {
  readonly options: ResolverOptions
  /** Declaration order. */
  readonly auxiliaries: ReadonlyArray<AuxiliaryNode>
  /** Dependencies first; only used by the `ordered` strategy. */
  readonly blocks: ReadonlyArray<ResolverBlock>
}

type WorkingScope = Record<string, ScopeEntry>

/**
 * Strongly connected components of the auxiliary dependency graph (Tarjan).
 * Edges point from an auxiliary to the auxiliaries it reads, so components
 * come out dependencies first.
 */
const stronglyConnectedComponents = (
  auxiliaries: ReadonlyArray<AuxiliaryNode>,
): ReadonlyArray<ResolverBlock> => {
  const byName = new Map(auxiliaries.map((node) => [node.name, node] as const))
  const edges = new Map<string, ReadonlyArray<string>>()
  for (const node of auxiliaries) {
    const targets = Array.from(collectReferences(node.formula)).filter((name) => byName.has(name))
    edges.set(node.name, targets)
  }

  const indices = new Map<string, number>()
  const lowLinks = new Map<string, number>()
  const onStack = new Set<string>()
  const stack: Array<string> = []
  const blocks: Array<ResolverBlock> = []
  let counter = 0

  const connect = (name: string): void => {
    indices.set(name, counter)
    lowLinks.set(name, counter)
    counter += 1
    stack.push(name)
    onStack.add(name)

    for (const target of edges.get(name) ?? []) {
      if (!indices.has(target)) {
        connect(target)
        lowLinks.set(name, Math.min(lowLinks.get(name) ?? 0, lowLinks.get(target) ?? 0))
      } else if (onStack.has(target)) {
        lowLinks.set(name, Math.min(lowLinks.get(name) ?? 0, indices.get(target) ?? 0))
      }
    }

    if (lowLinks.get(name) !== indices.get(name)) {
      return
    }
    const members = new Set<string>()
    let popped: string | undefined
    do {
      popped = stack.pop()
      if (popped !== undefined) {
        onStack.delete(popped)
        members.add(popped)
      }
    } while (popped !== undefined && popped !== name)

    const nodes = auxiliaries.filter((node) => members.has(node.name))
    const [single] = nodes
    const selfReferencing = (edges.get(name) ?? []).includes(name)
    if (single && nodes.length === 1 && !selfReferencing) {
      blocks.push({ _tag: "Single", node: single })
    } else {
      blocks.push({ _tag: "Cycle", nodes })
    }
  }

  for (const node of auxiliaries) {
    if (!indices.has(node.name)) {
      connect(node.name)
    }
  }
  return blocks
}

export const compileResolverPlan = (
  auxiliaries: ReadonlyArray<AuxiliaryNode>,
  options: ResolverOptions,
): ResolverPlan => ({
  options,
  auxiliaries,
  blocks: options.strategy === "ordered" ? stronglyConnectedComponents(auxiliaries) : [],
})

const evaluateAuxiliary = (node: AuxiliaryNode, scope: WorkingScope, time: number): number => {
  try {
    return evaluateFormulaAst(node.formula, scope)
  } catch (error) {
    if (error instanceof EquationEvaluationError) {
      throw new SimulationError({
        entity: node.name,
        kind: "auxiliary",
        formula: node.formula.source,
        time,
        cause: error,
      })
    }
    throw error
  }
}

const currentValue = (scope: WorkingScope, name: string): number => {
  const entry = scope[name]
  return typeof entry === "number" ? entry : 0
}

const relaxCycle = (
  nodes: ReadonlyArray<AuxiliaryNode>,
  scope: WorkingScope,
  time: number,
  options: ResolverOptions,
): void => {
  let delta = Infinity
  for (let pass = 0; pass < options.cyclePasses; pass += 1) {
    delta = 0
    for (const node of nodes) {
      const previous = currentValue(scope, node.name)
      const next = evaluateAuxiliary(node, scope, time)
      scope[node.name] = next
      delta = Math.max(delta, Math.abs(next - previous) / Math.max(1, Math.abs(next)))
    }
    if (delta <= options.tolerance) {
      return
    }
  }
  throw new ConvergenceError({
    members: nodes.map((node) => node.name),
    time,
    passes: options.cyclePasses,
    delta,
  })
}

/**
 * Resolve every auxiliary for one step, writing each value into `scope` as
 * soon as it is computed. Returns the resolved values in declaration order.
 *
 * Under `relaxation` the result is exact only for acyclic chains no deeper
 * than the pass budget; deeper chains and cycles keep whatever value the last
 * sweep produced.
 */
export const resolveAuxiliaries = (
  plan: ResolverPlan,
  scope: WorkingScope,
  time: number,
): Record<string, number> => {
  if (plan.options.strategy === "relaxation") {
    for (let pass = 0; pass < plan.options.passes; pass += 1) {
      for (const node of plan.auxiliaries) {
        scope[node.name] = evaluateAuxiliary(node, scope, time)
      }
    }
  } else {
    for (const block of plan.blocks) {
      if (block._tag === "Single") {
        scope[block.node.name] = evaluateAuxiliary(block.node, scope, time)
      } else {
        relaxCycle(block.nodes, scope, time, plan.options)
      }
    }
  }

  const values: Record<string, number> = {}
  for (const node of plan.auxiliaries) {
    values[node.name] = currentValue(scope, node.name)
  }
  return values
}
