/**
 * Auxiliary dependency resolution
 *
 * Auxiliaries may reference one another in any order, including cyclically.
 * Two strategies settle them within a step:
 *
 * - `ordered` evaluates the dependency graph's strongly connected components
 *   in topological order. Acyclic auxiliaries are evaluated once; each cyclic
 *   block is swept until it stops changing, or fails with `ConvergenceError`.
 * - `relaxation` sweeps all auxiliaries a fixed number of times in
 *   declaration order. Exact for acyclic chains no deeper than the pass
 *   count, approximate otherwise.
 *
 * @since 0.1.0
 */

import { Effect } from "effect"
import { ConvergenceError, SimulationError } from "./Errors.js"
import type { ScopeEntry } from "./internal/equations/Evaluator.js"
import { resolveAuxiliaries, type ResolverPlan } from "./internal/equations/GraphEngine.js"

export {
  compileResolverPlan,
  type AuxiliaryNode,
  type ResolverBlock,
  type ResolverOptions,
  type ResolverPlan,
} from "./internal/equations/GraphEngine.js"

/**
 * Resolve auxiliaries against a copy of `scope` and return the scope with
 * the resolved values written in.
 *
 * @since 0.1.0
 * @category Resolver
 * @example
 * ```ts
 * const plan = compileResolverPlan(auxiliaries, defaultResolverOptions)
 * const resolved = yield* resolve(plan, { Capital: 100, X: 0 }, 0)
 * ```
 */
export const resolve = (
  plan: ResolverPlan,
  scope: Readonly<Record<string, ScopeEntry>>,
  time: number,
): Effect.Effect<Readonly<Record<string, ScopeEntry>>, SimulationError | ConvergenceError> =>
  Effect.try({
    try: () => {
      const working: Record<string, ScopeEntry> = { ...scope }
      resolveAuxiliaries(plan, working, time)
      return working
    },
    catch: (error) => error,
  }).pipe(
    Effect.catchAll((error) =>
      error instanceof SimulationError || error instanceof ConvergenceError ? Effect.fail(error) : Effect.die(error),
    ),
  )
