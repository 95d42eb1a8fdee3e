import {
  type DependencyGraph,
  OperatorGraph,
} from "../graph/dependency-graph";
import type { Operator } from "../graph/operator";
import { debugLog } from "./debug-log";
import { CycleError } from "./errors";
import { assignToGroups, formatPlan, type Plan } from "./planner";

/**
 * Find the plan with the fewest groups by exhaustive search.
 *
 * The best continuation depends only on which operators remain, so results
 * are memoized on the sorted list of remaining operator indices. Each state
 * tries every maximal mergeable group of the currently free operators as
 * the next step. Exponential in the worst case: meant for small graphs.
 */
export function treePlanner(
  operators: readonly Operator[],
  dependencyGraph?: DependencyGraph,
): Plan {
  const graph = OperatorGraph.from(operators, dependencyGraph);
  const cache = new Map<string, number[][]>();
  let statesVisited = 0;

  const shortestPlan = (remaining: number[]): number[][] => {
    if (remaining.length <= 1) {
      return remaining.length === 1 ? [remaining] : [];
    }
    const key = remaining.join(",");
    const cached = cache.get(key);
    if (cached) {
      return cached;
    }
    statesVisited++;

    const remainingSet = new Set(remaining);
    const free = remaining.filter((idx) =>
      graph.predecessors[idx].every((pred) => !remainingSet.has(pred)),
    );

    const candidates: Operator[][] = [];
    assignToGroups(
      candidates,
      free.map((idx) => operators[idx]),
    );
    if (candidates.length === 0) {
      throw new CycleError(remaining.length);
    }

    let shortest: number[][] = [];
    for (const candidate of candidates) {
      const group = candidate.map((op) => graph.index(op));
      const chosen = new Set(group);
      const rest = shortestPlan(remaining.filter((idx) => !chosen.has(idx)));
      if (shortest.length === 0 || rest.length + 1 < shortest.length) {
        shortest = [group, ...rest];
      }
    }

    cache.set(key, shortest);
    return shortest;
  };

  const all = operators.map((_, idx) => idx);
  const plan: Plan = shortestPlan(all).map((group) =>
    group.map((idx) => operators[idx]),
  );

  debugLog(
    "planner",
    () => `tree plan (${plan.length} groups, ${statesVisited} states)\n${formatPlan(plan)}`,
  );
  return plan;
}
