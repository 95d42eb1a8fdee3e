import {
  type DependencyGraph,
  OperatorGraph,
} from "../graph/dependency-graph";
import type { Operator } from "../graph/operator";
import { debugLog } from "./debug-log";
import { CycleError } from "./errors";
import { assignToGroups, formatPlan, type Plan } from "./planner";

/**
 * Combine mergeable operators into groups, one locally best group at a time.
 *
 * Candidate groups persist across steps: newly available operators are
 * first-fit into them, and the largest group (earliest on ties) is
 * scheduled next. Deterministic for a fixed input order; O(n²) worst case.
 */
export function greedyPlanner(
  operators: readonly Operator[],
  dependencyGraph?: DependencyGraph,
): Plan {
  const graph = OperatorGraph.from(operators, dependencyGraph);
  const pending = graph.predecessors.map((preds) => preds.length);

  let available = operators.filter((_, idx) => pending[idx] === 0);
  let groups: Operator[][] = [];
  const plan: Plan = [];

  while (graph.remaining > 0) {
    assignToGroups(groups, available);

    if (groups.length === 0) {
      throw new CycleError(graph.remaining);
    }

    let chosenIdx = 0;
    for (let i = 1; i < groups.length; i++) {
      if (groups[i].length > groups[chosenIdx].length) {
        chosenIdx = i;
      }
    }
    const chosen = groups[chosenIdx];
    groups = groups.filter((_, i) => i !== chosenIdx);
    plan.push(chosen);

    available = [];
    for (const op of chosen) {
      const idx = graph.index(op);
      graph.retire(idx);
      for (const succ of graph.successors[idx]) {
        pending[succ] -= 1;
        if (pending[succ] === 0) {
          available.push(operators[succ]);
        }
      }
    }
  }

  debugLog("planner", () => `greedy plan (${plan.length} groups)\n${formatPlan(plan)}`);
  return plan;
}
