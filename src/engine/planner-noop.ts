import {
  type DependencyGraph,
  OperatorGraph,
  toposort,
} from "../graph/dependency-graph";
import type { Operator } from "../graph/operator";
import { debugLog } from "./debug-log";
import { formatPlan, type Plan } from "./planner";

/**
 * Valid execution order without any merging: every group is a singleton.
 */
export function noopPlanner(
  operators: readonly Operator[],
  dependencyGraph?: DependencyGraph,
): Plan {
  const graph = OperatorGraph.from(operators, dependencyGraph);
  const plan: Plan = toposort(graph.size, graph.successors).map((idx) => [
    operators[idx],
  ]);
  debugLog("planner", () => `noop plan\n${formatPlan(plan)}`);
  return plan;
}
