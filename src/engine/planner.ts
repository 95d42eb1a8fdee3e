import {
  type DependencyGraph,
  OperatorGraph,
} from "../graph/dependency-graph";
import { describeOperator, type Operator } from "../graph/operator";
import { LayoutConsistencyError } from "./errors";
import { mergeable } from "./mergeable";

/**
 * Mutually mergeable operators executed as one batched computation.
 */
export type OperatorGroup = readonly Operator[];

/**
 * Operator groups in execution order. Every operator's dependencies live in
 * a strictly earlier group.
 */
export type Plan = OperatorGroup[];

export type Planner = (
  operators: readonly Operator[],
  dependencyGraph?: DependencyGraph,
) => Plan;

/**
 * First-fit `candidates` into `groups` in place: each operator joins the
 * first group it is mergeable with, or starts a new one.
 */
export function assignToGroups(
  groups: Operator[][],
  candidates: Iterable<Operator>,
): void {
  for (const op of candidates) {
    const target = groups.find((group) => mergeable(op, group));
    if (target) {
      target.push(op);
    } else {
      groups.push([op]);
    }
  }
}

export function countOperators(plan: Plan): number {
  return plan.reduce((acc, group) => acc + group.length, 0);
}

export function formatPlan(plan: Plan): string {
  return plan
    .map(
      (group, i) =>
        `  ${i}: (${group.map((op) => describeOperator(op)).join(", ")})`,
    )
    .join("\n");
}

/**
 * Check that `plan` schedules every operator exactly once and after all of
 * its dependencies.
 * @throws LayoutConsistencyError on the first violation found.
 */
export function validatePlan(
  operators: readonly Operator[],
  plan: Plan,
  dependencyGraph?: DependencyGraph,
): void {
  const graph = OperatorGraph.from(operators, dependencyGraph);
  const groupOf = new Array<number>(graph.size).fill(-1);

  plan.forEach((group, groupIdx) => {
    if (group.length === 0) {
      throw new LayoutConsistencyError(`plan group ${groupIdx} is empty`);
    }
    for (const op of group) {
      const idx = graph.index(op);
      if (groupOf[idx] !== -1) {
        throw new LayoutConsistencyError(
          `${describeOperator(op)} is scheduled in groups ${groupOf[idx]} and ${groupIdx}`,
        );
      }
      groupOf[idx] = groupIdx;
    }
  });

  for (let idx = 0; idx < graph.size; idx++) {
    if (groupOf[idx] === -1) {
      throw new LayoutConsistencyError(
        `${describeOperator(operators[idx])} is missing from the plan`,
      );
    }
    for (const pred of graph.predecessors[idx]) {
      if (groupOf[pred] >= groupOf[idx]) {
        throw new LayoutConsistencyError(
          `${describeOperator(operators[idx])} (group ${groupOf[idx]}) does not run after its dependency ${describeOperator(operators[pred])} (group ${groupOf[pred]})`,
        );
      }
    }
  }
}
