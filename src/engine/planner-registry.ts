import type { Planner } from "./planner";
import { greedyPlanner } from "./planner-greedy";
import { noopPlanner } from "./planner-noop";
import { transitivePlanner } from "./planner-transitive";
import { treePlanner } from "./planner-tree";

export const PLANNERS = {
  greedy: greedyPlanner,
  tree: treePlanner,
  noop: noopPlanner,
  transitive: transitivePlanner,
} satisfies Record<string, Planner>;

export type PlannerName = keyof typeof PLANNERS;

export function isPlannerName(name: string): name is PlannerName {
  return Object.prototype.hasOwnProperty.call(PLANNERS, name);
}

export function getPlanner(name: string): Planner {
  if (!isPlannerName(name)) {
    throw new Error(
      `unknown planner "${name}" (expected one of ${Object.keys(PLANNERS).join(", ")})`,
    );
  }
  return PLANNERS[name];
}
