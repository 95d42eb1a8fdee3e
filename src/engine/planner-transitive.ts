import {
  type DependencyGraph,
  OperatorGraph,
  toposort,
  transitiveClosure,
} from "../graph/dependency-graph";
import type { Operator } from "../graph/operator";
import { debugLog } from "./debug-log";
import { mergeable } from "./mergeable";
import { formatPlan, type Plan } from "./planner";

/**
 * Condensed dependency graph: each super-node holds the operators merged
 * into it. Merged-away nodes keep their slot with no edges.
 */
class CondensedGraph {
  readonly members: number[][];
  readonly forward: Set<number>[];
  readonly nodeOf: number[];
  readonly alive = new Set<number>();

  constructor(graph: OperatorGraph) {
    this.members = graph.operators.map((_, idx) => [idx]);
    this.forward = graph.successors.map((succ) => new Set(succ));
    this.nodeOf = graph.operators.map((_, idx) => idx);
    for (let node = 0; node < graph.size; node++) {
      this.alive.add(node);
    }
  }

  closure(): Set<number>[] {
    return transitiveClosure(
      this.forward.length,
      this.forward.map((succ) => Array.from(succ)),
    );
  }

  /**
   * Replace the super-nodes holding `operatorIdxs` with one node.
   */
  condense(operatorIdxs: readonly number[]): void {
    const nodes = new Set(operatorIdxs.map((idx) => this.nodeOf[idx]));
    const merged = this.forward.length;

    const out = new Set<number>();
    const members: number[] = [];
    for (const node of nodes) {
      for (const succ of this.forward[node]) {
        if (!nodes.has(succ)) out.add(succ);
      }
      members.push(...this.members[node]);
      this.forward[node] = new Set();
      this.members[node] = [];
      this.alive.delete(node);
    }

    for (const node of this.alive) {
      const succ = this.forward[node];
      let pointsIn = false;
      for (const target of nodes) {
        if (succ.delete(target)) pointsIn = true;
      }
      if (pointsIn) succ.add(merged);
    }

    this.forward.push(out);
    this.members.push(members);
    this.alive.add(merged);
    for (const idx of members) {
      this.nodeOf[idx] = merged;
    }
  }

  order(): number[] {
    return toposort(
      this.forward.length,
      this.forward.map((succ) => Array.from(succ)),
    ).filter((node) => this.alive.has(node));
  }
}

/**
 * Merge operators that have no ordering constraint between them in the
 * transitive closure of the (progressively condensed) dependency graph.
 *
 * Each step takes the last unassigned operator, absorbs every remaining
 * operator that is mergeable with it and unconnected to any member so far,
 * and condenses the group into one node. The closure is recomputed from
 * scratch on every step, which dominates the cost on large graphs.
 */
export function transitivePlanner(
  operators: readonly Operator[],
  dependencyGraph?: DependencyGraph,
): Plan {
  const graph = OperatorGraph.from(operators, dependencyGraph);
  const condensed = new CondensedGraph(graph);
  const remaining = operators.map((_, idx) => idx);

  while (remaining.length > 0) {
    const seed = remaining.pop();
    if (seed === undefined) break;
    const closure = condensed.closure();
    const group = [seed];
    const groupOps = [operators[seed]];

    for (const idx of remaining) {
      if (!mergeable(operators[idx], groupOps)) continue;
      const node = condensed.nodeOf[idx];
      const connected = group.some((member) => {
        const memberNode = condensed.nodeOf[member];
        return closure[memberNode].has(node) || closure[node].has(memberNode);
      });
      if (!connected) {
        group.push(idx);
        groupOps.push(operators[idx]);
      }
    }

    if (group.length > 1) {
      const absorbed = new Set(group);
      const kept = remaining.filter((idx) => !absorbed.has(idx));
      remaining.length = 0;
      remaining.push(...kept);
      condensed.condense(group);
    }
  }

  const plan: Plan = condensed
    .order()
    .map((node) => condensed.members[node].map((idx) => operators[idx]));

  debugLog("planner", () => `transitive plan (${plan.length} groups)\n${formatPlan(plan)}`);
  return plan;
}
