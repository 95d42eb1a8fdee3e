import { CycleError } from "../engine/errors";
import { describeOperator, type Operator } from "./operator";
import type { Signal } from "./signal";

/**
 * Operator → its direct successors. Must be acyclic.
 */
export type DependencyGraph = Map<Operator, Set<Operator>>;

type Access = { op: Operator; sig: Signal };
type AccessRole = "sets" | "incs" | "reads" | "updates";

const ROLE_ORDER: AccessRole[] = ["sets", "incs", "reads", "updates"];

function collectAccesses(
  operators: readonly Operator[],
): Record<AccessRole, Map<Signal, Access[]>> {
  const byRole: Record<AccessRole, Map<Signal, Access[]>> = {
    sets: new Map(),
    incs: new Map(),
    reads: new Map(),
    updates: new Map(),
  };
  for (const op of operators) {
    for (const role of ROLE_ORDER) {
      const byBase = byRole[role];
      for (const sig of op[role]) {
        const entry = byBase.get(sig.base);
        if (entry) {
          entry.push({ op, sig });
        } else {
          byBase.set(sig.base, [{ op, sig }]);
        }
      }
    }
  }
  return byRole;
}

function assertSingleWriter(role: "sets" | "updates", byBase: Map<Signal, Access[]>): void {
  for (const accesses of byBase.values()) {
    for (let i = 0; i < accesses.length; i++) {
      for (let j = i + 1; j < accesses.length; j++) {
        const a = accesses[i];
        const b = accesses[j];
        if (a.op !== b.op && a.sig.mayShareMemory(b.sig)) {
          throw new Error(
            `dependency graph: ${a.sig.name} is ${role === "sets" ? "set" : "updated"} by both ${describeOperator(a.op)} and ${describeOperator(b.op)}`,
          );
        }
      }
    }
  }
}

/**
 * Derive the dependency graph from read/write conflicts. On any shared
 * memory, sets run before incs, incs before reads, reads before updates.
 */
export function buildDependencyGraph(
  operators: readonly Operator[],
): DependencyGraph {
  const graph: DependencyGraph = new Map();
  for (const op of operators) {
    graph.set(op, new Set());
  }

  const byRole = collectAccesses(operators);
  assertSingleWriter("sets", byRole.sets);
  assertSingleWriter("updates", byRole.updates);

  for (let pre = 0; pre < ROLE_ORDER.length; pre++) {
    for (let post = pre + 1; post < ROLE_ORDER.length; post++) {
      const preAccesses = byRole[ROLE_ORDER[pre]];
      const postAccesses = byRole[ROLE_ORDER[post]];
      for (const [base, before] of preAccesses) {
        const after = postAccesses.get(base);
        if (!after) continue;
        for (const a of before) {
          for (const b of after) {
            if (a.op === b.op) continue;
            if (a.sig.mayShareMemory(b.sig)) {
              graph.get(a.op)?.add(b.op);
            }
          }
        }
      }
    }
  }

  return graph;
}

// ============================================================================
// Index-based graph
// ============================================================================

/**
 * Arena view of a dependency graph over operator indices. Scheduling marks
 * operators as retired instead of deleting entries, so the structure stays
 * inspectable mid-algorithm.
 */
export class OperatorGraph {
  readonly operators: readonly Operator[];
  readonly successors: readonly number[][];
  readonly predecessors: readonly number[][];
  private readonly indexOf = new Map<Operator, number>();
  private readonly retired = new Set<number>();

  private constructor(
    operators: readonly Operator[],
    successors: number[][],
    predecessors: number[][],
  ) {
    this.operators = operators;
    this.successors = successors;
    this.predecessors = predecessors;
    operators.forEach((op, idx) => this.indexOf.set(op, idx));
  }

  static from(
    operators: readonly Operator[],
    dependencyGraph?: DependencyGraph,
  ): OperatorGraph {
    const indexOf = new Map<Operator, number>();
    operators.forEach((op, idx) => {
      if (indexOf.has(op)) {
        throw new Error(
          `operator graph: ${describeOperator(op)} appears more than once`,
        );
      }
      indexOf.set(op, idx);
    });

    const graph = dependencyGraph ?? buildDependencyGraph(operators);
    const successors: number[][] = operators.map(() => []);
    const predecessors: number[][] = operators.map(() => []);
    for (const [op, dests] of graph) {
      const from = indexOf.get(op);
      if (from === undefined) {
        throw new Error(
          `operator graph: dependency source ${describeOperator(op)} is not in the operator list`,
        );
      }
      for (const dest of dests) {
        const to = indexOf.get(dest);
        if (to === undefined) {
          throw new Error(
            `operator graph: successor ${describeOperator(dest)} is not in the operator list`,
          );
        }
        if (to === from) {
          throw new CycleError(1);
        }
        if (successors[from].includes(to)) continue;
        successors[from].push(to);
        predecessors[to].push(from);
      }
    }
    return new OperatorGraph(operators, successors, predecessors);
  }

  get size(): number {
    return this.operators.length;
  }

  get remaining(): number {
    return this.operators.length - this.retired.size;
  }

  index(op: Operator): number {
    const idx = this.indexOf.get(op);
    if (idx === undefined) {
      throw new Error(`operator graph: unknown operator ${describeOperator(op)}`);
    }
    return idx;
  }

  retire(idx: number): void {
    this.retired.add(idx);
  }

  isRetired(idx: number): boolean {
    return this.retired.has(idx);
  }

  /** Number of predecessors not yet retired. */
  pendingPredecessors(idx: number): number {
    let count = 0;
    for (const pred of this.predecessors[idx]) {
      if (!this.retired.has(pred)) count++;
    }
    return count;
  }
}

/**
 * Kahn's algorithm with a FIFO queue seeded in index order.
 * @throws CycleError when some nodes can never become free.
 */
export function toposort(
  nodeCount: number,
  successors: readonly (readonly number[])[],
): number[] {
  const inDegree = new Array<number>(nodeCount).fill(0);
  for (let node = 0; node < nodeCount; node++) {
    for (const next of successors[node]) {
      inDegree[next] += 1;
    }
  }

  const queue: number[] = [];
  for (let node = 0; node < nodeCount; node++) {
    if (inDegree[node] === 0) queue.push(node);
  }

  const sorted: number[] = [];
  for (let head = 0; head < queue.length; head++) {
    const node = queue[head];
    sorted.push(node);
    for (const next of successors[node]) {
      inDegree[next] -= 1;
      if (inDegree[next] === 0) queue.push(next);
    }
  }

  if (sorted.length !== nodeCount) {
    throw new CycleError(nodeCount - sorted.length);
  }
  return sorted;
}

/**
 * Descendants of each node, by depth-first search from every node.
 */
export function transitiveClosure(
  nodeCount: number,
  successors: readonly (readonly number[])[],
): Set<number>[] {
  const closure: Set<number>[] = [];
  for (let node = 0; node < nodeCount; node++) {
    const seen = new Set<number>();
    const stack = [...successors[node]];
    while (stack.length > 0) {
      const next = stack.pop();
      if (next === undefined || seen.has(next)) continue;
      seen.add(next);
      stack.push(...successors[next]);
    }
    closure.push(seen);
  }
  return closure;
}
