import {
  buildDependencyGraph,
  type DependencyGraph,
} from "../graph/dependency-graph";
import type { Operator } from "../graph/operator";
import type { Signal } from "../graph/signal";
import { debugLog, timingLog } from "./debug-log";
import { buildMemoryLayout, type MemoryLayout } from "./memory-layout";
import { type CompileOptions, resolveCompileOptions } from "./options";
import { type Plan, validatePlan } from "./planner";
import { PLANNERS } from "./planner-registry";
import { noopOrderSignals, orderSignals } from "./signal-order";

export interface CompileStats {
  operators: number;
  groups: number;
  signals: number;
  baseArrays: number;
  sortPasses: number;
  sortConverged: boolean;
}

export interface CompiledGraph {
  plan: Plan;
  /** Base signals in memory order. */
  signals: Signal[];
  layout: MemoryLayout;
  stats: CompileStats;
}

/**
 * Plan, order and lay out an operator graph:
 * dependency graph → planner → signal order → memory layout.
 *
 * Nothing is returned unless every stage succeeds.
 */
export function compileGraph(
  operators: readonly Operator[],
  options: CompileOptions & { dependencyGraph?: DependencyGraph } = {},
): CompiledGraph {
  const resolved = resolveCompileOptions(options);

  let t0 = performance.now();
  const dependencyGraph = options.dependencyGraph ?? buildDependencyGraph(operators);
  timingLog("dependencyGraph", t0);

  t0 = performance.now();
  const planned = PLANNERS[resolved.planner](operators, dependencyGraph);
  if (resolved.validate) {
    validatePlan(operators, planned, dependencyGraph);
  }
  timingLog(`plan(${resolved.planner})`, t0);

  t0 = performance.now();
  const ordered =
    resolved.sorter === "order"
      ? orderSignals(planned, { passes: resolved.sortPasses })
      : noopOrderSignals(planned);
  timingLog(`order(${resolved.sorter})`, t0);

  t0 = performance.now();
  const layout = buildMemoryLayout(ordered.signals, ordered.plan, {
    floatType: resolved.floatType,
    minibatchSize: resolved.minibatchSize,
  });
  timingLog("layout", t0);

  const stats: CompileStats = {
    operators: operators.length,
    groups: ordered.plan.length,
    signals: ordered.signals.length,
    baseArrays: layout.baseArrays.size,
    sortPasses: ordered.passes,
    sortConverged: ordered.converged,
  };
  debugLog("compile", () => JSON.stringify(stats));

  return { plan: ordered.plan, signals: ordered.signals, layout, stats };
}
