import type { FloatType } from "./memory-layout";
import { isPlannerName, type PlannerName } from "./planner-registry";
import { DEFAULT_SORT_PASSES } from "./signal-order";

export type SorterName = "order" | "noop";

/**
 * Options for compileGraph. Every field is optional.
 */
export interface CompileOptions {
  /**
   * Operator merging strategy.
   * Default: MERGEPLAN_PLANNER if set, else "greedy"
   */
  planner?: PlannerName;
  /** "order" optimizes read contiguity, "noop" keeps discovery order. Default: "order" */
  sorter?: SorterName;
  /** Default: float32 */
  floatType?: FloatType;
  /** Default: 1 */
  minibatchSize?: number;
  /** Maximum signal-order refinement passes. Default: 10 */
  sortPasses?: number;
  /** Re-check the plan against the dependency graph. Default: true */
  validate?: boolean;
}

export type ResolvedCompileOptions = Required<CompileOptions>;

function plannerFromEnv(): string | undefined {
  if (typeof process === "undefined") return undefined;
  const value = process.env?.MERGEPLAN_PLANNER;
  return value ? value : undefined;
}

/**
 * Fill defaults and validate.
 * @throws Error naming the first invalid field
 */
export function resolveCompileOptions(
  options: CompileOptions = {},
): ResolvedCompileOptions {
  const planner = options.planner ?? plannerFromEnv() ?? "greedy";
  if (!isPlannerName(planner)) {
    throw new Error(`compile options: unknown planner "${planner}"`);
  }

  const sorter = options.sorter ?? "order";
  if (sorter !== "order" && sorter !== "noop") {
    throw new Error(`compile options: unknown sorter "${String(sorter)}"`);
  }

  const floatType = options.floatType ?? "float32";
  if (floatType !== "float32" && floatType !== "float64") {
    throw new Error(`compile options: floatType must be float32 or float64, got ${String(floatType)}`);
  }

  const minibatchSize = options.minibatchSize ?? 1;
  if (!Number.isInteger(minibatchSize) || minibatchSize < 1) {
    throw new Error(`compile options: minibatchSize must be a positive integer, got ${minibatchSize}`);
  }

  const sortPasses = options.sortPasses ?? DEFAULT_SORT_PASSES;
  if (!Number.isInteger(sortPasses) || sortPasses < 0) {
    throw new Error(`compile options: sortPasses must be a non-negative integer, got ${sortPasses}`);
  }

  return {
    planner,
    sorter,
    floatType,
    minibatchSize,
    sortPasses,
    validate: options.validate ?? true,
  };
}
