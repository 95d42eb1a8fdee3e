import { leadingDim } from "../core/shape";
import {
  allSignals,
  builderOf,
  type Operator,
  SPECIALIZED_PROCESS_TYPES,
} from "../graph/operator";
import { signalsCompatible } from "../graph/signal";

/**
 * Check whether `op` can join the candidate `group` and execute as part of a
 * single batched computation.
 *
 * Only the group's first member is compared: members are already pairwise
 * mergeable, and every rule below is an equivalence.
 */
export function mergeable(op: Operator, group: readonly Operator[]): boolean {
  if (group.length === 0) {
    return true;
  }
  const c = group[0];

  if (builderOf(op) !== builderOf(c)) {
    return false;
  }

  if (
    op.sets.length !== c.sets.length ||
    op.incs.length !== c.incs.length ||
    op.reads.length !== c.reads.length ||
    op.updates.length !== c.updates.length
  ) {
    return false;
  }

  const opSignals = allSignals(op);
  const groupSignals = allSignals(c);
  for (let i = 0; i < opSignals.length; i++) {
    if (!signalsCompatible(opSignals[i], groupSignals[i])) {
      return false;
    }
  }

  switch (op.kind) {
    case "copy":
      // can't batch overwrites with accumulates
      return c.kind === "copy" && op.inc === c.inc;
    case "elementwise-inc":
      // equal leading extents let the arguments stack into one block and
      // broadcast together
      for (let i = 0; i < opSignals.length; i++) {
        if (leadingDim(opSignals[i].shape) !== leadingDim(groupSignals[i].shape)) {
          return false;
        }
      }
      return true;
    case "func":
      // a function fed only time must not batch with one fed a scalar input
      return c.kind === "func" && op.usesTime === c.usesTime;
    case "sim-neurons":
      return c.kind === "sim-neurons" && op.neuronType === c.neuronType;
    case "sim-process": {
      if (c.kind !== "sim-process") return false;
      if (SPECIALIZED_PROCESS_TYPES.has(c.processType)) {
        if (c.processType !== op.processType) return false;
      } else if (SPECIALIZED_PROCESS_TYPES.has(op.processType)) {
        return false;
      }
      return op.mode === c.mode;
    }
    case "tensor-node":
      // each node runs its own arbitrary function
      return false;
    default:
      return true;
  }
}
