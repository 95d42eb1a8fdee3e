import type { Signal } from "./signal";

export type OperatorKind =
  | "reset"
  | "copy"
  | "elementwise-inc"
  | "dot-inc"
  | "sparse-dot-inc"
  | "func"
  | "sim-neurons"
  | "sim-process"
  | "tensor-node";

export type ProcessMode = "set" | "inc" | "update";

type OperatorSignals = {
  /** Signals overwritten by the operator. */
  readonly sets: readonly Signal[];
  /** Signals accumulated into. */
  readonly incs: readonly Signal[];
  /** Inputs. */
  readonly reads: readonly Signal[];
  /** Signals read and then written (last in the step). */
  readonly updates: readonly Signal[];
  readonly label?: string;
};

export type ResetOperator = OperatorSignals & {
  readonly kind: "reset";
  readonly value: number;
};

export type CopyOperator = OperatorSignals & {
  readonly kind: "copy";
  /** Accumulate into the destination instead of overwriting it. */
  readonly inc: boolean;
};

export type ElementwiseIncOperator = OperatorSignals & {
  readonly kind: "elementwise-inc";
};

export type DotIncOperator = OperatorSignals & {
  readonly kind: "dot-inc" | "sparse-dot-inc";
};

export type FuncOperator = OperatorSignals & {
  readonly kind: "func";
  /** Whether the function receives the simulation time as an input. */
  readonly usesTime: boolean;
};

export type SimNeuronsOperator = OperatorSignals & {
  readonly kind: "sim-neurons";
  readonly neuronType: string;
  /** Neuron state signals; also listed in `sets`. */
  readonly states: readonly Signal[];
};

export type SimProcessOperator = OperatorSignals & {
  readonly kind: "sim-process";
  readonly processType: string;
  readonly mode: ProcessMode;
};

export type TensorNodeOperator = OperatorSignals & {
  readonly kind: "tensor-node";
};

export type Operator =
  | ResetOperator
  | CopyOperator
  | ElementwiseIncOperator
  | DotIncOperator
  | FuncOperator
  | SimNeuronsOperator
  | SimProcessOperator
  | TensorNodeOperator;

/**
 * Batch builder family that executes each operator kind. Operators can only
 * share a group when they share a builder.
 */
const BUILDER_FOR_KIND: Record<OperatorKind, string> = {
  reset: "reset",
  copy: "copy",
  "elementwise-inc": "elementwise-inc",
  "dot-inc": "dot-inc",
  "sparse-dot-inc": "dot-inc",
  func: "func",
  "sim-neurons": "sim-neurons",
  "sim-process": "sim-process",
  "tensor-node": "tensor-node",
};

export function builderOf(op: Operator): string {
  return BUILDER_FOR_KIND[op.kind];
}

/**
 * Process types with a specialized batched implementation. Each merges only
 * with its own type; everything else shares the generic implementation.
 */
export const SPECIALIZED_PROCESS_TYPES: ReadonlySet<string> = new Set([
  "lowpass",
  "linear-filter",
]);

export function allSignals(op: Operator): Signal[] {
  return [...op.sets, ...op.incs, ...op.reads, ...op.updates];
}

/**
 * Every signal an operator consumes as input. Some kinds read state they do
 * not declare in `reads`: neuron updates read back their state signals and
 * the lowpass filter reads its own output.
 */
export function inputReads(op: Operator): Signal[] {
  const reads = op.reads.slice();
  if (op.kind === "sim-neurons") {
    reads.push(...op.states);
  } else if (op.kind === "sim-process" && op.processType === "lowpass") {
    reads.push(...op.updates);
  }
  return reads;
}

export function describeOperator(op: Operator): string {
  if (op.label) return `${op.kind}(${op.label})`;
  const names = allSignals(op).map((sig) => sig.name);
  return `${op.kind}(${names.join(", ")})`;
}

// ============================================================================
// Factories
// ============================================================================

type SignalLists = {
  sets?: readonly Signal[];
  incs?: readonly Signal[];
  reads?: readonly Signal[];
  updates?: readonly Signal[];
  label?: string;
};

function lists(params: SignalLists): OperatorSignals {
  return {
    sets: params.sets ? params.sets.slice() : [],
    incs: params.incs ? params.incs.slice() : [],
    reads: params.reads ? params.reads.slice() : [],
    updates: params.updates ? params.updates.slice() : [],
    label: params.label,
  };
}

export function resetOp(dst: Signal, value = 0, label?: string): ResetOperator {
  return { kind: "reset", value, ...lists({ sets: [dst], label }) };
}

export function copyOp(
  src: Signal,
  dst: Signal,
  options: { inc?: boolean; label?: string } = {},
): CopyOperator {
  const inc = options.inc ?? false;
  return {
    kind: "copy",
    inc,
    ...lists(
      inc
        ? { incs: [dst], reads: [src], label: options.label }
        : { sets: [dst], reads: [src], label: options.label },
    ),
  };
}

export function elementwiseIncOp(
  a: Signal,
  x: Signal,
  y: Signal,
  label?: string,
): ElementwiseIncOperator {
  return { kind: "elementwise-inc", ...lists({ incs: [y], reads: [a, x], label }) };
}

export function dotIncOp(
  a: Signal,
  x: Signal,
  y: Signal,
  options: { sparse?: boolean; label?: string } = {},
): DotIncOperator {
  return {
    kind: options.sparse ? "sparse-dot-inc" : "dot-inc",
    ...lists({ incs: [y], reads: [a, x], label: options.label }),
  };
}

export function funcOp(
  params: SignalLists & { usesTime: boolean },
): FuncOperator {
  return { kind: "func", usesTime: params.usesTime, ...lists(params) };
}

export function simNeuronsOp(params: {
  neuronType: string;
  input: Signal;
  output: Signal;
  states?: readonly Signal[];
  label?: string;
}): SimNeuronsOperator {
  const states = params.states ? params.states.slice() : [];
  return {
    kind: "sim-neurons",
    neuronType: params.neuronType,
    states,
    ...lists({ sets: [params.output, ...states], reads: [params.input], label: params.label }),
  };
}

export function simProcessOp(params: {
  processType: string;
  mode: ProcessMode;
  input?: Signal;
  output: Signal;
  time?: Signal;
  state?: readonly Signal[];
  label?: string;
}): SimProcessOperator {
  const reads: Signal[] = [];
  if (params.time) reads.push(params.time);
  if (params.input) reads.push(params.input);
  const state = params.state ? params.state.slice() : [];
  const target: SignalLists =
    params.mode === "set"
      ? { sets: [params.output], updates: state }
      : params.mode === "inc"
        ? { incs: [params.output], updates: state }
        : { updates: [params.output, ...state] };
  return {
    kind: "sim-process",
    processType: params.processType,
    mode: params.mode,
    ...lists({ ...target, reads, label: params.label }),
  };
}

export function tensorNodeOp(params: SignalLists): TensorNodeOperator {
  return { kind: "tensor-node", ...lists(params) };
}
