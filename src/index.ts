export * from "./core/shape";
export {
  buildDependencyGraph,
  type DependencyGraph,
  OperatorGraph,
  toposort,
  transitiveClosure,
} from "./graph/dependency-graph";
export {
  allSignals,
  builderOf,
  type CopyOperator,
  copyOp,
  describeOperator,
  type DotIncOperator,
  dotIncOp,
  type ElementwiseIncOperator,
  elementwiseIncOp,
  inputReads,
  type Operator,
  type OperatorKind,
  type ProcessMode,
  type FuncOperator,
  funcOp,
  type ResetOperator,
  resetOp,
  type SimNeuronsOperator,
  type SimProcessOperator,
  SPECIALIZED_PROCESS_TYPES,
  simNeuronsOp,
  simProcessOp,
  type TensorNodeOperator,
  tensorNodeOp,
} from "./graph/operator";
export {
  type DType,
  Signal,
  type SignalOptions,
  signalsCompatible,
} from "./graph/signal";
export {
  type CompiledGraph,
  type CompileStats,
  compileGraph,
} from "./engine/compile";
export {
  CycleError,
  LayoutConsistencyError,
  UnsupportedSignalError,
} from "./engine/errors";
export {
  broadcastValues,
  buildMemoryLayout,
  type FloatType,
  findPartitionBreaks,
  layoutDType,
  type MemoryLayout,
  type MemoryLayoutOptions,
  readSignalValue,
  tileMinibatch,
} from "./engine/memory-layout";
export { mergeable } from "./engine/mergeable";
export {
  type CompileOptions,
  type ResolvedCompileOptions,
  resolveCompileOptions,
  type SorterName,
} from "./engine/options";
export {
  assignToGroups,
  countOperators,
  formatPlan,
  type OperatorGroup,
  type Plan,
  type Planner,
  validatePlan,
} from "./engine/planner";
export { greedyPlanner } from "./engine/planner-greedy";
export { noopPlanner } from "./engine/planner-noop";
export {
  getPlanner,
  isPlannerName,
  PLANNERS,
  type PlannerName,
} from "./engine/planner-registry";
export { transitivePlanner } from "./engine/planner-transitive";
export { treePlanner } from "./engine/planner-tree";
export {
  analyzeReadBlocks,
  type BlockMembership,
  DEFAULT_SORT_PASSES,
  hammingSort,
  noopOrderSignals,
  type OrderingState,
  orderSignals,
  type ReadBlock,
  type ReadBlockAnalysis,
  refineOrder,
  type SignalOrderOptions,
  type SignalOrderResult,
  uniqueBases,
  type UniqueReadBlock,
} from "./engine/signal-order";
export {
  allocateData,
  type BaseArray,
  type BaseArrayData,
  type LayoutDType,
  type LayoutKey,
  rowSize,
  TensorSignal,
} from "./engine/tensor-signal";
