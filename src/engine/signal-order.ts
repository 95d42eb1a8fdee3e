/**
 * Signal Order Optimizer
 *
 * Arranges base signals (and operators within each group) so that the
 * signals a group reads at one input slot sit next to each other in memory:
 * - Read blocks: the bases read at one slot across one group
 * - Hamming sort: chains blocks so co-read signals cluster together
 * - Refinement: alternately sorts operators by signal position and signals
 *   by operator order, without changing which block sits where
 */

import { allSignals, inputReads, type Operator } from "../graph/operator";
import type { Signal } from "../graph/signal";
import { debugLog } from "./debug-log";
import { LayoutConsistencyError } from "./errors";
import type { OperatorGroup, Plan } from "./planner";

// ============================================================================
// Core Types
// ============================================================================

/**
 * Bases read at input slot `slot` by every operator of plan group `group`.
 */
export interface ReadBlock {
  group: number;
  slot: number;
  bases: ReadonlySet<Signal>;
  /** Canonical key of `bases`; equal sets share a key. */
  key: string;
}

/**
 * A distinct set of co-read bases, with how many read blocks share it.
 */
export interface UniqueReadBlock {
  key: string;
  bases: Signal[];
  duplicates: number;
  /** duplicates × total element count */
  weight: number;
}

/**
 * Sorted indices (into `uniqueBlocks`) of the blocks a signal belongs to.
 */
export interface BlockMembership {
  key: string;
  blocks: number[];
}

export interface ReadBlockAnalysis {
  /** Unique base signals in plan discovery order. */
  signals: Signal[];
  /** Input signals per operator, implicit reads included. */
  reads: Map<Operator, Signal[]>;
  readBlocks: ReadBlock[];
  /** Heaviest first. */
  uniqueBlocks: UniqueReadBlock[];
  signalBlocks: Map<Signal, BlockMembership>;
  /** Read blocks ordered from the lightest unique block to the heaviest. */
  sortedReads: ReadBlock[];
}

export interface OrderingState {
  order: Signal[];
  groups: Operator[][];
}

export interface SignalOrderResult {
  /** Base signals in memory order. */
  signals: Signal[];
  /** Input plan with operators reordered inside each group. */
  plan: Plan;
  /** Refinement passes run. */
  passes: number;
  /** True when the last pass changed nothing. */
  converged: boolean;
}

export type SignalOrderOptions = {
  /** Maximum refinement passes. Default: 10 */
  passes?: number;
};

export const DEFAULT_SORT_PASSES = 10;

const NO_BLOCK = "";

// ============================================================================
// Read Block Analysis
// ============================================================================

export function uniqueBases(plan: Plan): Signal[] {
  const seen = new Set<Signal>();
  const out: Signal[] = [];
  for (const group of plan) {
    for (const op of group) {
      for (const sig of allSignals(op)) {
        if (!seen.has(sig.base)) {
          seen.add(sig.base);
          out.push(sig.base);
        }
      }
    }
  }
  return out;
}

function readAt(
  reads: Map<Operator, Signal[]>,
  op: Operator,
  slot: number,
): Signal {
  const sig = reads.get(op)?.[slot];
  if (!sig) {
    throw new Error(`signal order: operator ${op.kind} has no input at slot ${slot}`);
  }
  return sig;
}

/**
 * Collect, deduplicate and weigh the read blocks of a plan.
 */
export function analyzeReadBlocks(plan: Plan): ReadBlockAnalysis {
  const signals = uniqueBases(plan);
  const signalIndex = new Map<Signal, number>();
  signals.forEach((sig, i) => signalIndex.set(sig, i));
  const keyOf = (bases: Iterable<Signal>): string =>
    Array.from(bases, (sig) => signalIndex.get(sig) ?? -1)
      .sort((a, b) => a - b)
      .join(",");

  const reads = new Map<Operator, Signal[]>();
  const readBlocks: ReadBlock[] = [];
  plan.forEach((group, groupIdx) => {
    for (const op of group) {
      reads.set(op, inputReads(op));
    }
    const slots = reads.get(group[0])?.length ?? 0;
    for (let slot = 0; slot < slots; slot++) {
      const bases = new Set(group.map((op) => readAt(reads, op, slot).base));
      readBlocks.push({ group: groupIdx, slot, bases, key: keyOf(bases) });
    }
  });

  const byKey = new Map<string, UniqueReadBlock>();
  for (const block of readBlocks) {
    const entry = byKey.get(block.key);
    if (entry) {
      entry.duplicates += 1;
    } else {
      byKey.set(block.key, {
        key: block.key,
        bases: Array.from(block.bases),
        duplicates: 1,
        weight: 0,
      });
    }
  }
  const uniqueBlocks = Array.from(byKey.values());
  for (const block of uniqueBlocks) {
    const elements = block.bases.reduce((acc, sig) => acc + sig.size, 0);
    block.weight = elements * block.duplicates;
  }
  uniqueBlocks.sort((a, b) => b.weight - a.weight);

  const blockIndex = new Map<string, number>();
  uniqueBlocks.forEach((block, i) => blockIndex.set(block.key, i));

  const memberOf = new Map<Signal, number[]>();
  uniqueBlocks.forEach((block, i) => {
    for (const sig of block.bases) {
      const entry = memberOf.get(sig);
      if (entry) {
        entry.push(i);
      } else {
        memberOf.set(sig, [i]);
      }
    }
  });
  const signalBlocks = new Map<Signal, BlockMembership>();
  for (const [sig, blocks] of memberOf) {
    signalBlocks.set(sig, { key: blocks.join(","), blocks });
  }

  const rank = (block: ReadBlock): number => blockIndex.get(block.key) ?? 0;
  const sortedReads = readBlocks.slice().sort((a, b) => rank(b) - rank(a));

  return { signals, reads, readBlocks, uniqueBlocks, signalBlocks, sortedReads };
}

// ============================================================================
// Hamming Sort
// ============================================================================

function symmetricDifference(a: readonly number[], b: readonly number[]): number {
  let shared = 0;
  for (const x of a) {
    if (b.includes(x)) shared++;
  }
  return a.length + b.length - 2 * shared;
}

function compareLexicographic(a: readonly number[], b: readonly number[]): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    if (a[i] !== b[i]) return a[i] - b[i];
  }
  return a.length - b.length;
}

/**
 * Order block-membership sets so signals read by the same operators land
 * next to each other, giving priority to the heaviest blocks (lowest
 * indices).
 *
 * Each step prefers sets that continue the active block, then the smallest
 * Hamming distance to the current set, then sets matching the current set
 * on its heaviest blocks, then the lexicographically smallest set.
 *
 * @returns sort index per signal; signals in no block map to -1
 */
export function hammingSort(
  signalBlocks: ReadonlyMap<Signal, BlockMembership>,
): Map<Signal, number> {
  const unique = new Map<string, number[]>();
  for (const membership of signalBlocks.values()) {
    unique.set(membership.key, membership.blocks);
  }
  const total = unique.size;

  const sortedKeys: string[] = [];
  let curr: number[] | null = null;
  let active: number | null = null;

  while (total > 0) {
    if (curr === null) {
      // seed with the heaviest block; the set containing it is chosen below
      curr = [0];
    } else {
      const key = curr.join(",");
      sortedKeys.push(key);
      unique.delete(key);
    }
    if (sortedKeys.length === total) break;

    if (active === null) {
      active = curr[0];
    }
    const activeBlock: number = active;
    let next: number[][] = Array.from(unique.values()).filter((b) => b.includes(activeBlock));
    if (next.length === 0) {
      next = Array.from(unique.values());
      active = null;
    }

    const current = curr;
    const dists = next.map((b) => symmetricDifference(current, b));
    const minDist = Math.min(...dists);
    next = next.filter((_, i) => dists[i] === minDist);

    for (const block of current) {
      if (next.length === 1) break;
      if (next.some((b) => b.includes(block))) {
        next = next.filter((b) => b.includes(block));
      }
    }

    if (next.length > 1) {
      next = [next.reduce((best, b) => (compareLexicographic(b, best) < 0 ? b : best))];
    }
    curr = next[0];
  }

  const position = new Map<string, number>();
  sortedKeys.forEach((key, i) => position.set(key, i));
  const sortIdxs = new Map<Signal, number>();
  for (const [sig, membership] of signalBlocks) {
    sortIdxs.set(sig, position.get(membership.key) ?? -1);
  }
  return sortIdxs;
}

// ============================================================================
// Refinement
// ============================================================================

function positionsOf(order: readonly Signal[]): Map<Signal, number> {
  const positions = new Map<Signal, number>();
  order.forEach((sig, i) => positions.set(sig, i));
  return positions;
}

function positionOf(positions: Map<Signal, number>, sig: Signal): number {
  const pos = positions.get(sig);
  if (pos === undefined) {
    throw new Error(`signal order: ${sig.name} is not in the signal order`);
  }
  return pos;
}

/**
 * Move the bases of each read block of one group into the order their
 * operators read them, when that keeps every signal inside its block.
 * The signals spanned by a block may only contain outsiders as a prefix of
 * the first block or a suffix of the last one.
 */
function sortSignalsByOps(
  analysis: ReadBlockAnalysis,
  entries: readonly ReadBlock[],
  state: OrderingState,
  positions: Map<Signal, number>,
): void {
  const blockKey = (sig: Signal): string =>
    analysis.signalBlocks.get(sig)?.key ?? NO_BLOCK;

  for (const entry of entries) {
    const ops = state.groups[entry.group];
    const sortVals = new Map<Signal, number>();
    ops.forEach((op, i) => sortVals.set(readAt(analysis.reads, op, entry.slot).base, i));
    if (sortVals.size === 1) continue;

    const idxs = Array.from(sortVals.keys(), (sig) => positionOf(positions, sig));
    const minIndex = Math.min(...idxs);
    const maxIndex = Math.max(...idxs);

    let firstBlock = true;
    let lastBlock = false;
    let currBlock: string | null = null;
    let currMax = -1;
    let prevMax = -1;
    let sortable = true;
    const pre: Signal[] = [];
    const post: Signal[] = [];

    for (let p = minIndex; p <= maxIndex; p++) {
      const sig = state.order[p];
      const key = blockKey(sig);
      if (key !== currBlock) {
        if (lastBlock) {
          // outsiders already seen before this block: they would end up
          // in the middle of the run
          sortable = false;
          break;
        }
        if (currBlock !== null) firstBlock = false;
        prevMax = currMax;
        currMax = -1;
        currBlock = key;
      }

      const idx = sortVals.get(sig);
      if (idx !== undefined) {
        if (idx < prevMax) {
          sortable = false;
          break;
        }
        currMax = Math.max(currMax, idx);
      } else if (firstBlock) {
        pre.push(sig);
      } else {
        lastBlock = true;
        post.push(sig);
      }
    }
    if (!sortable) continue;

    const members = Array.from(sortVals.keys()).sort(
      (a, b) => (sortVals.get(a) ?? 0) - (sortVals.get(b) ?? 0),
    );
    const segment = [...pre, ...members, ...post];
    segment.forEach((sig, k) => {
      state.order[minIndex + k] = sig;
      positions.set(sig, minIndex + k);
    });
  }
}

/**
 * One refinement pass. Read blocks are visited from lightest to heaviest so
 * heavier blocks have the last word when two blocks disagree.
 */
export function refineOrder(
  analysis: ReadBlockAnalysis,
  state: OrderingState,
): { state: OrderingState; changed: boolean } {
  const next: OrderingState = {
    order: state.order.slice(),
    groups: state.groups.map((group) => group.slice()),
  };
  const positions = positionsOf(next.order);

  for (const entry of analysis.sortedReads) {
    const ops = next.groups[entry.group];
    if (ops.length === 1) continue;

    // (signal position, view offset): views of one base follow their offset
    next.groups[entry.group] = ops.slice().sort((a, b) => {
      const ra = readAt(analysis.reads, a, entry.slot);
      const rb = readAt(analysis.reads, b, entry.slot);
      const byPosition = positionOf(positions, ra.base) - positionOf(positions, rb.base);
      return byPosition !== 0 ? byPosition : ra.offset - rb.offset;
    });

    sortSignalsByOps(
      analysis,
      analysis.sortedReads.filter((other) => other.group === entry.group),
      next,
      positions,
    );
  }

  const changed =
    next.order.some((sig, i) => sig !== state.order[i]) ||
    next.groups.some((group, g) => group.some((op, i) => op !== state.groups[g][i]));
  return { state: next, changed };
}

// ============================================================================
// Entry Points
// ============================================================================

function checkPostConditions(
  analysis: ReadBlockAnalysis,
  hammingOrder: readonly Signal[],
  plan: Plan,
  result: OrderingState,
): void {
  const blockKey = (sig: Signal): string =>
    analysis.signalBlocks.get(sig)?.key ?? NO_BLOCK;

  if (result.order.length !== hammingOrder.length) {
    throw new LayoutConsistencyError(
      `signal order lost signals: ${hammingOrder.length} -> ${result.order.length}`,
    );
  }
  hammingOrder.forEach((sig, i) => {
    if (blockKey(sig) !== blockKey(result.order[i])) {
      throw new LayoutConsistencyError(
        `signal order moved ${result.order[i].name} out of its read block at position ${i}`,
      );
    }
  });

  if (result.groups.length !== plan.length) {
    throw new LayoutConsistencyError(
      `signal order changed the group count: ${plan.length} -> ${result.groups.length}`,
    );
  }
  plan.forEach((group, g) => {
    const reordered = result.groups[g];
    const members = new Set<Operator>(group);
    if (
      reordered.length !== group.length ||
      reordered.some((op) => !members.has(op))
    ) {
      throw new LayoutConsistencyError(`signal order changed the members of group ${g}`);
    }
  });
}

/**
 * Order signals and operators so that each group's reads form contiguous
 * runs of the signal order wherever possible.
 */
export function orderSignals(
  plan: Plan,
  options: SignalOrderOptions = {},
): SignalOrderResult {
  const maxPasses = options.passes ?? DEFAULT_SORT_PASSES;
  const analysis = analyzeReadBlocks(plan);

  if (analysis.readBlocks.length === 0) {
    return {
      signals: analysis.signals,
      plan: plan.map((group) => group.slice()),
      passes: 0,
      converged: true,
    };
  }

  const sortIdxs = hammingSort(analysis.signalBlocks);
  const hammingOrder = analysis.signals
    .slice()
    .sort((a, b) => (sortIdxs.get(a) ?? -1) - (sortIdxs.get(b) ?? -1));

  debugLog(
    "signal-order",
    () =>
      `${analysis.uniqueBlocks.length} unique read blocks, hamming order: ${hammingOrder.map((sig) => sig.name).join(" ")}`,
  );

  let state: OrderingState = {
    order: hammingOrder.slice(),
    groups: plan.map((group) => group.slice()),
  };
  let passes = 0;
  let converged = false;
  while (passes < maxPasses) {
    const result = refineOrder(analysis, state);
    state = result.state;
    passes++;
    if (!result.changed) {
      converged = true;
      break;
    }
  }

  checkPostConditions(analysis, hammingOrder, plan, state);

  debugLog(
    "signal-order",
    () =>
      `${converged ? "converged" : "stopped"} after ${passes} pass(es): ${state.order.map((sig) => sig.name).join(" ")}`,
  );

  const orderedPlan: Plan = state.groups.map((group): OperatorGroup => group);
  return { signals: state.order, plan: orderedPlan, passes, converged };
}

/**
 * Debug sorter: bases in discovery order, plan untouched.
 */
export function noopOrderSignals(plan: Plan): SignalOrderResult {
  return {
    signals: uniqueBases(plan),
    plan: plan.map((group) => group.slice()),
    passes: 0,
    converged: true,
  };
}
