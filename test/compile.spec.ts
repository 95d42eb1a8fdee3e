import { afterEach, describe, expect, it, vi } from "vitest";
import {
  compileGraph,
  copyOp,
  CycleError,
  type Operator,
  funcOp,
  readSignalValue,
  resolveCompileOptions,
  type Signal,
  validatePlan,
} from "../src";
import { edges, labels, names, vec } from "./helpers/graph";

function network(): { ops: Operator[]; low: Signal; high: Signal } {
  const base = vec("base", 4);
  const low = base.slice(0, 2, 1, "low");
  const high = base.slice(2, 4, 1, "high");
  const u = vec("u", 2);
  const ops: Operator[] = [
    funcOp({ sets: [u], reads: [vec("x", 2)], usesTime: false, label: "f" }),
    copyOp(low, vec("w1", 2), { label: "c1" }),
    copyOp(high, vec("w2", 2), { label: "c2" }),
    copyOp(u, vec("w3", 2), { label: "c3" }),
  ];
  return { ops, low, high };
}

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});

describe("resolveCompileOptions", () => {
  it("fills defaults", () => {
    vi.stubEnv("MERGEPLAN_PLANNER", "");
    expect(resolveCompileOptions()).toEqual({
      planner: "greedy",
      sorter: "order",
      floatType: "float32",
      minibatchSize: 1,
      sortPasses: 10,
      validate: true,
    });
  });

  it("takes the planner from the environment", () => {
    vi.stubEnv("MERGEPLAN_PLANNER", "tree");
    expect(resolveCompileOptions().planner).toBe("tree");
    expect(resolveCompileOptions({ planner: "noop" }).planner).toBe("noop");
  });

  it("rejects invalid values", () => {
    vi.stubEnv("MERGEPLAN_PLANNER", "fastest");
    expect(() => resolveCompileOptions()).toThrow('compile options: unknown planner "fastest"');
    expect(() => resolveCompileOptions({ planner: "greedy", minibatchSize: 1.5 })).toThrow(
      "compile options: minibatchSize must be a positive integer, got 1.5",
    );
    expect(() => resolveCompileOptions({ planner: "greedy", sortPasses: -1 })).toThrow(
      "compile options: sortPasses must be a non-negative integer, got -1",
    );
  });
});

describe("compileGraph", () => {
  it("plans, orders and lays out a graph", () => {
    const { ops, low, high } = network();
    const compiled = compileGraph(ops, { planner: "tree" });

    // c3 reads u, which is ordered ahead of base
    expect(labels(compiled.plan)).toEqual([["f"], ["c3", "c1", "c2"]]);
    expect(() => validatePlan(ops, compiled.plan)).not.toThrow();
    expect(compiled.stats).toMatchObject({
      operators: 4,
      groups: 2,
      signals: 6,
      baseArrays: compiled.layout.baseArrays.size,
    });
    expect(readSignalValue(compiled.layout, low)).toEqual([0, 1]);
    expect(readSignalValue(compiled.layout, high)).toEqual([2, 3]);
  });

  it("uses the greedy planner by default", () => {
    vi.stubEnv("MERGEPLAN_PLANNER", "");
    const { ops } = network();
    expect(labels(compileGraph(ops).plan)).toEqual([["c1", "c2"], ["f"], ["c3"]]);
  });

  it("honours the planner named in the environment", () => {
    vi.stubEnv("MERGEPLAN_PLANNER", "noop");
    const { ops } = network();
    expect(compileGraph(ops).stats.groups).toBe(4);
  });

  it("keeps discovery order with the noop sorter", () => {
    const { ops } = network();
    const compiled = compileGraph(ops, { planner: "noop", sorter: "noop" });
    expect(names(compiled.signals)).toEqual(["u", "x", "w1", "base", "w2", "w3"]);
    expect(compiled.stats.sortPasses).toBe(0);
  });

  it("stores floats at the requested precision", () => {
    const { ops } = network();
    const compiled = compileGraph(ops, { planner: "greedy", floatType: "float64" });
    for (const array of compiled.layout.baseArrays.values()) {
      expect(array.dtype).toBe("float64");
      expect(array.data).toBeInstanceOf(Float64Array);
    }
  });

  it("accepts an explicit dependency graph", () => {
    const { ops } = network();
    const [f, c1, c2, c3] = ops;
    expect(() =>
      compileGraph(ops, {
        planner: "greedy",
        dependencyGraph: edges(ops, [[c1, c2], [c2, c3], [c3, f], [f, c1]]),
      }),
    ).toThrow(CycleError);
  });

  it("logs each pass when debugging is enabled", () => {
    vi.stubEnv("MERGEPLAN_DEBUG", "1");
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const { ops } = network();

    compileGraph(ops, { planner: "noop" });

    const lines = log.mock.calls.map((call) => String(call[0]));
    expect(lines[0]).toMatch(/^\[planner\] noop plan\n {2}0: \(func\(f\)\)/);
    expect(lines.some((line) => line.startsWith("[signal-order] "))).toBe(true);
    expect(lines.some((line) => line.startsWith("[memory-layout] "))).toBe(true);
    // noop groups are singletons, so every signal closes a partition
    expect(lines[lines.length - 1]).toBe(
      '[compile] {"operators":4,"groups":4,"signals":6,"baseArrays":6,"sortPasses":1,"sortConverged":true}',
    );
  });

  it("logs stage timings when timing is enabled", () => {
    vi.stubEnv("MERGEPLAN_TIMING", "1");
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const { ops } = network();

    compileGraph(ops, { planner: "greedy" });

    const lines = log.mock.calls.map((call) => String(call[0]));
    expect(lines.map((line) => line.replace(/=\d+\.\dms$/, ""))).toEqual([
      "[compile-timing] dependencyGraph",
      "[compile-timing] plan(greedy)",
      "[compile-timing] order(order)",
      "[compile-timing] layout",
    ]);
  });
});
