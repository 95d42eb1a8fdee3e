/**
 * Opt-in console tracing for the compile passes.
 *
 * MERGEPLAN_DEBUG=1 prints per-pass debug lines, MERGEPLAN_TIMING=1 prints
 * per-stage timings from compileGraph. Both are read on every call so tests
 * can toggle them through process.env.
 */

export type DebugScope = "planner" | "signal-order" | "memory-layout" | "compile";

function envFlag(name: string): boolean {
  return typeof process !== "undefined" && process.env?.[name] === "1";
}

export function isDebugEnabled(): boolean {
  return envFlag("MERGEPLAN_DEBUG");
}

export function isTimingEnabled(): boolean {
  return envFlag("MERGEPLAN_TIMING");
}

/**
 * Message is built lazily so disabled tracing costs one env lookup.
 */
export function debugLog(scope: DebugScope, message: () => string): void {
  if (!isDebugEnabled()) return;
  console.log(`[${scope}] ${message()}`);
}

export function timingLog(stage: string, startMs: number): void {
  if (!isTimingEnabled()) return;
  console.log(`[compile-timing] ${stage}=${(performance.now() - startMs).toFixed(1)}ms`);
}
