/**
 * Raised when no operator group can be scheduled while operators remain,
 * i.e. the dependency graph is not acyclic.
 */
export class CycleError extends Error {
  name = "CycleError";

  constructor(public readonly remaining: number) {
    super(
      `Cycle detected during graph optimization (${remaining} operator(s) could not be scheduled)`,
    );
  }
}

/**
 * Raised for signals the memory layout cannot express: unsupported dtypes,
 * or views that slice and reshape their base at the same time.
 */
export class UnsupportedSignalError extends Error {
  name = "UnsupportedSignalError";
}

/**
 * Raised when a built plan, signal order or layout fails its own
 * post-conditions. Always checked.
 */
export class LayoutConsistencyError extends Error {
  name = "LayoutConsistencyError";
}
