/**
 * Runtime Safety Primitives
 *
 * Low-level helpers for asserting construction-time invariants and marking
 * unreachable code paths. Parsing itself never throws; these guard the
 * places where a caller has wired something up wrong (an empty start-character
 * set, a duplicate directive name).
 *
 * @example
 * ```typescript
 * type Tier = "high" | "low";
 * function rank(tier: Tier): number {
 *   switch (tier) {
 *     case "high": return 0;
 *     case "low": return 1;
 *     default: return unreachable(tier);
 *   }
 * }
 * ```
 */

/**
 * Error thrown when an invariant is violated.
 */
export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantError";
  }
}

/**
 * Runtime invariant check.
 *
 * @throws InvariantError if condition is false
 */
export function invariant(condition: boolean, message?: string): asserts condition {
  if (!condition) {
    throw new InvariantError(message ?? "Invariant violation");
  }
}

/**
 * Mark a code path as unreachable. Useful for exhaustiveness checking.
 *
 * @param value - A value of type `never` (for type-level exhaustiveness)
 */
export function unreachable(value?: never): never {
  throw new InvariantError(`Unreachable code reached${value === undefined ? "" : `: ${String(value)}`}`);
}
