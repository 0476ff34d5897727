/**
 * Pipeline IR types for @setwise/sequence
 *
 * Represents the element-wise steps of a lazy sequence before they are
 * fused into a single-pass execution. Step callbacks are declared as
 * methods so that a step built from a `(value: T) => U` callback fits the
 * type-erased slot.
 */

/** A step in a lazy pipeline - the IR for fusion */
export type PipelineStep =
  | { readonly type: "map"; f(value: unknown): unknown }
  | { readonly type: "filter"; predicate(value: unknown): boolean }
  | { readonly type: "flatMap"; f(value: unknown): Iterable<unknown> }
  | { readonly type: "take"; readonly count: number }
  | { readonly type: "drop"; readonly count: number }
  | { readonly type: "takeWhile"; predicate(value: unknown): boolean }
  | { readonly type: "dropWhile"; predicate(value: unknown): boolean };

/**
 * A re-openable source produced by a set operator. Every call to
 * `[Symbol.iterator]` starts the operator afresh against its inputs.
 */
export interface OperatorSource<T> extends Iterable<T> {
  readonly operator: string;
}
