/**
 * @setwise/sequence - deferred set operators over ordered sequences
 *
 * `union`, `intersect`, `except`, `concat` and `distinct` (plus their
 * key-selector variants) return a `LazySequence`: building one does no work,
 * iterating it runs the operator, and iterating again runs it again.
 *
 * @example
 * ```typescript
 * import { sequence, distinctBy } from "@setwise/sequence";
 * import { ignoreCase } from "@setwise/equality";
 *
 * const foods = [
 *   { name: "Carrot", calories: 100 },
 *   { name: "Cucumber", calories: 201 },
 *   { name: "cucumber", calories: 202 },
 * ];
 *
 * distinctBy(foods, (f) => f.name, ignoreCase).toArray();
 * // [{ name: "Carrot", ... }, { name: "Cucumber", calories: 201 }]
 *
 * sequence([1, 2, 3]).union([3, 4]).take(3).toArray(); // [1, 2, 3]
 * ```
 */

export { LazySequence } from "./lazy.js";
export { sequence, of, empty, range, iterate, repeat } from "./lazy-entry.js";
export {
  union,
  intersect,
  except,
  concat,
  distinct,
  distinctBy,
  unionBy,
  intersectBy,
  exceptBy,
} from "./operators.js";

export type { PipelineStep, OperatorSource } from "./types.js";
