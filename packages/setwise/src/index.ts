/**
 * setwise - ordered, lazy set operations with pluggable equality
 *
 * ## Quick Start
 *
 * ```ts
 * import { union, intersect, except, distinctBy, ignoreCase } from "setwise";
 *
 * const a = ["Carrots", "Tofu", "Lettuce", "Cucumbers"];
 * const b = ["Cucumbers", "Cheeseburgers", "Tofu", "Pizza", "Bacon"];
 *
 * union(a, b).toArray();     // Carrots, Tofu, Lettuce, Cucumbers, Cheeseburgers, Pizza, Bacon
 * intersect(a, b).toArray(); // Tofu, Cucumbers
 * except(a, b).toArray();    // Carrots, Lettuce
 *
 * distinctBy(foods, (f) => f.name, ignoreCase).toArray();
 * ```
 *
 * @module
 */

// ============================================================================
// Configuration, logging and errors
// ============================================================================

export * from "@setwise/core";

// ============================================================================
// Equality
// ============================================================================

export * from "@setwise/equality";

// ============================================================================
// Lazy sequences and set operators
// ============================================================================

export * from "@setwise/sequence";

// ============================================================================
// Collections
// ============================================================================

export * from "@setwise/collections";
