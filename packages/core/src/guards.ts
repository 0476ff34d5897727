/**
 * Argument guards shared by every public operation.
 *
 * Each guard throws `InvalidArgumentError` naming the operation and the
 * offending argument, and narrows the value on success.
 */

import { InvalidArgumentError } from "./errors.js";

export function requirePresent<T>(
  operation: string,
  argument: string,
  value: T | null | undefined
): asserts value is T {
  if (value === null || value === undefined) {
    throw new InvalidArgumentError(operation, argument, "missing", `must not be ${String(value)}`);
  }
}

export function isIterable(value: unknown): value is Iterable<unknown> {
  if (value === null || value === undefined) return false;
  if (typeof value === "string") return true;
  if (typeof value !== "object" && typeof value !== "function") return false;
  return typeof Reflect.get(value, Symbol.iterator) === "function";
}

export function requireIterable<T>(
  operation: string,
  argument: string,
  value: Iterable<T> | null | undefined
): asserts value is Iterable<T> {
  requirePresent(operation, argument, value);
  if (!isIterable(value)) {
    throw new InvalidArgumentError(operation, argument, "not_iterable", "must be iterable");
  }
}

export function requireFunction(
  operation: string,
  argument: string,
  value: unknown
): void {
  requirePresent(operation, argument, value);
  if (typeof value !== "function") {
    throw new InvalidArgumentError(operation, argument, "not_function", "must be a function");
  }
}

/** Counts are non-negative integers; `Infinity` is accepted as "no limit". */
export function requireCount(operation: string, argument: string, value: number): void {
  if (typeof value !== "number" || Number.isNaN(value) || value < 0) {
    throw new InvalidArgumentError(
      operation,
      argument,
      "out_of_range",
      `must be a non-negative integer, got ${String(value)}`
    );
  }
  if (value !== Infinity && !Number.isInteger(value)) {
    throw new InvalidArgumentError(
      operation,
      argument,
      "out_of_range",
      `must be a non-negative integer, got ${String(value)}`
    );
  }
}
