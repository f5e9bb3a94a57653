/**
 * Shared utility functions for proxy and worker.
 */

/**
 * Type guard for AsyncIterable.
 */
export function isAsyncIterable(x: unknown): x is AsyncIterable<unknown> {
  return (
    typeof x === "object" &&
    x !== null &&
    typeof Reflect.get(x, Symbol.asyncIterator) === "function"
  );
}

/**
 * Type guard for promises and other thenables.
 */
export function isPromiseLike(x: unknown): x is PromiseLike<unknown> {
  return (
    (typeof x === "object" || typeof x === "function") &&
    x !== null &&
    typeof Reflect.get(x, "then") === "function"
  );
}
