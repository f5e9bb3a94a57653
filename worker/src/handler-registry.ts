/**
 * Method registry. Maps an operation identifier to a callable bound to the
 * real engine. Built once when the worker starts and never modified.
 */

import {
  BridgeError,
  OPERATIONS,
  engineContract,
  formatIssues,
  type InferenceEngine,
  type Operation,
  type OperationHandlers,
} from "@enginebridge/core";

/**
 * A registered operation. Receives the envelope payload and returns an
 * immediate value, a promise, or an async iterable.
 */
export type RegisteredMethod = (payload: unknown) => unknown;

export type MethodRegistry = ReadonlyMap<string, RegisteredMethod>;

function bindOperation<Op extends Operation>(op: Op, handlers: OperationHandlers): RegisteredMethod {
  const { args } = engineContract[op];
  return (payload) => {
    const parsed = args.safeParse(payload);
    if (!parsed.success) {
      throw new BridgeError({
        code: "INVALID_ARGUMENT",
        message: `Invalid arguments for ${op}: ${formatIssues(parsed.error)}`,
        details: parsed.error.flatten(),
      });
    }
    return handlers[op](parsed.data);
  };
}

/**
 * Build the registry for an engine: one entry per contract operation, each
 * validating its argument against the contract before calling the engine.
 */
export function createMethodRegistry(engine: InferenceEngine): MethodRegistry {
  const handlers: OperationHandlers = engine;
  return defineMethodRegistry(OPERATIONS.map((op) => [op, bindOperation(op, handlers)]));
}

/**
 * Build a registry from explicit entries. Later entries with the same name
 * replace earlier ones.
 */
export function defineMethodRegistry(
  entries: Iterable<readonly [string, RegisteredMethod]>
): MethodRegistry {
  return new Map(entries);
}
