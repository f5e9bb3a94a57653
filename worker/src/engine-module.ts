/**
 * Loads the engine a worker thread hosts from a module exporting
 * `createEngine()`.
 */

import { isAbsolute, resolve } from "node:path";
import { pathToFileURL } from "node:url";
import {
  BridgeError,
  describeError,
  isInferenceEngine,
  type InferenceEngine,
} from "@enginebridge/core";

/**
 * Turn a module reference into an import specifier. File paths (absolute, or
 * relative to the working directory) become file URLs; package names pass
 * through unchanged.
 */
export function toImportSpecifier(reference: string, cwd: string = process.cwd()): string {
  if (reference.startsWith("file:")) return reference;
  if (isAbsolute(reference)) return pathToFileURL(reference).href;
  if (reference.startsWith("./") || reference.startsWith("../")) {
    return pathToFileURL(resolve(cwd, reference)).href;
  }
  return reference;
}

export async function loadEngine(reference: string): Promise<InferenceEngine> {
  let mod: unknown;
  try {
    mod = await import(toImportSpecifier(reference));
  } catch (err) {
    throw new BridgeError({
      code: "CONFIG_ERROR",
      message: `Engine module ${reference} could not be loaded: ${describeError(err)}`,
      cause: err,
    });
  }

  const createEngine = typeof mod === "object" && mod !== null ? Reflect.get(mod, "createEngine") : undefined;
  if (typeof createEngine !== "function") {
    throw new BridgeError({
      code: "CONFIG_ERROR",
      message: `Engine module ${reference} does not export createEngine()`,
    });
  }

  const engine: unknown = await createEngine();
  if (!isInferenceEngine(engine)) {
    throw new BridgeError({
      code: "CONFIG_ERROR",
      message: `createEngine() in ${reference} returned an object that does not implement the engine contract`,
    });
  }
  return engine;
}
