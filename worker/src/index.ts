/**
 * Worker side of enginebridge: registry, dispatch loop and spawners.
 */

export { WorkerEndpoint } from "./worker.js";
export type { WorkerEndpointParams } from "./worker.js";
export {
  createMethodRegistry,
  defineMethodRegistry,
} from "./handler-registry.js";
export type { MethodRegistry, RegisteredMethod } from "./handler-registry.js";
export { createInProcessSpawner } from "./in-process.js";
export type { EngineFactory, InProcessSpawnerParams } from "./in-process.js";
export { loadConfig, defaultWorkerProcessConfig } from "./config.js";
export type { WorkerProcessConfig } from "./config.js";
export { loadEngine, toImportSpecifier } from "./engine-module.js";

/**
 * Entry module for worker threads. It is TypeScript, so start the thread with
 * {@link workerExecArgv}.
 */
export const workerEntry = new URL("./main.ts", import.meta.url);

/** Node flags that register the TypeScript loader in the worker thread. */
export const workerExecArgv: readonly string[] = ["--import", "tsx"];
