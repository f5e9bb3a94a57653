/**
 * Spawning the worker execution context.
 *
 * The proxy hands its send port to the spawner; the spawned side must answer
 * with a bootstrap envelope carrying its own send port.
 */

import type { MessagePort } from "node:worker_threads";

export interface SpawnParams {
  /** Port the worker sends replies to (the proxy's send capability) */
  proxyPort: MessagePort;
}

export interface SpawnedWorker {
  /** Stop the worker. Resolves once it is gone. */
  terminate(): Promise<void>;
  /**
   * Register a listener for the worker ending on its own (crash or exit).
   * Returns an unsubscribe function.
   */
  onExit(listener: (error?: Error) => void): () => void;
}

export interface WorkerSpawner {
  spawn(params: SpawnParams): Promise<SpawnedWorker>;
}
