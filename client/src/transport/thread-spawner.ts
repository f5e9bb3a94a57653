/**
 * Spawns the worker endpoint on a separate thread (`node:worker_threads`).
 *
 * The proxy's send port travels in workerData and is transferred with it; the
 * entry module answers the bootstrap (see @enginebridge/worker `workerEntry`).
 */

import { Worker } from "node:worker_threads";
import {
  BridgeError,
  describeError,
  resolveLogger,
  type LoggerFactory,
  type SpawnParams,
  type SpawnedWorker,
  type WorkerSpawner,
} from "@enginebridge/core";

const LOG_PREFIX = "enginebridge-client:thread-spawner";

export interface ThreadSpawnerParams {
  /** Worker entry module, e.g. @enginebridge/worker `workerEntry` */
  entry: URL | string;
  /** Module exporting createEngine(), passed to the entry as workerData */
  engineModule?: string;
  /** Node flags for the worker thread (`workerExecArgv` for the TypeScript entry) */
  execArgv?: readonly string[];
  loggerFactory?: LoggerFactory;
}

export function createThreadSpawner(params: ThreadSpawnerParams): WorkerSpawner {
  const log = resolveLogger(params.loggerFactory, LOG_PREFIX);

  return {
    async spawn({ proxyPort }: SpawnParams): Promise<SpawnedWorker> {
      let worker: Worker;
      try {
        worker = new Worker(params.entry, {
          workerData: { proxyPort, engineModule: params.engineModule },
          transferList: [proxyPort],
          execArgv: params.execArgv ? [...params.execArgv] : undefined,
        });
      } catch (err) {
        throw new BridgeError({
          code: "HANDSHAKE_FAILED",
          message: `Worker thread could not be started: ${describeError(err)}`,
          cause: err,
        });
      }

      const listeners = new Set<(error?: Error) => void>();
      let exited = false;
      let exitError: Error | undefined;
      let terminating = false;

      const end = (error?: Error): void => {
        if (exited) return;
        exited = true;
        exitError = error;
        if (terminating) return;
        log.warn?.(
          { threadId: worker.threadId, error: error ? describeError(error) : undefined },
          `${LOG_PREFIX}:spawn - Worker thread ended`
        );
        for (const listener of [...listeners]) listener(error);
        listeners.clear();
      };

      worker.on("error", (err) => end(err));
      worker.on("exit", (code) => end(code === 0 ? undefined : new Error(`Worker exited with code ${code}`)));

      log.debug?.({ threadId: worker.threadId }, `${LOG_PREFIX}:spawn - Worker thread started`);

      return {
        async terminate(): Promise<void> {
          if (exited) return;
          terminating = true;
          await worker.terminate();
        },
        onExit(listener: (error?: Error) => void): () => void {
          if (exited && !terminating) {
            queueMicrotask(() => listener(exitError));
            return () => undefined;
          }
          listeners.add(listener);
          return () => {
            listeners.delete(listener);
          };
        },
      };
    },
  };
}
