/**
 * In-process spawner: hosts the worker endpoint on the calling thread.
 *
 * Messages still cross real MessageChannel ports (structured clone, async
 * delivery), so the protocol behaves as it does across threads; only the
 * engine's work shares the caller's event loop.
 */

import {
  BridgeError,
  describeError,
  isInferenceEngine,
  resolveLogger,
  type InferenceEngine,
  type LoggerFactory,
  type SpawnParams,
  type SpawnedWorker,
  type WorkerSpawner,
} from "@enginebridge/core";
import { createMethodRegistry } from "./handler-registry.js";
import { WorkerEndpoint } from "./worker.js";

const LOG_PREFIX = "enginebridge-worker:in-process";

export type EngineFactory = () => InferenceEngine | Promise<InferenceEngine>;

export interface InProcessSpawnerParams {
  createEngine: EngineFactory;
  loggerFactory?: LoggerFactory;
}

export function createInProcessSpawner(params: InProcessSpawnerParams): WorkerSpawner {
  const log = resolveLogger(params.loggerFactory, LOG_PREFIX);

  return {
    async spawn({ proxyPort }: SpawnParams): Promise<SpawnedWorker> {
      let engine: unknown;
      try {
        engine = await params.createEngine();
      } catch (err) {
        proxyPort.close();
        throw new BridgeError({
          code: "HANDSHAKE_FAILED",
          message: `Engine could not be created: ${describeError(err)}`,
          cause: err,
        });
      }
      if (!isInferenceEngine(engine)) {
        proxyPort.close();
        throw new BridgeError({
          code: "HANDSHAKE_FAILED",
          message: "Engine factory returned an object that does not implement the engine contract",
        });
      }

      const endpoint = new WorkerEndpoint({
        registry: createMethodRegistry(engine),
        loggerFactory: params.loggerFactory,
      });
      endpoint.attach(proxyPort);
      log.debug?.({}, `${LOG_PREFIX}:spawn - Worker endpoint started`);

      // Nothing runs outside the caller's control here, so the worker never exits on its own.
      return {
        async terminate(): Promise<void> {
          endpoint.close();
        },
        onExit(): () => void {
          return () => undefined;
        },
      };
    },
  };
}
