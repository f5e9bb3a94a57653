/**
 * EngineProxy: the inference engine as seen from the caller's thread.
 *
 * Implements the same `InferenceEngine` interface as the real engine; every
 * method sends a request to the worker and decodes the reply against the
 * contract. `init()` spawns the worker and performs the handshake (or repeats
 * it when already connected) before initializing the remote runtime.
 */

import {
  BridgeError,
  CorrelationCounter,
  engineContract,
  formatIssues,
  resolveLogger,
  type GenerationParam,
  type InferenceEngine,
  type InitParam,
  type InitRuntimeParam,
  type Logger,
  type LoggerFactory,
  type OperationArgs,
  type OperationResult,
  type PenaltyParam,
  type SamplerParam,
  type SimilarityParam,
  type SingleOperation,
  type StreamOperation,
  type TextGenerationState,
  type WorkerSpawner,
} from "@enginebridge/core";
import { defaultEngineProxyConfig, type EngineProxyConfig } from "./config.js";
import { RpcClient, type CallOptions } from "./rpc/rpc-client.js";
import { connect, type ServiceHandle } from "./transport/service-handle.js";

const SERVICE_NAME = "enginebridge-client:engine-proxy";

export interface EngineProxyOptions {
  spawner: WorkerSpawner;
  config?: Partial<EngineProxyConfig>;
  loggerFactory?: LoggerFactory;
}

export class EngineProxy implements InferenceEngine {
  private spawner: WorkerSpawner;
  private config: EngineProxyConfig;
  private loggerFactory?: LoggerFactory;
  private log: Logger;

  private handle?: ServiceHandle;
  private rpc?: RpcClient;
  private binding?: Promise<void>;
  private counter = new CorrelationCounter();
  private stopWatchingExit?: () => void;
  private disposed = false;

  constructor(options: EngineProxyOptions) {
    this.spawner = options.spawner;
    this.config = { ...defaultEngineProxyConfig, ...options.config };
    this.loggerFactory = options.loggerFactory;
    this.log = resolveLogger(options.loggerFactory, SERVICE_NAME);
  }

  /**
   * Connect to the worker (spawning it on first use, repeating the handshake
   * afterwards) and initialize the remote runtime. Calls still pending on a
   * previous binding fail with CLOSED. Overlapping calls share one binding.
   */
  async init(param: InitParam): Promise<void> {
    if (this.disposed) {
      throw new BridgeError({ code: "CLOSED", message: "Engine proxy disposed" });
    }
    if (!this.binding) {
      this.binding = this.bind().finally(() => {
        this.binding = undefined;
      });
    }
    await this.binding;
    await this.single("init", param);
    this.log.info?.({ logLevel: param.logLevel }, `${SERVICE_NAME}:init - Engine initialized`);
  }

  async initRuntime(param: InitRuntimeParam): Promise<void> {
    await this.single("initRuntime", param);
  }

  async loadEmbedding(path: string): Promise<void> {
    await this.single("loadEmbedding", path);
  }

  embed(text: string, options?: CallOptions): Promise<number[]> {
    return this.single("embed", text, options);
  }

  similarity(param: SimilarityParam, options?: CallOptions): Promise<number> {
    return this.single("similarity", param, options);
  }

  async setSamplerParam(param: SamplerParam): Promise<void> {
    await this.single("setSamplerParam", param);
  }

  async setPenaltyParam(param: PenaltyParam): Promise<void> {
    await this.single("setPenaltyParam", param);
  }

  async setGenerationParam(param: GenerationParam): Promise<void> {
    await this.single("setGenerationParam", param);
  }

  /** Generated fragments for a prompt. Breaking out of the loop stops generation on the worker. */
  completion(prompt: string, options?: CallOptions): AsyncIterable<string> {
    return this.streaming("completion", prompt, options);
  }

  chat(history: string[], options?: CallOptions): AsyncIterable<string> {
    return this.streaming("chat", history, options);
  }

  getGenerationState(): Promise<TextGenerationState> {
    return this.single("getGenerationState", undefined);
  }

  async setImage(path: string): Promise<void> {
    await this.single("setImage", path);
  }

  async setAudio(path: string): Promise<void> {
    await this.single("setAudio", path);
  }

  async clearState(): Promise<void> {
    await this.single("clearState", undefined);
  }

  async stop(): Promise<void> {
    await this.single("stop", undefined);
  }

  /**
   * The RPC client of the current binding. Throws NOT_INITIALIZED before init().
   */
  get client(): RpcClient {
    if (!this.rpc) {
      throw new BridgeError({ code: "NOT_INITIALIZED", message: "Engine proxy used before init()" });
    }
    return this.rpc;
  }

  get connected(): boolean {
    return this.handle !== undefined && this.rpc !== undefined && !this.rpc.closed;
  }

  /**
   * Fail pending calls, close the ports and terminate the worker.
   */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    this.stopWatchingExit?.();
    this.stopWatchingExit = undefined;
    this.rpc?.close("Engine proxy disposed");

    const handle = this.handle;
    this.handle = undefined;
    if (handle) await handle.close();
    this.log.info?.({}, `${SERVICE_NAME}:dispose - Disposed`);
  }

  // ── Internals ─────────────────────────────────────────────────────

  private async bind(): Promise<void> {
    const previous = this.handle;
    if (previous && !previous.isReleased) {
      // A failed re-handshake leaves the current client in place.
      await previous.rebind(this.config.handshakeTimeoutMs);
      this.rpc?.close("Connection re-established; call abandoned");
      this.rpc = this.createClient(previous);
      return;
    }

    const handle = await connect({
      spawner: this.spawner,
      handshakeTimeoutMs: this.config.handshakeTimeoutMs,
      loggerFactory: this.loggerFactory,
    });
    if (this.disposed) {
      await handle.close();
      throw new BridgeError({ code: "CLOSED", message: "Engine proxy disposed" });
    }
    this.handle = handle;
    this.rpc = this.createClient(handle);
    this.stopWatchingExit = handle.worker.onExit((error) => this.onWorkerExit(handle, error));
  }

  private createClient(handle: ServiceHandle): RpcClient {
    return new RpcClient({
      channel: handle,
      maxInFlight: this.config.maxInFlight,
      counter: this.counter,
      loggerFactory: this.loggerFactory,
    });
  }

  private onWorkerExit(handle: ServiceHandle, error?: Error): void {
    if (this.handle !== handle) return;
    this.log.error?.({ error: error?.message }, `${SERVICE_NAME}:onWorkerExit - Worker exited`);
    this.stopWatchingExit = undefined;
    this.rpc?.close(error ? `Worker exited: ${error.message}` : "Worker exited");
    handle.release();
  }

  private async single<Op extends SingleOperation>(
    op: Op,
    arg: OperationArgs<Op>,
    options?: CallOptions
  ): Promise<OperationResult<Op>> {
    const reply = await this.client.request(op, arg, options);
    const decoded = engineContract[op].result.safeParse(reply);
    if (!decoded.success) {
      throw new BridgeError({
        code: "INVALID_REPLY",
        message: `Invalid reply for ${op}: ${formatIssues(decoded.error)}`,
        details: decoded.error.flatten(),
      });
    }
    return decoded.data;
  }

  private async *streaming<Op extends StreamOperation>(
    op: Op,
    arg: OperationArgs<Op>,
    options?: CallOptions
  ): AsyncGenerator<OperationResult<Op>, void, undefined> {
    const { result } = engineContract[op];
    for await (const element of this.client.stream(op, arg, options)) {
      const decoded = result.safeParse(element);
      if (!decoded.success) {
        throw new BridgeError({
          code: "INVALID_REPLY",
          message: `Invalid reply for ${op}: ${formatIssues(decoded.error)}`,
          details: decoded.error.flatten(),
        });
      }
      yield decoded.data;
    }
  }
}
