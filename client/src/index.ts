/**
 * @enginebridge/client
 *
 * Proxy side of enginebridge: the engine proxy, its RPC client and the
 * transport that spawns and binds the worker.
 */

// Engine proxy
export { EngineProxy, type EngineProxyOptions } from "./engine-proxy.js";

// Config
export {
  type EngineProxyConfig,
  defaultEngineProxyConfig,
  loadEngineProxyConfig,
} from "./config.js";

// RPC
export {
  RpcClient,
  type RpcChannel,
  type RpcClientParams,
  type CallOptions,
} from "./rpc/rpc-client.js";
export { ReplyQueue } from "./rpc/reply-queue.js";

// Transport
export {
  EnvelopeReceiver,
  type EnvelopeListener,
  type EnvelopeFilter,
} from "./transport/receiver.js";
export {
  ServiceHandle,
  connect,
  type ServiceHandleParams,
  type ConnectParams,
} from "./transport/service-handle.js";
export { createThreadSpawner, type ThreadSpawnerParams } from "./transport/thread-spawner.js";
