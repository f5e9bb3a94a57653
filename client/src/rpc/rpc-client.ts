/**
 * RpcClient: proxy side of the call protocol.
 *
 * Turns calls into request envelopes with fresh correlation ids and routes
 * every reply to the call that owns its id. Single calls resolve with the
 * first reply; streams yield non-terminal replies until `done` or `error`.
 *
 * Calls are independent: a failing, cancelled or unanswered call never
 * affects another one.
 */

import {
  BridgeError,
  CorrelationCounter,
  cancelEnvelope,
  createRequest,
  describeError,
  isBootstrap,
  isTerminal,
  resolveLogger,
  type Envelope,
  type Logger,
  type LoggerFactory,
} from "@enginebridge/core";
import { defaultEngineProxyConfig } from "../config.js";
import type { EnvelopeReceiver } from "../transport/receiver.js";
import { ReplyQueue } from "./reply-queue.js";

const SERVICE_NAME = "enginebridge-client:rpc";

/** What the client needs from a binding: a way to send and a receiver. */
export interface RpcChannel {
  readonly receiver: EnvelopeReceiver;
  send(envelope: Envelope): void;
}

export interface RpcClientParams {
  channel: RpcChannel;
  /** Maximum calls awaiting replies at once; 0 disables the bound. Default: 64 */
  maxInFlight?: number;
  /** Source of correlation ids; pass one to keep ids unique across clients */
  counter?: CorrelationCounter;
  loggerFactory?: LoggerFactory;
}

export interface CallOptions {
  /** Aborting cancels the call on the worker and rejects with CANCELLED */
  signal?: AbortSignal;
}

interface OpenCall {
  request: Envelope;
  queue: ReplyQueue;
}

function cancelledError(method: string, reason: unknown): BridgeError {
  return new BridgeError({
    code: "CANCELLED",
    message: `Call to ${method} was cancelled`,
    cause: reason,
  });
}

function remoteError(reply: Envelope): BridgeError {
  return new BridgeError({
    code: "REMOTE_ERROR",
    message: reply.error ?? "Unknown remote error",
    details: { method: reply.method, correlationId: reply.correlationId },
  });
}

export class RpcClient {
  private channel: RpcChannel;
  private maxInFlight: number;
  private log: Logger;
  private counter: CorrelationCounter;
  private routes = new Map<string, ReplyQueue>();
  private closedReason?: string;
  private unsubscribe: () => void;

  constructor(params: RpcClientParams) {
    this.channel = params.channel;
    this.maxInFlight = params.maxInFlight ?? defaultEngineProxyConfig.maxInFlight;
    this.counter = params.counter ?? new CorrelationCounter();
    this.log = resolveLogger(params.loggerFactory, SERVICE_NAME);
    this.unsubscribe = this.channel.receiver.subscribe(this.route, (envelope) => !isBootstrap(envelope));
  }

  /**
   * Invoke a single-result method. Resolves with the reply payload or rejects
   * with REMOTE_ERROR carrying the worker's description.
   */
  async request(method: string, payload?: unknown, options: CallOptions = {}): Promise<unknown> {
    const { signal } = options;
    if (signal?.aborted) throw cancelledError(method, signal.reason);

    const call = this.open(method, payload);
    const onAbort = (): void => {
      this.cancel(call);
      call.queue.fail(cancelledError(method, signal?.reason));
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const reply = await call.queue.take();
      if (reply.error !== undefined) throw remoteError(reply);
      if (!isTerminal(reply)) {
        // A stream answered a single call: keep the first element, stop the rest.
        this.cancel(call);
      }
      return reply.payload;
    } finally {
      signal?.removeEventListener("abort", onAbort);
      this.routes.delete(call.request.correlationId);
    }
  }

  /**
   * Invoke a streaming method. The request is sent on the first `next()`;
   * stopping early (`break`, `return`, abort) cancels the call on the worker.
   * Not restartable.
   */
  async *stream(method: string, payload?: unknown, options: CallOptions = {}): AsyncGenerator<unknown, void, undefined> {
    const { signal } = options;
    if (signal?.aborted) throw cancelledError(method, signal.reason);

    const call = this.open(method, payload);
    const onAbort = (): void => {
      call.queue.fail(cancelledError(method, signal?.reason));
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    let finished = false;
    try {
      for (;;) {
        const reply = await call.queue.take();
        if (reply.error !== undefined) {
          finished = true;
          throw remoteError(reply);
        }
        if (reply.done) {
          finished = true;
          return;
        }
        yield reply.payload;
      }
    } finally {
      signal?.removeEventListener("abort", onAbort);
      this.routes.delete(call.request.correlationId);
      if (!finished) this.cancel(call);
    }
  }

  /** Calls still awaiting replies. */
  get pendingCount(): number {
    return this.routes.size;
  }

  get closed(): boolean {
    return this.closedReason !== undefined;
  }

  /**
   * Stop routing replies and fail every pending call with CLOSED. Later
   * calls fail immediately.
   */
  close(reason = "RPC client closed"): void {
    if (this.closedReason !== undefined) return;
    this.closedReason = reason;
    this.unsubscribe();

    const error = new BridgeError({ code: "CLOSED", message: reason });
    for (const queue of this.routes.values()) queue.fail(error);
    this.routes.clear();
    this.log.info?.({ reason }, `${SERVICE_NAME}:close - Client closed`);
  }

  // ── Internals ─────────────────────────────────────────────────────

  private open(method: string, payload: unknown): OpenCall {
    if (this.closedReason !== undefined) {
      throw new BridgeError({ code: "CLOSED", message: this.closedReason });
    }
    if (this.maxInFlight > 0 && this.routes.size >= this.maxInFlight) {
      throw new BridgeError({
        code: "BUSY",
        message: `Too many calls in flight (limit ${this.maxInFlight})`,
        retryable: true,
        details: { method },
      });
    }

    const request = createRequest(this.counter, method, payload);
    const queue = new ReplyQueue();
    this.routes.set(request.correlationId, queue);

    try {
      this.channel.send(request);
    } catch (err) {
      this.routes.delete(request.correlationId);
      throw new BridgeError({
        code: "INVALID_ARGUMENT",
        message: `Arguments for ${method} could not be transferred: ${describeError(err)}`,
        cause: err,
      });
    }

    this.log.debug?.({ method, correlationId: request.correlationId }, `${SERVICE_NAME}:open - Request sent`);
    return { request, queue };
  }

  private cancel(call: OpenCall): void {
    if (this.closedReason !== undefined) return;
    try {
      this.channel.send(cancelEnvelope(call.request));
    } catch (err) {
      this.log.warn?.(
        { correlationId: call.request.correlationId, error: describeError(err) },
        `${SERVICE_NAME}:cancel - Cancellation could not be sent`
      );
    }
  }

  private readonly route = (envelope: Envelope): void => {
    const queue = this.routes.get(envelope.correlationId);
    if (!queue) {
      this.log.debug?.(
        { correlationId: envelope.correlationId, method: envelope.method },
        `${SERVICE_NAME}:route - Unroutable reply dropped`
      );
      return;
    }
    queue.push(envelope);
  };
}
