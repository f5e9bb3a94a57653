/**
 * Worker endpoint: owns the real engine's registry, listens on its receive
 * port, dispatches each request and replies over the proxy's port.
 *
 * The loop never waits on a call. Promises settle and streams produce on
 * their own schedule; each reply goes out as soon as it is ready, so calls
 * complete independently and only per-call reply order is preserved.
 */

import { MessageChannel, MessagePort } from "node:worker_threads";
import {
  CorrelatedSchema,
  EnvelopeSchema,
  bootstrapEnvelope,
  copyWith,
  describeError,
  formatIssues,
  isAsyncIterable,
  isBootstrap,
  isPromiseLike,
  resolveLogger,
  type Envelope,
  type Logger,
  type LoggerFactory,
} from "@enginebridge/core";
import type { MethodRegistry } from "./handler-registry.js";

const LOG_PREFIX = "enginebridge-worker:worker";

export interface WorkerEndpointParams {
  registry: MethodRegistry;
  loggerFactory?: LoggerFactory;
}

interface InFlightCall {
  cancelled: boolean;
  iterator?: AsyncIterator<unknown>;
}

export class WorkerEndpoint {
  private readonly registry: MethodRegistry;
  private readonly log: Logger;
  private proxyPort: MessagePort | null = null;
  private receivePort: MessagePort | null = null;
  private readonly inFlight = new Map<string, InFlightCall>();

  constructor(params: WorkerEndpointParams) {
    this.registry = params.registry;
    this.log = resolveLogger(params.loggerFactory, LOG_PREFIX);
  }

  /**
   * Bind to the proxy's port received at spawn time and answer the handshake.
   */
  attach(proxyPort: MessagePort): void {
    this.handshake(bootstrapEnvelope(proxyPort));
  }

  /**
   * Stop listening, cancel in-flight calls and close both ports.
   */
  close(): void {
    this.detach();
    this.log.info?.({}, `${LOG_PREFIX}:close - Worker endpoint closed`);
  }

  /** Number of calls still producing replies. */
  get pendingCount(): number {
    return this.inFlight.size;
  }

  get attached(): boolean {
    return this.proxyPort !== null;
  }

  // ── Handshake ─────────────────────────────────────────────────────

  private handshake(envelope: Envelope): void {
    const proxyPort = envelope.payload;
    if (!(proxyPort instanceof MessagePort)) {
      this.log.warn?.({}, `${LOG_PREFIX}:handshake - Bootstrap envelope carried no port, ignoring`);
      return;
    }

    const rebinding = this.attached;
    this.detach();

    const channel = new MessageChannel();
    channel.port1.on("message", this.onMessage);
    this.receivePort = channel.port1;
    this.proxyPort = proxyPort;

    this.send(copyWith(envelope, { payload: channel.port2 }), [channel.port2]);
    this.log.debug?.({ rebinding }, `${LOG_PREFIX}:handshake - Bootstrap reply sent`);
  }

  private detach(): void {
    for (const [correlationId, call] of this.inFlight) {
      this.abandon(correlationId, call);
    }
    this.inFlight.clear();
    if (this.receivePort) {
      this.receivePort.off("message", this.onMessage);
      this.receivePort.close();
      this.receivePort = null;
    }
    if (this.proxyPort) {
      this.proxyPort.close();
      this.proxyPort = null;
    }
  }

  // ── Dispatch ──────────────────────────────────────────────────────

  private readonly onMessage = (raw: unknown): void => {
    const parsed = EnvelopeSchema.safeParse(raw);
    if (!parsed.success) {
      this.rejectMalformed(raw, formatIssues(parsed.error));
      return;
    }

    const envelope: Envelope = parsed.data;
    if (isBootstrap(envelope)) {
      this.handshake(envelope);
      return;
    }
    if (envelope.cancel) {
      this.cancel(envelope.correlationId);
      return;
    }
    this.dispatch(envelope);
  };

  private rejectMalformed(raw: unknown, issues: string): void {
    const correlated = CorrelatedSchema.safeParse(raw);
    this.log.warn?.(
      { issues, correlationId: correlated.success ? correlated.data.correlationId : undefined },
      `${LOG_PREFIX}:onMessage - Invalid envelope`
    );
    if (correlated.success) {
      this.send({
        correlationId: correlated.data.correlationId,
        method: correlated.data.method,
        error: `Malformed envelope: ${issues}`,
        done: false,
      });
    }
  }

  private dispatch(envelope: Envelope): void {
    const method = this.registry.get(envelope.method);
    if (!method) {
      this.log.warn?.({ method: envelope.method }, `${LOG_PREFIX}:dispatch - Method not found`);
      this.send(copyWith(envelope, { error: `Method not found: ${envelope.method}` }));
      return;
    }

    this.log.debug?.(
      { method: envelope.method, correlationId: envelope.correlationId },
      `${LOG_PREFIX}:dispatch - Invocation received`
    );

    let result: unknown;
    try {
      result = method(envelope.payload);
    } catch (err) {
      this.fail(envelope, err);
      return;
    }

    if (isAsyncIterable(result)) {
      this.pump(envelope, result);
    } else if (isPromiseLike(result)) {
      this.settle(envelope, result);
    } else {
      this.send(copyWith(envelope, { payload: result, done: true }));
    }
  }

  /**
   * Reply once the pending result settles.
   */
  private settle(envelope: Envelope, pending: PromiseLike<unknown>): void {
    const call: InFlightCall = { cancelled: false };
    this.inFlight.set(envelope.correlationId, call);

    Promise.resolve(pending)
      .then(
        (value) => {
          this.finish(envelope.correlationId, call);
          if (!call.cancelled) this.send(copyWith(envelope, { payload: value, done: true }));
        },
        (err: unknown) => {
          this.finish(envelope.correlationId, call);
          if (!call.cancelled) this.fail(envelope, err);
        }
      )
      .catch((err: unknown) => {
        this.log.error?.(
          { method: envelope.method, error: describeError(err) },
          `${LOG_PREFIX}:settle - Reply failed`
        );
      });
  }

  /**
   * Forward each element of a stream, then a terminal `done` or `error` reply.
   */
  private pump(envelope: Envelope, source: AsyncIterable<unknown>): void {
    const iterator = source[Symbol.asyncIterator]();
    const call: InFlightCall = { cancelled: false, iterator };
    this.inFlight.set(envelope.correlationId, call);

    (async () => {
      try {
        for (;;) {
          const next = await iterator.next();
          if (call.cancelled) return;
          if (next.done) {
            this.send(copyWith(envelope, { done: true }));
            return;
          }
          if (!this.send(copyWith(envelope, { payload: next.value }))) {
            this.abandon(envelope.correlationId, call);
            return;
          }
        }
      } catch (err) {
        if (!call.cancelled) this.fail(envelope, err);
      } finally {
        this.finish(envelope.correlationId, call);
      }
    })().catch((err: unknown) => {
      this.log.error?.(
        { method: envelope.method, error: describeError(err) },
        `${LOG_PREFIX}:pump - Stream loop error`
      );
    });
  }

  // ── Cancellation ──────────────────────────────────────────────────

  private cancel(correlationId: string): void {
    const call = this.inFlight.get(correlationId);
    if (!call) {
      this.log.debug?.({ correlationId }, `${LOG_PREFIX}:cancel - No call in flight, ignoring`);
      return;
    }
    this.inFlight.delete(correlationId);
    this.abandon(correlationId, call);
    this.log.debug?.({ correlationId }, `${LOG_PREFIX}:cancel - Call cancelled`);
  }

  /**
   * Suppress further replies for a call and release its stream source.
   */
  private abandon(correlationId: string, call: InFlightCall): void {
    if (call.cancelled) return;
    call.cancelled = true;
    const iterator = call.iterator;
    if (!iterator?.return) return;
    Promise.resolve(iterator.return()).catch((err: unknown) => {
      this.log.warn?.(
        { correlationId, error: describeError(err) },
        `${LOG_PREFIX}:abandon - Stream source failed to close`
      );
    });
  }

  private finish(correlationId: string, call: InFlightCall): void {
    if (this.inFlight.get(correlationId) === call) {
      this.inFlight.delete(correlationId);
    }
  }

  // ── Replies ───────────────────────────────────────────────────────

  private fail(envelope: Envelope, err: unknown): void {
    const message = describeError(err);
    this.log.error?.(
      { method: envelope.method, correlationId: envelope.correlationId, error: message },
      `${LOG_PREFIX}:fail - Invocation failed`
    );
    this.send(copyWith(envelope, { error: message }));
  }

  /**
   * Post a reply. A reply that cannot be cloned is replaced by an error reply
   * for the same call; returns false in that case.
   */
  private send(envelope: Envelope, transfer: MessagePort[] = []): boolean {
    const port = this.proxyPort;
    if (!port) {
      this.log.warn?.(
        { correlationId: envelope.correlationId },
        `${LOG_PREFIX}:send - No proxy port bound, dropping reply`
      );
      return false;
    }
    try {
      port.postMessage(envelope, transfer);
      return true;
    } catch (err) {
      const reason = describeError(err);
      this.log.error?.(
        { method: envelope.method, correlationId: envelope.correlationId, error: reason },
        `${LOG_PREFIX}:send - Reply could not be posted`
      );
      if (envelope.error === undefined) {
        this.send(copyWith(envelope, { error: `Reply could not be transferred: ${reason}` }));
      }
      return false;
    }
  }
}
