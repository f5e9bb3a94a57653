/**
 * Message envelope: the unit that crosses the port between proxy and worker.
 *
 * One request envelope is sent per call. The worker answers with zero or more
 * reply envelopes carrying the same correlation id, the last of which is
 * terminal (`done` or `error`). Routing only ever looks at `correlationId`.
 */

import type { MessagePort } from "node:worker_threads";

/** Correlation id reserved for the bootstrap handshake. */
export const BOOTSTRAP_CORRELATION_ID = "bootstrap";

/** Method name carried by bootstrap envelopes. */
export const BOOTSTRAP_METHOD = "$bootstrap";

// ── Envelope ────────────────────────────────────────────────────────

export interface Envelope<P = unknown> {
  /** Unique per outstanding call; shared by every reply of that call */
  correlationId: string;
  /** Operation identifier the envelope invokes or replies to */
  method: string;
  /** Call argument (request leg) or result element (reply leg) */
  payload?: P;
  /** Failure description; terminates the reply stream */
  error?: string;
  /** Marks the final envelope of a reply stream */
  done: boolean;
  /** Cancellation control envelope (proxy → worker) */
  cancel?: boolean;
}

/** Reply fields a worker stamps onto a request when answering it. */
export interface ReplyPatch<P = unknown> {
  payload?: P;
  error?: string;
  done?: boolean;
}

// ── Correlation ─────────────────────────────────────────────────────

/**
 * Monotonic correlation id source. Ids are unique for the lifetime of one
 * counter and never collide with the bootstrap sentinel.
 */
export class CorrelationCounter {
  private last = 0;

  next(): string {
    this.last += 1;
    return String(this.last);
  }

  /** Last id handed out ("0" before the first call). */
  get current(): string {
    return String(this.last);
  }
}

/**
 * Builds a request envelope with a fresh correlation id.
 */
export function createRequest<P>(
  counter: CorrelationCounter,
  method: string,
  payload?: P
): Envelope<P> {
  return {
    correlationId: counter.next(),
    method,
    payload,
    done: false,
  };
}

/**
 * Copies an envelope's identity (correlation id and method) onto a reply.
 * Reply fields come from the patch only; nothing of the request payload leaks
 * into the reply.
 */
export function copyWith<P>(envelope: Envelope<unknown>, patch: ReplyPatch<P>): Envelope<P> {
  return {
    correlationId: envelope.correlationId,
    method: envelope.method,
    payload: patch.payload,
    error: patch.error,
    done: patch.done ?? false,
  };
}

/**
 * Bootstrap envelope carrying a port the receiving side should send to.
 */
export function bootstrapEnvelope(port: MessagePort): Envelope<MessagePort> {
  return {
    correlationId: BOOTSTRAP_CORRELATION_ID,
    method: BOOTSTRAP_METHOD,
    payload: port,
    done: false,
  };
}

/**
 * Cancellation control envelope for an outstanding request.
 */
export function cancelEnvelope(request: Envelope<unknown>): Envelope<never> {
  return {
    correlationId: request.correlationId,
    method: request.method,
    done: false,
    cancel: true,
  };
}

export function isBootstrap(envelope: Envelope<unknown>): boolean {
  return envelope.correlationId === BOOTSTRAP_CORRELATION_ID;
}

/**
 * True for the envelope that ends a reply stream.
 */
export function isTerminal(envelope: Envelope<unknown>): boolean {
  return envelope.done || envelope.error !== undefined;
}
