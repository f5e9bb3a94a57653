/**
 * Receive side of a transport channel.
 *
 * Listens on one MessagePort, validates every incoming envelope and hands it
 * to the subscribers whose filter accepts it. Invalid messages are logged and
 * dropped.
 */

import type { MessagePort } from "node:worker_threads";
import {
  EnvelopeSchema,
  describeError,
  formatIssues,
  resolveLogger,
  type Envelope,
  type Logger,
  type LoggerFactory,
} from "@enginebridge/core";

const LOG_PREFIX = "enginebridge-client:receiver";

export type EnvelopeListener = (envelope: Envelope) => void;
export type EnvelopeFilter = (envelope: Envelope) => boolean;

interface Subscriber {
  listener: EnvelopeListener;
  filter?: EnvelopeFilter;
}

export class EnvelopeReceiver {
  private port: MessagePort;
  private subscribers = new Set<Subscriber>();
  private log: Logger;
  private open = true;

  constructor(port: MessagePort, params: { loggerFactory?: LoggerFactory } = {}) {
    this.port = port;
    this.log = resolveLogger(params.loggerFactory, LOG_PREFIX);
    this.port.on("message", this.onMessage);
  }

  /**
   * Deliver envelopes accepted by `filter` (all of them when omitted) to
   * `listener`. Returns an unsubscribe function.
   */
  subscribe(listener: EnvelopeListener, filter?: EnvelopeFilter): () => void {
    const subscriber: Subscriber = { listener, filter };
    this.subscribers.add(subscriber);
    return () => {
      this.subscribers.delete(subscriber);
    };
  }

  get closed(): boolean {
    return !this.open;
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  /**
   * Stop listening and close the port. Subscribers receive nothing further.
   */
  close(): void {
    if (!this.open) return;
    this.open = false;
    this.port.off("message", this.onMessage);
    this.port.close();
    this.subscribers.clear();
  }

  private readonly onMessage = (raw: unknown): void => {
    const parsed = EnvelopeSchema.safeParse(raw);
    if (!parsed.success) {
      this.log.warn?.({ issues: formatIssues(parsed.error) }, `${LOG_PREFIX}:onMessage - Invalid envelope dropped`);
      return;
    }

    const envelope: Envelope = parsed.data;
    let delivered = false;
    for (const subscriber of [...this.subscribers]) {
      if (subscriber.filter && !subscriber.filter(envelope)) continue;
      delivered = true;
      try {
        subscriber.listener(envelope);
      } catch (err) {
        this.log.error?.(
          { correlationId: envelope.correlationId, error: describeError(err) },
          `${LOG_PREFIX}:onMessage - Subscriber failed`
        );
      }
    }

    if (!delivered) {
      this.log.debug?.(
        { correlationId: envelope.correlationId, method: envelope.method },
        `${LOG_PREFIX}:onMessage - No subscriber for envelope`
      );
    }
  };
}
