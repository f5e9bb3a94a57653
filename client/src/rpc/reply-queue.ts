/**
 * Per-call reply buffer. The router pushes envelopes as they arrive; the
 * caller takes them one at a time, in arrival order.
 */

import type { Envelope } from "@enginebridge/core";

interface Waiter {
  resolve: (envelope: Envelope) => void;
  reject: (error: Error) => void;
}

export class ReplyQueue {
  private buffered: Envelope[] = [];
  private waiter?: Waiter;
  private failure?: Error;

  push(envelope: Envelope): void {
    if (this.failure) return;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter.resolve(envelope);
      return;
    }
    this.buffered.push(envelope);
  }

  /**
   * Fail the queue: a pending take() and every later one reject with `error`,
   * and buffered envelopes are discarded.
   */
  fail(error: Error): void {
    if (this.failure) return;
    this.failure = error;
    this.buffered = [];
    const waiter = this.waiter;
    this.waiter = undefined;
    waiter?.reject(error);
  }

  take(): Promise<Envelope> {
    if (this.failure) return Promise.reject(this.failure);
    const next = this.buffered.shift();
    if (next) return Promise.resolve(next);
    if (this.waiter) {
      return Promise.reject(new Error("ReplyQueue supports one pending take() at a time"));
    }
    return new Promise((resolve, reject) => {
      this.waiter = { resolve, reject };
    });
  }

  get size(): number {
    return this.buffered.length;
  }

  get failed(): boolean {
    return this.failure !== undefined;
  }
}
