import { describe, it, expect } from "vitest";
import { MessageChannel } from "node:worker_threads";
import {
  BOOTSTRAP_CORRELATION_ID,
  BOOTSTRAP_METHOD,
  CorrelationCounter,
  bootstrapEnvelope,
  cancelEnvelope,
  copyWith,
  createRequest,
  isBootstrap,
  isTerminal,
} from "./envelope.js";
import { EnvelopeSchema, CorrelatedSchema, formatIssues } from "./envelope-schema.js";

describe("CorrelationCounter", () => {
  it("hands out increasing decimal ids starting at 1", () => {
    const counter = new CorrelationCounter();
    expect(counter.current).toBe("0");
    expect([counter.next(), counter.next(), counter.next()]).toEqual(["1", "2", "3"]);
    expect(counter.current).toBe("3");
  });

  it("never produces the bootstrap id", () => {
    const counter = new CorrelationCounter();
    const ids = new Set(Array.from({ length: 100 }, () => counter.next()));
    expect(ids.size).toBe(100);
    expect(ids.has(BOOTSTRAP_CORRELATION_ID)).toBe(false);
  });
});

describe("createRequest", () => {
  it("builds a non-terminal request with a fresh id", () => {
    const counter = new CorrelationCounter();
    expect(createRequest(counter, "embed", "hello")).toEqual({
      correlationId: "1",
      method: "embed",
      payload: "hello",
      done: false,
    });
    expect(createRequest(counter, "stop").correlationId).toBe("2");
  });
});

describe("copyWith", () => {
  const request = { correlationId: "7", method: "embed", payload: "hello", done: false };

  it("keeps id and method and takes reply fields from the patch", () => {
    expect(copyWith(request, { payload: [0.1, 0.2], done: true })).toEqual({
      correlationId: "7",
      method: "embed",
      payload: [0.1, 0.2],
      error: undefined,
      done: true,
    });
  });

  it("does not carry the request payload into an error reply", () => {
    const reply = copyWith(request, { error: "boom" });
    expect(reply.payload).toBeUndefined();
    expect(reply.error).toBe("boom");
    expect(reply.done).toBe(false);
  });
});

describe("control envelopes", () => {
  it("bootstrap envelopes use the reserved id and carry the port", () => {
    const { port1, port2 } = new MessageChannel();
    const envelope = bootstrapEnvelope(port1);
    expect(envelope.correlationId).toBe(BOOTSTRAP_CORRELATION_ID);
    expect(envelope.method).toBe(BOOTSTRAP_METHOD);
    expect(envelope.payload).toBe(port1);
    expect(isBootstrap(envelope)).toBe(true);
    port1.close();
    port2.close();
  });

  it("cancel envelopes target the request's id", () => {
    const request = createRequest(new CorrelationCounter(), "completion", "hi");
    expect(cancelEnvelope(request)).toEqual({
      correlationId: "1",
      method: "completion",
      done: false,
      cancel: true,
    });
  });

  it("isTerminal is true for done or error", () => {
    const base = { correlationId: "1", method: "chat" };
    expect(isTerminal({ ...base, done: false, payload: "a" })).toBe(false);
    expect(isTerminal({ ...base, done: true })).toBe(true);
    expect(isTerminal({ ...base, done: false, error: "x" })).toBe(true);
  });
});

describe("EnvelopeSchema", () => {
  it("accepts a reply envelope", () => {
    const parsed = EnvelopeSchema.safeParse({ correlationId: "1", method: "embed", payload: [1], done: true });
    expect(parsed.success).toBe(true);
  });

  it("rejects an envelope without done", () => {
    const parsed = EnvelopeSchema.safeParse({ correlationId: "1", method: "embed" });
    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(formatIssues(parsed.error)).toBe("done: Required");
    }
  });

  it("renders root issues", () => {
    const parsed = EnvelopeSchema.safeParse("not an envelope");
    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(formatIssues(parsed.error)).toBe("(root): Expected object, received string");
    }
  });

  it("recovers the correlation id of a malformed envelope", () => {
    const parsed = CorrelatedSchema.safeParse({ correlationId: "9", method: 42 });
    expect(parsed.success).toBe(true);
    if (parsed.success) {
      expect(parsed.data).toEqual({ correlationId: "9", method: "" });
    }
  });
});
