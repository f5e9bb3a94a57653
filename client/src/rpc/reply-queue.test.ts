import { describe, it, expect } from "vitest";
import type { Envelope } from "@enginebridge/core";
import { ReplyQueue } from "./reply-queue.js";

const reply = (payload: string, done = false): Envelope => ({ correlationId: "1", method: "chat", payload, done });

describe("ReplyQueue", () => {
  it("hands out buffered replies in arrival order", async () => {
    const queue = new ReplyQueue();
    queue.push(reply("a"));
    queue.push(reply("b"));
    expect(queue.size).toBe(2);

    expect((await queue.take()).payload).toBe("a");
    expect((await queue.take()).payload).toBe("b");
    expect(queue.size).toBe(0);
  });

  it("resolves a waiting take() on the next push", async () => {
    const queue = new ReplyQueue();
    const pending = queue.take();
    queue.push(reply("late", true));
    await expect(pending).resolves.toEqual(reply("late", true));
  });

  it("rejects pending and later takes once failed", async () => {
    const queue = new ReplyQueue();
    queue.push(reply("dropped"));
    const failure = new Error("closed");

    queue.fail(failure);
    queue.push(reply("ignored"));

    await expect(queue.take()).rejects.toBe(failure);
    expect(queue.failed).toBe(true);
    expect(queue.size).toBe(0);
  });

  it("rejects a waiting take() when failed", async () => {
    const queue = new ReplyQueue();
    const pending = queue.take();
    queue.fail(new Error("cancelled"));
    await expect(pending).rejects.toThrow("cancelled");
  });
});
