import { describe, it, expect } from "vitest";
import { OPERATIONS, engineContract, isInferenceEngine, isOperation } from "./contract.js";
import { initialGenerationState } from "./engine.js";

describe("engineContract", () => {
  it("lists exactly the operations it has schemas for", () => {
    expect([...OPERATIONS].sort()).toEqual(Object.keys(engineContract).sort());
    expect(new Set(OPERATIONS).size).toBe(15);
  });

  it("streams only completion and chat", () => {
    const streaming = OPERATIONS.filter((op) => engineContract[op].kind === "stream");
    expect(streaming).toEqual(["completion", "chat"]);
  });

  it("takes no argument for the state and control operations", () => {
    for (const op of ["getGenerationState", "clearState", "stop"] as const) {
      expect(engineContract[op].args.safeParse(undefined).success).toBe(true);
      expect(engineContract[op].args.safeParse("x").success).toBe(false);
    }
  });

  it("rejects an empty file path", () => {
    expect(engineContract.loadEmbedding.args.safeParse("").success).toBe(false);
    expect(engineContract.setImage.args.safeParse("/tmp/cat.png").success).toBe(true);
  });

  it("decodes command results to undefined", () => {
    const decoded = engineContract.init.result.safeParse({ ignored: true });
    expect(decoded.success).toBe(true);
    if (decoded.success) expect(decoded.data).toBeUndefined();
  });

  it("checks typed results", () => {
    expect(engineContract.embed.result.safeParse([0.1, 0.2]).success).toBe(true);
    expect(engineContract.embed.result.safeParse("0.1").success).toBe(false);
    expect(engineContract.getGenerationState.result.safeParse(initialGenerationState).success).toBe(true);
  });
});

describe("isOperation", () => {
  it("accepts contract identifiers only", () => {
    expect(isOperation("embed")).toBe(true);
    expect(isOperation("foo")).toBe(false);
    expect(isOperation("$bootstrap")).toBe(false);
  });
});

describe("isInferenceEngine", () => {
  const noop = (): undefined => undefined;

  it("requires every operation to be a function", () => {
    const complete = Object.fromEntries(OPERATIONS.map((op) => [op, noop]));
    expect(isInferenceEngine(complete)).toBe(true);

    const { chat: _chat, ...missingChat } = complete;
    expect(isInferenceEngine(missingChat)).toBe(false);
    expect(isInferenceEngine(null)).toBe(false);
    expect(isInferenceEngine({ ...complete, embed: "embed" })).toBe(false);
  });
});
