import { describe, it, expect } from "vitest";
import {
  BACKENDS,
  GenerationParamSchema,
  PenaltyParamSchema,
  SamplerParamSchema,
  ThinkingTokens,
  backendArgument,
  initialGenerationParam,
  initialPenaltyParam,
  initialSamplerParam,
  parseBackend,
} from "./engine.js";
import { BridgeError } from "./errors.js";

describe("parseBackend", () => {
  it.each([
    ["ncnn", "ncnn"],
    ["NCNN", "ncnn"],
    ["web-rwkv", "webRwkv"],
    ["WebRWKV", "webRwkv"],
    ["llama.cpp", "llamacpp"],
    ["LlamaCpp", "llamacpp"],
    ["qnn", "qnn"],
    ["mnn", "mnn"],
    ["CoreML", "coreml"],
  ])("parses %s as %s", (input, expected) => {
    expect(parseBackend(input)).toBe(expected);
  });

  it("does not treat plain rwkv as the web runtime", () => {
    expect(() => parseBackend("rwkv")).toThrow("Unknown backend: rwkv");
  });

  it("raises CONFIG_ERROR for unknown names", () => {
    try {
      parseBackend("tensorrt");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(BridgeError);
      if (err instanceof BridgeError) {
        expect(err.code).toBe("CONFIG_ERROR");
        expect(err.message).toBe("Unknown backend: tensorrt");
      }
    }
  });
});

describe("backendArgument", () => {
  it("maps every backend to its runtime argument", () => {
    expect(BACKENDS.map(backendArgument)).toEqual(["ncnn", "llama.cpp", "web-rwkv", "qnn", "mnn", "coreml"]);
  });
});

describe("initial parameters", () => {
  it("are valid records", () => {
    expect(SamplerParamSchema.safeParse(initialSamplerParam).success).toBe(true);
    expect(PenaltyParamSchema.safeParse(initialPenaltyParam).success).toBe(true);
    expect(GenerationParamSchema.safeParse(initialGenerationParam).success).toBe(true);
  });

  it("default generation to 2000 tokens on the thinking prompt", () => {
    expect(initialGenerationParam).toEqual({
      maxTokens: 2000,
      thinkingToken: "",
      chatReasoning: false,
      completionStopToken: 0,
      prompt: "<EOD>",
    });
  });

  it("are frozen", () => {
    expect(Object.isFrozen(initialSamplerParam)).toBe(true);
  });
});

describe("parameter ranges", () => {
  it("rejects a penalty decay outside 0.99-0.999", () => {
    expect(PenaltyParamSchema.safeParse({ ...initialPenaltyParam, penaltyDecay: 0.5 }).success).toBe(false);
  });

  it("rejects a fractional topK", () => {
    expect(SamplerParamSchema.safeParse({ ...initialSamplerParam, topK: 1.5 }).success).toBe(false);
  });
});

describe("ThinkingTokens", () => {
  it("keeps the light token's backslash sequence literal", () => {
    expect(ThinkingTokens.light).toBe("<think>\\n</think>");
  });
});
