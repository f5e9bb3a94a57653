/**
 * Parameter and state records exchanged with the inference engine.
 *
 * Each record is a plain object validated by a zod schema; the TypeScript
 * types are inferred from the schemas so both stay in step.
 */

import { z } from "zod";
import { BridgeError } from "./errors.js";

// ── Backend ─────────────────────────────────────────────────────────

export const BACKENDS = ["ncnn", "llamacpp", "webRwkv", "qnn", "mnn", "coreml"] as const;

/**
 * Inference backend.
 * - ncnn: small models on Android, Windows and Linux
 * - llamacpp: general llama-style runtime
 * - webRwkv: dedicated WebGPU runtime (iOS and macOS)
 * - qnn: Qualcomm neural network SDK
 * - mnn: alternate generic runtime
 * - coreml: Apple neural engine
 */
export type Backend = (typeof BACKENDS)[number];

export const BackendSchema = z.enum(BACKENDS);

const BACKEND_ARGUMENTS: Record<Backend, string> = {
  ncnn: "ncnn",
  llamacpp: "llama.cpp",
  webRwkv: "web-rwkv",
  qnn: "qnn",
  mnn: "mnn",
  coreml: "coreml",
};

/** Argument string the native runtime expects for a backend. */
export function backendArgument(backend: Backend): string {
  return BACKEND_ARGUMENTS[backend];
}

/**
 * Parses a free-form backend name (case-insensitive, substring match).
 * "web-rwkv", "WebRWKV" and "web_rwkv" all select webRwkv; "llama.cpp" selects llamacpp.
 */
export function parseBackend(value: string): Backend {
  const lower = value.toLowerCase();
  if (lower.includes("ncnn")) return "ncnn";
  if (lower.includes("web") && lower.includes("rwkv")) return "webRwkv";
  if (lower.includes("llama")) return "llamacpp";
  if (lower.includes("qnn")) return "qnn";
  if (lower.includes("mnn")) return "mnn";
  if (lower.includes("coreml")) return "coreml";
  throw new BridgeError({
    code: "CONFIG_ERROR",
    message: `Unknown backend: ${value}`,
    details: { value },
  });
}

// ── Init ────────────────────────────────────────────────────────────

export const EngineLogLevelSchema = z.enum(["debug", "info", "warning", "error"]);
export type EngineLogLevel = z.infer<typeof EngineLogLevelSchema>;

export const InitParamSchema = z.object({
  /** Directory holding the native runtime libraries */
  dynamicLibDir: z.string().optional(),
  /** Native runtime log level (engine default: debug) */
  logLevel: EngineLogLevelSchema.optional(),
});
export type InitParam = z.infer<typeof InitParamSchema>;

export const InitRuntimeParamSchema = z.object({
  modelPath: z.string().min(1),
  tokenizerPath: z.string().min(1),
  backend: BackendSchema,
});
export type InitRuntimeParam = z.infer<typeof InitRuntimeParamSchema>;

// ── Sampling & generation ───────────────────────────────────────────

export const SamplerParamSchema = z.object({
  temperature: z.number().min(0).max(3),
  topK: z.number().int().min(0).max(128),
  topP: z.number().min(0).max(1),
});
export type SamplerParam = z.infer<typeof SamplerParamSchema>;

export const PenaltyParamSchema = z.object({
  presencePenalty: z.number().min(0).max(2),
  frequencyPenalty: z.number().min(0).max(2),
  penaltyDecay: z.number().min(0.99).max(0.999),
});
export type PenaltyParam = z.infer<typeof PenaltyParamSchema>;

export const GenerationParamSchema = z.object({
  maxTokens: z.number().int().positive(),
  thinkingToken: z.string(),
  chatReasoning: z.boolean(),
  completionStopToken: z.number().int().nonnegative(),
  prompt: z.string(),
});
export type GenerationParam = z.infer<typeof GenerationParamSchema>;

export const SimilarityParamSchema = z.object({
  a: z.array(z.number()),
  b: z.array(z.number()),
});
export type SimilarityParam = z.infer<typeof SimilarityParamSchema>;

export const TextGenerationStateSchema = z.object({
  isGenerating: z.boolean(),
  prefillProgress: z.number(),
  prefillSpeed: z.number(),
  decodeSpeed: z.number(),
  timestamp: z.number(),
});
export type TextGenerationState = z.infer<typeof TextGenerationStateSchema>;

// ── Prompts ─────────────────────────────────────────────────────────

export const GenerationPrompts = {
  thinking: "<EOD>",
  noThinkingEn:
    "<EOD>User: hi\n\nAssistant: Hi. I am your assistant and I will provide expert full response in full details. Please feel free to ask any question and I will always answer it.\n\n",
  noThinkingZh:
    "<EOD>User: 你好\n\nAssistant: 你好，我是你的助手，我会提供专家级的完整回答。请随时提问，我会一直回答。\n\n",
} as const;

/** Tokens appended to a chat prompt to steer reasoning (kept verbatim, backslashes included). */
export const ThinkingTokens = {
  none: "",
  light: String.raw`<think>\n</think>`,
  free: "<think>",
  zh: "<think>嗯",
} as const;

// ── Initial values ──────────────────────────────────────────────────

export const initialSamplerParam: Readonly<SamplerParam> = Object.freeze({
  temperature: 1.0,
  topK: 1,
  topP: 0.5,
});

export const initialPenaltyParam: Readonly<PenaltyParam> = Object.freeze({
  presencePenalty: 0.5,
  frequencyPenalty: 0.5,
  penaltyDecay: 0.996,
});

export const initialGenerationParam: Readonly<GenerationParam> = Object.freeze({
  maxTokens: 2000,
  thinkingToken: ThinkingTokens.none,
  chatReasoning: false,
  completionStopToken: 0,
  prompt: GenerationPrompts.thinking,
});

export const initialGenerationState: Readonly<TextGenerationState> = Object.freeze({
  isGenerating: false,
  prefillProgress: 0,
  prefillSpeed: 0,
  decodeSpeed: 0,
  timestamp: 0,
});
