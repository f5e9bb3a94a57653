/**
 * Service contract shared by the real engine, the worker registry and the proxy.
 *
 * `EngineOperations` declares every operation's argument, result and call
 * kind; `engineContract` attaches the runtime schemas, typed against those
 * declarations so a schema that drifts from its operation fails to compile.
 * The worker builds its registry from `OPERATIONS`; the proxy encodes requests
 * with the same identifiers.
 */

import { z } from "zod";
import {
  GenerationParamSchema,
  InitParamSchema,
  InitRuntimeParamSchema,
  PenaltyParamSchema,
  SamplerParamSchema,
  SimilarityParamSchema,
  TextGenerationStateSchema,
  type GenerationParam,
  type InitParam,
  type InitRuntimeParam,
  type PenaltyParam,
  type SamplerParam,
  type SimilarityParam,
  type TextGenerationState,
} from "./engine.js";

export interface EngineOperations {
  init: { kind: "single"; args: InitParam; result: void };
  initRuntime: { kind: "single"; args: InitRuntimeParam; result: void };
  loadEmbedding: { kind: "single"; args: string; result: void };
  embed: { kind: "single"; args: string; result: number[] };
  similarity: { kind: "single"; args: SimilarityParam; result: number };
  setSamplerParam: { kind: "single"; args: SamplerParam; result: void };
  setPenaltyParam: { kind: "single"; args: PenaltyParam; result: void };
  setGenerationParam: { kind: "single"; args: GenerationParam; result: void };
  completion: { kind: "stream"; args: string; result: string };
  chat: { kind: "stream"; args: string[]; result: string };
  getGenerationState: { kind: "single"; args: undefined; result: TextGenerationState };
  setImage: { kind: "single"; args: string; result: void };
  setAudio: { kind: "single"; args: string; result: void };
  clearState: { kind: "single"; args: undefined; result: void };
  stop: { kind: "single"; args: undefined; result: void };
}

export type Operation = keyof EngineOperations;
export type OperationArgs<Op extends Operation> = EngineOperations[Op]["args"];
/** Result of a single operation, or one element of a streaming operation. */
export type OperationResult<Op extends Operation> = EngineOperations[Op]["result"];

export type StreamOperation = {
  [Op in Operation]: EngineOperations[Op]["kind"] extends "stream" ? Op : never;
}[Operation];
export type SingleOperation = Exclude<Operation, StreamOperation>;

export interface OperationSpec<Op extends Operation> {
  readonly kind: EngineOperations[Op]["kind"];
  readonly args: z.ZodType<OperationArgs<Op>, z.ZodTypeDef, unknown>;
  readonly result: z.ZodType<OperationResult<Op>, z.ZodTypeDef, unknown>;
}

export type EngineContract = { readonly [Op in Operation]: OperationSpec<Op> };

const noArgument = z.undefined();
// Results of command-style operations are ignored rather than checked.
const noResult = z.unknown().transform((): void => undefined);
const filePath = z.string().min(1);

export const engineContract: EngineContract = {
  init: { kind: "single", args: InitParamSchema, result: noResult },
  initRuntime: { kind: "single", args: InitRuntimeParamSchema, result: noResult },
  loadEmbedding: { kind: "single", args: filePath, result: noResult },
  embed: { kind: "single", args: z.string(), result: z.array(z.number()) },
  similarity: { kind: "single", args: SimilarityParamSchema, result: z.number() },
  setSamplerParam: { kind: "single", args: SamplerParamSchema, result: noResult },
  setPenaltyParam: { kind: "single", args: PenaltyParamSchema, result: noResult },
  setGenerationParam: { kind: "single", args: GenerationParamSchema, result: noResult },
  completion: { kind: "stream", args: z.string(), result: z.string() },
  chat: { kind: "stream", args: z.array(z.string()), result: z.string() },
  getGenerationState: { kind: "single", args: noArgument, result: TextGenerationStateSchema },
  setImage: { kind: "single", args: filePath, result: noResult },
  setAudio: { kind: "single", args: filePath, result: noResult },
  clearState: { kind: "single", args: noArgument, result: noResult },
  stop: { kind: "single", args: noArgument, result: noResult },
};

/** Closed list of operation identifiers, in contract order. */
export const OPERATIONS: readonly Operation[] = [
  "init",
  "initRuntime",
  "loadEmbedding",
  "embed",
  "similarity",
  "setSamplerParam",
  "setPenaltyParam",
  "setGenerationParam",
  "completion",
  "chat",
  "getGenerationState",
  "setImage",
  "setAudio",
  "clearState",
  "stop",
];

export function isOperation(method: string): method is Operation {
  return OPERATIONS.some((op) => op === method);
}

// ── Engine interface ────────────────────────────────────────────────

type MethodShape<Op extends Operation> = EngineOperations[Op]["kind"] extends "stream"
  ? (arg: OperationArgs<Op>) => AsyncIterable<OperationResult<Op>>
  : (arg: OperationArgs<Op>) => Promise<OperationResult<Op>>;

type ContractMethods = { [Op in Operation]: MethodShape<Op> };

/**
 * Per-operation callables as the worker invokes them. Any InferenceEngine is
 * assignable to this shape.
 */
export type OperationHandlers = { [Op in Operation]: (arg: OperationArgs<Op>) => unknown };

/**
 * The inference engine contract. Implemented by the real engine (hosted on
 * the worker) and by the proxy, so call sites cannot tell the two apart.
 */
export interface InferenceEngine extends ContractMethods {
  /** Initialize the native runtime. Call before anything else. */
  init(param: InitParam): Promise<void>;
  /** Load the model and tokenizer on a backend. */
  initRuntime(param: InitRuntimeParam): Promise<void>;
  loadEmbedding(path: string): Promise<void>;
  embed(text: string): Promise<number[]>;
  similarity(param: SimilarityParam): Promise<number>;
  setSamplerParam(param: SamplerParam): Promise<void>;
  setPenaltyParam(param: PenaltyParam): Promise<void>;
  setGenerationParam(param: GenerationParam): Promise<void>;
  completion(prompt: string): AsyncIterable<string>;
  chat(history: string[]): AsyncIterable<string>;
  getGenerationState(): Promise<TextGenerationState>;
  setImage(path: string): Promise<void>;
  setAudio(path: string): Promise<void>;
  /** Clear the runtime's conversation state. */
  clearState(): Promise<void>;
  stop(): Promise<void>;
}

/**
 * Runtime check that a value exposes every contract operation as a function.
 */
export function isInferenceEngine(value: unknown): value is InferenceEngine {
  if (typeof value !== "object" || value === null) return false;
  return OPERATIONS.every((op) => typeof Reflect.get(value, op) === "function");
}
