// Envelope & correlation
export * from "./envelope.js";

// Envelope Zod schema (runtime validation)
export { EnvelopeSchema, CorrelatedSchema, formatIssues } from "./envelope-schema.js";

// Errors
export * from "./errors.js";

// Engine parameter records
export * from "./engine.js";

// Service contract
export * from "./contract.js";

// Spawning the worker side
export type { SpawnParams, SpawnedWorker, WorkerSpawner } from "./spawner.js";

// Logging
export * from "./logger.js";

// Utilities
export * from "./utils.js";
