/**
 * Zod runtime schema for Envelope.
 *
 * Mirrors the TypeScript interface in envelope.ts and validates every message
 * read off a port, on both the proxy and the worker side.
 *
 * @see envelope.ts for the canonical TypeScript interface.
 */

import { z } from "zod";

export const EnvelopeSchema = z.object({
  correlationId: z.string().min(1),
  method: z.string(),
  payload: z.unknown(),
  error: z.string().optional(),
  done: z.boolean(),
  cancel: z.boolean().optional(),
});

/**
 * Minimal shape used to answer a malformed envelope when its correlation id
 * can still be recovered.
 */
export const CorrelatedSchema = z.object({
  correlationId: z.string().min(1),
  method: z.string().catch(""),
});

/**
 * One-line rendering of zod issues, e.g. `topK: Expected number, received string`.
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}
