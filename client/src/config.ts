/**
 * Engine proxy configuration.
 * Env: ENGINE_HANDSHAKE_TIMEOUT_MS, ENGINE_MAX_IN_FLIGHT.
 */

import { z } from "zod";
import { formatIssues, resolveLogger, type LoggerFactory } from "@enginebridge/core";

const LOG_PREFIX = "enginebridge-client:config";

export interface EngineProxyConfig {
  // ── Handshake ─────────────────────────────────────────────────────
  /** Time allowed for the worker's bootstrap reply. Default: 10000 */
  handshakeTimeoutMs: number;

  // ── Admission ─────────────────────────────────────────────────────
  /** Maximum calls awaiting replies at once; 0 disables the bound. Default: 64 */
  maxInFlight: number;
}

export const defaultEngineProxyConfig = {
  handshakeTimeoutMs: 10_000,
  maxInFlight: 64,
} as const satisfies EngineProxyConfig;

const ProxyEnvSchema = z.object({
  ENGINE_HANDSHAKE_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  ENGINE_MAX_IN_FLIGHT: z.coerce.number().int().nonnegative().optional(),
});

/**
 * Load proxy config from the environment. Each invalid variable is logged and
 * falls back to its default.
 */
export function loadEngineProxyConfig(
  params: { env?: NodeJS.ProcessEnv; loggerFactory?: LoggerFactory } = {}
): EngineProxyConfig {
  const log = resolveLogger(params.loggerFactory, LOG_PREFIX);
  const env = params.env ?? process.env;

  const read = (key: keyof typeof ProxyEnvSchema.shape): number | undefined => {
    const raw = env[key];
    if (raw === undefined || raw.trim() === "") return undefined;
    const parsed = ProxyEnvSchema.shape[key].safeParse(raw);
    if (!parsed.success) {
      log.warn?.(
        { variable: key, value: raw, issues: formatIssues(parsed.error) },
        `${LOG_PREFIX}:loadEngineProxyConfig - Invalid value ignored`
      );
      return undefined;
    }
    return parsed.data;
  };

  return {
    handshakeTimeoutMs: read("ENGINE_HANDSHAKE_TIMEOUT_MS") ?? defaultEngineProxyConfig.handshakeTimeoutMs,
    maxInFlight: read("ENGINE_MAX_IN_FLIGHT") ?? defaultEngineProxyConfig.maxInFlight,
  };
}
