/**
 * Worker process configuration, read from the environment.
 * Env: LOG_LEVEL, SERVICE_NAME, ENGINE_MODULE.
 */

import { z } from "zod";
import { LOG_LEVELS, formatIssues, resolveLogger, type LogLevel, type LoggerFactory } from "@enginebridge/core";

const LOG_PREFIX = "enginebridge-worker:config";

export interface WorkerProcessConfig {
  /** Minimum level written by the worker's logger */
  logLevel: LogLevel;
  /** Service name stamped on every log line */
  serviceName: string;
  /** Module exporting createEngine(), when not given in workerData */
  engineModule?: string;
}

export const defaultWorkerProcessConfig = {
  logLevel: "info",
  serviceName: "enginebridge-worker",
} as const satisfies Omit<WorkerProcessConfig, "engineModule">;

const WorkerEnvSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  SERVICE_NAME: z.string().min(1).optional(),
  ENGINE_MODULE: z.string().min(1).optional(),
});

/**
 * Load config from the environment. An invalid environment is logged and the
 * defaults are used instead.
 */
export function loadConfig(
  params: { env?: NodeJS.ProcessEnv; loggerFactory?: LoggerFactory } = {}
): WorkerProcessConfig {
  const log = resolveLogger(params.loggerFactory, LOG_PREFIX);
  const env = params.env ?? process.env;

  const parsed = WorkerEnvSchema.safeParse({
    LOG_LEVEL: env.LOG_LEVEL?.toLowerCase(),
    SERVICE_NAME: env.SERVICE_NAME,
    ENGINE_MODULE: env.ENGINE_MODULE,
  });
  if (!parsed.success) {
    log.warn?.({ issues: formatIssues(parsed.error) }, `${LOG_PREFIX}:loadConfig - Invalid environment, using defaults`);
    return { ...defaultWorkerProcessConfig };
  }

  return {
    logLevel: parsed.data.LOG_LEVEL ?? defaultWorkerProcessConfig.logLevel,
    serviceName: parsed.data.SERVICE_NAME ?? defaultWorkerProcessConfig.serviceName,
    engineModule: parsed.data.ENGINE_MODULE,
  };
}
