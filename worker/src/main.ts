/**
 * Worker thread entry: loads config, creates the engine from the configured
 * module, builds the registry and answers the proxy's bootstrap.
 *
 * workerData: { proxyPort: MessagePort, engineModule?: string }
 */

import "dotenv/config";
import { MessagePort, isMainThread, workerData } from "node:worker_threads";
import { z } from "zod";
import { BridgeError, createNodeJSLogger } from "@enginebridge/core";
import { loadConfig } from "./config.js";
import { loadEngine } from "./engine-module.js";
import { createMethodRegistry } from "./handler-registry.js";
import { WorkerEndpoint } from "./worker.js";

const SERVICE_NAME = "enginebridge-worker";

const WorkerDataSchema = z.object({
  proxyPort: z.instanceof(MessagePort),
  engineModule: z.string().min(1).optional(),
});

async function main(): Promise<void> {
  if (isMainThread) {
    throw new BridgeError({
      code: "CONFIG_ERROR",
      message: `${SERVICE_NAME}:main - Must run inside a worker thread`,
    });
  }

  const config = loadConfig();
  const loggerFactory = createNodeJSLogger(config.serviceName, { level: config.logLevel });
  const log = loggerFactory.get(`${SERVICE_NAME}:main`);

  const data = WorkerDataSchema.parse(workerData);
  const engineModule = data.engineModule ?? config.engineModule;
  if (!engineModule) {
    throw new BridgeError({
      code: "CONFIG_ERROR",
      message: `${SERVICE_NAME}:main - No engine module (workerData.engineModule or ENGINE_MODULE)`,
    });
  }

  const engine = await loadEngine(engineModule);
  const endpoint = new WorkerEndpoint({
    registry: createMethodRegistry(engine),
    loggerFactory,
  });
  endpoint.attach(data.proxyPort);
  log.info?.({ engineModule }, `${SERVICE_NAME}:main - Started`);
}

main().catch((err) => {
  console.error(`${SERVICE_NAME}:main - Fatal:`, err);
  process.exit(1);
});
