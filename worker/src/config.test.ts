import { describe, it, expect, vi } from "vitest";
import type { Logger } from "@enginebridge/core";
import { defaultWorkerProcessConfig, loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("reads the environment", () => {
    const config = loadConfig({
      env: { LOG_LEVEL: "DEBUG", SERVICE_NAME: "rwkv-worker", ENGINE_MODULE: "./engine.js" },
    });
    expect(config).toEqual({ logLevel: "debug", serviceName: "rwkv-worker", engineModule: "./engine.js" });
  });

  it("uses defaults when nothing is set", () => {
    expect(loadConfig({ env: {} })).toEqual({ logLevel: "info", serviceName: "enginebridge-worker" });
  });

  it("logs an invalid environment and falls back to the defaults", () => {
    const log: Logger = { warn: vi.fn() };
    const config = loadConfig({ env: { LOG_LEVEL: "loud", SERVICE_NAME: "rwkv-worker" }, loggerFactory: log });

    expect(config).toEqual(defaultWorkerProcessConfig);
    expect(log.warn).toHaveBeenCalledTimes(1);
  });
});
