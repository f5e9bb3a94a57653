/**
 * Thread spawner tests with minimal worker scripts loaded from data: URLs.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import type { Envelope, Logger, LoggerProvider } from "@enginebridge/core";
import { connect, type ServiceHandle } from "./service-handle.js";
import { createThreadSpawner } from "./thread-spawner.js";

const silentLogger: Logger & LoggerProvider = {
  get: () => silentLogger,
  info: vi.fn(),
  debug: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};

const script = (source: string) => new URL(`data:text/javascript,${encodeURIComponent(source)}`);

// Answers the bootstrap, then replies "pong" plus the engine module name to every request.
const echoWorker = script(`
import { MessageChannel, workerData } from "node:worker_threads";
const { proxyPort, engineModule } = workerData;
const channel = new MessageChannel();
channel.port1.on("message", (request) => {
  proxyPort.postMessage({ correlationId: request.correlationId, method: request.method, payload: ["pong", engineModule], done: true });
});
proxyPort.postMessage({ correlationId: "bootstrap", method: "$bootstrap", payload: channel.port2, done: false }, [channel.port2]);
`);

const crashingWorker = script(`process.exit(3);`);

const handles: ServiceHandle[] = [];

afterEach(async () => {
  for (const handle of handles.splice(0)) await handle.close();
});

describe("createThreadSpawner", () => {
  it("hands the proxy port and engine module to a worker thread", async () => {
    const handle = await connect({
      spawner: createThreadSpawner({ entry: echoWorker, engineModule: "./engine.js", loggerFactory: silentLogger }),
      handshakeTimeoutMs: 5_000,
      loggerFactory: silentLogger,
    });
    handles.push(handle);

    const reply = new Promise<Envelope>((resolve) => {
      handle.receiver.subscribe(resolve);
    });
    handle.send({ correlationId: "1", method: "ping", done: false });

    await expect(reply).resolves.toMatchObject({ correlationId: "1", payload: ["pong", "./engine.js"], done: true });
  });

  it("reports a thread that exits before the handshake", async () => {
    const spawner = createThreadSpawner({ entry: crashingWorker, loggerFactory: silentLogger });

    await expect(connect({ spawner, handshakeTimeoutMs: 5_000, loggerFactory: silentLogger })).rejects.toMatchObject({
      code: "HANDSHAKE_FAILED",
      message: "Worker exited before the handshake completed: Worker exited with code 3",
    });
  });
});
