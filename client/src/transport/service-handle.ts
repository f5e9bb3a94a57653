/**
 * Service handle: the live binding from a proxy to one worker.
 *
 * Holds the worker's send port, the proxy's receiver and the spawned worker.
 * `connect()` spawns the worker and performs the bootstrap handshake;
 * `rebind()` repeats the handshake over the existing binding.
 */

import { MessageChannel, MessagePort } from "node:worker_threads";
import {
  BridgeError,
  bootstrapEnvelope,
  describeError,
  isBootstrap,
  isBridgeError,
  resolveLogger,
  type Envelope,
  type Logger,
  type LoggerFactory,
  type SpawnedWorker,
  type WorkerSpawner,
} from "@enginebridge/core";
import { EnvelopeReceiver } from "./receiver.js";

const LOG_PREFIX = "enginebridge-client:service-handle";

// ── Bootstrap wait ──────────────────────────────────────────────────

type HandshakeOutcome = { ok: true; port: MessagePort } | { ok: false; error: BridgeError };

interface BootstrapWait {
  /** Settles once with the worker's send port or the reason there is none; never rejects */
  outcome: Promise<HandshakeOutcome>;
  /** Fail the wait if the worker exits before replying */
  watch(worker: SpawnedWorker): void;
  /** Stop waiting without reporting anything */
  dispose(): void;
}

function awaitBootstrap(receiver: EnvelopeReceiver, timeoutMs: number): BootstrapWait {
  let settle: (outcome: HandshakeOutcome) => void = () => undefined;
  let stopWatching: () => void = () => undefined;
  let finished = false;

  const outcome = new Promise<HandshakeOutcome>((resolve) => {
    settle = resolve;
  });

  const finish = (result: HandshakeOutcome): void => {
    if (finished) return;
    finished = true;
    clearTimeout(timer);
    unsubscribe();
    stopWatching();
    settle(result);
  };

  const timer = setTimeout(() => {
    finish({
      ok: false,
      error: new BridgeError({
        code: "HANDSHAKE_TIMEOUT",
        message: `Worker did not answer the handshake within ${timeoutMs}ms`,
        retryable: true,
      }),
    });
  }, timeoutMs);

  const unsubscribe = receiver.subscribe((envelope) => {
    if (envelope.payload instanceof MessagePort) {
      finish({ ok: true, port: envelope.payload });
      return;
    }
    finish({
      ok: false,
      error: new BridgeError({ code: "HANDSHAKE_FAILED", message: "Bootstrap reply carried no port" }),
    });
  }, isBootstrap);

  return {
    outcome,
    watch(worker) {
      if (finished) return;
      stopWatching = worker.onExit((error) => {
        finish({
          ok: false,
          error: new BridgeError({
            code: "HANDSHAKE_FAILED",
            message: error
              ? `Worker exited before the handshake completed: ${describeError(error)}`
              : "Worker exited before the handshake completed",
            cause: error,
          }),
        });
      });
    },
    dispose() {
      if (finished) return;
      finished = true;
      clearTimeout(timer);
      unsubscribe();
      stopWatching();
    },
  };
}

// ── Handle ──────────────────────────────────────────────────────────

export interface ServiceHandleParams {
  sendPort: MessagePort;
  receiver: EnvelopeReceiver;
  worker: SpawnedWorker;
  loggerFactory?: LoggerFactory;
}

export class ServiceHandle {
  readonly worker: SpawnedWorker;
  private sendPort: MessagePort;
  private currentReceiver: EnvelopeReceiver;
  private loggerFactory?: LoggerFactory;
  private log: Logger;
  private released = false;

  constructor(params: ServiceHandleParams) {
    this.worker = params.worker;
    this.sendPort = params.sendPort;
    this.currentReceiver = params.receiver;
    this.loggerFactory = params.loggerFactory;
    this.log = resolveLogger(params.loggerFactory, LOG_PREFIX);
  }

  /** Receiver for the worker's replies on the current binding. */
  get receiver(): EnvelopeReceiver {
    return this.currentReceiver;
  }

  get isReleased(): boolean {
    return this.released;
  }

  /**
   * Post an envelope to the worker. Throws when the envelope cannot be
   * cloned, or CLOSED once the handle is released.
   */
  send(envelope: Envelope, transfer: MessagePort[] = []): void {
    if (this.released) {
      throw new BridgeError({ code: "CLOSED", message: "Service handle released" });
    }
    this.sendPort.postMessage(envelope, transfer);
  }

  /**
   * Repeat the handshake over the existing binding: send a new proxy port,
   * wait for the worker's new send port, then release the previous ports.
   * The worker abandons calls made on the previous binding.
   */
  async rebind(handshakeTimeoutMs: number): Promise<void> {
    const channel = new MessageChannel();
    const receiver = new EnvelopeReceiver(channel.port1, { loggerFactory: this.loggerFactory });
    const bootstrap = awaitBootstrap(receiver, handshakeTimeoutMs);
    bootstrap.watch(this.worker);

    try {
      this.send(bootstrapEnvelope(channel.port2), [channel.port2]);
    } catch (err) {
      bootstrap.dispose();
      receiver.close();
      channel.port2.close();
      throw new BridgeError({
        code: "HANDSHAKE_FAILED",
        message: `Bootstrap could not be sent: ${describeError(err)}`,
        cause: err,
      });
    }

    const outcome = await bootstrap.outcome;
    if (!outcome.ok) {
      receiver.close();
      throw outcome.error;
    }

    this.currentReceiver.close();
    this.sendPort.close();
    this.currentReceiver = receiver;
    this.sendPort = outcome.port;
    this.log.info?.({}, `${LOG_PREFIX}:rebind - Handshake repeated`);
  }

  /**
   * Close both ports. The worker keeps running.
   */
  release(): void {
    if (this.released) return;
    this.released = true;
    this.currentReceiver.close();
    this.sendPort.close();
  }

  /**
   * Release the ports and terminate the worker.
   */
  async close(): Promise<void> {
    this.release();
    await this.worker.terminate();
    this.log.info?.({}, `${LOG_PREFIX}:close - Worker terminated`);
  }
}

// ── Connect ─────────────────────────────────────────────────────────

export interface ConnectParams {
  spawner: WorkerSpawner;
  handshakeTimeoutMs: number;
  loggerFactory?: LoggerFactory;
}

/**
 * Spawn a worker and perform the bootstrap handshake.
 *
 * Spawner failure and worker exit before the reply raise HANDSHAKE_FAILED;
 * no reply in time raises HANDSHAKE_TIMEOUT. Ports are closed and the worker
 * terminated on failure.
 */
export async function connect(params: ConnectParams): Promise<ServiceHandle> {
  const log = resolveLogger(params.loggerFactory, LOG_PREFIX);
  const channel = new MessageChannel();
  const receiver = new EnvelopeReceiver(channel.port1, { loggerFactory: params.loggerFactory });
  const bootstrap = awaitBootstrap(receiver, params.handshakeTimeoutMs);

  let worker: SpawnedWorker;
  try {
    worker = await params.spawner.spawn({ proxyPort: channel.port2 });
  } catch (err) {
    bootstrap.dispose();
    receiver.close();
    channel.port2.close();
    log.error?.({ error: describeError(err) }, `${LOG_PREFIX}:connect - Spawn failed`);
    if (isBridgeError(err)) throw err;
    throw new BridgeError({
      code: "HANDSHAKE_FAILED",
      message: `Worker could not be spawned: ${describeError(err)}`,
      cause: err,
    });
  }

  bootstrap.watch(worker);
  const outcome = await bootstrap.outcome;
  if (!outcome.ok) {
    receiver.close();
    log.error?.({ code: outcome.error.code, error: outcome.error.message }, `${LOG_PREFIX}:connect - Handshake failed`);
    await worker.terminate().catch((err: unknown) => {
      log.warn?.({ error: describeError(err) }, `${LOG_PREFIX}:connect - Worker did not terminate cleanly`);
    });
    throw outcome.error;
  }

  log.info?.({}, `${LOG_PREFIX}:connect - Handshake complete`);
  return new ServiceHandle({
    sendPort: outcome.port,
    receiver,
    worker,
    loggerFactory: params.loggerFactory,
  });
}
