/**
 * Bridge error class (shared by proxy and worker).
 *
 * Remote failures travel as a single string in the envelope's `error` field;
 * the proxy turns that string back into a BridgeError at the call site.
 */

/**
 * Error codes raised by the bridge itself or used to wrap remote failures.
 */
export type BridgeErrorCode =
  | "HANDSHAKE_FAILED"
  | "HANDSHAKE_TIMEOUT"
  | "INVALID_ARGUMENT"
  | "INVALID_REPLY"
  | "REMOTE_ERROR"
  | "CANCELLED"
  | "BUSY"
  | "CLOSED"
  | "NOT_INITIALIZED"
  | "CONFIG_ERROR";

/**
 * Structured error for bridge calls.
 */
export class BridgeError extends Error {
  public readonly code: BridgeErrorCode;
  public readonly retryable: boolean;
  public readonly details?: unknown;

  constructor(args: {
    code: BridgeErrorCode;
    message: string;
    retryable?: boolean;
    details?: unknown;
    cause?: unknown;
  }) {
    super(args.message, args.cause === undefined ? undefined : { cause: args.cause });
    this.name = "BridgeError";
    this.code = args.code;
    this.retryable = args.retryable ?? false;
    this.details = args.details;
  }
}

/**
 * Type guard for BridgeError, optionally narrowed to one code.
 */
export function isBridgeError(err: unknown, code?: BridgeErrorCode): err is BridgeError {
  return err instanceof BridgeError && (code === undefined || err.code === code);
}

/**
 * Flattens any thrown value into the one-line description carried by an
 * envelope's `error` field.
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message || err.name;
  }
  if (typeof err === "string") {
    return err;
  }
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}
