/**
 * Structured logging shared by proxy and worker: a Logger interface with
 * optional level methods (context object + message), a factory form with
 * get(name), and a JSON-lines implementation for Node.
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogMethod = (ctx: object, msg: string) => void;

export interface Logger {
  debug?: LogMethod;
  info?: LogMethod;
  warn?: LogMethod;
  error?: LogMethod;
}

export interface LoggerProvider {
  get(name: string): Logger;
}

/** Either a Logger or an object with get(name) returning one. */
export type LoggerFactory = Logger | LoggerProvider;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLoggerProvider(factory: LoggerFactory): factory is LoggerProvider {
  return "get" in factory && typeof factory.get === "function";
}

/** Resolve a logger for a service (console when no factory is given). */
export function resolveLogger(factory: LoggerFactory | undefined, serviceName: string): Logger {
  if (!factory) return console;
  return isLoggerProvider(factory) ? factory.get(serviceName) : factory;
}

function write(level: LogLevel, ctx: object, msg: string): void {
  const payload = Object.keys(ctx).length ? { ...ctx, msg } : { msg };
  const line = JSON.stringify({ level, ...payload });
  if (level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
}

/**
 * Create a node-style logger factory. get(prefix) returns a logger that
 * writes one JSON line per entry and drops entries below `level`.
 */
export function createNodeJSLogger(
  serviceName: string,
  options: { level?: LogLevel } = {}
): LoggerProvider {
  const threshold = LEVEL_ORDER[options.level ?? "info"];

  const method = (level: LogLevel, prefix: string): LogMethod | undefined => {
    if (LEVEL_ORDER[level] < threshold) return undefined;
    return (ctx: object, msg: string) => write(level, { ...ctx, service: serviceName, prefix }, msg);
  };

  return {
    get(prefix: string): Logger {
      return {
        debug: method("debug", prefix),
        info: method("info", prefix),
        warn: method("warn", prefix),
        error: method("error", prefix),
      };
    },
  };
}
