/**
 * Logger interface shared by stacks and clients.
 * Allows optional structured logging with context and message.
 */

export type LogMethod = (ctx: object, msg: string) => void;

export interface Logger {
  debug?: LogMethod;
  info?: LogMethod;
  warn?: LogMethod;
  error?: LogMethod;
}

/** Either a Logger or an object whose get(name) returns one. */
export type LoggerFactory = Logger | { get(name: string): Logger };

const silentLogger: Logger = {};

function hasGet(factory: LoggerFactory): factory is { get(name: string): Logger } {
  return "get" in factory && typeof factory.get === "function";
}

/** Resolve logger from factory (supports loggerFactory or loggerFactory.get(SERVICE_NAME)). */
export function resolveLogger(factory: LoggerFactory | undefined, serviceName: string): Logger {
  if (!factory) return silentLogger;
  return hasGet(factory) ? factory.get(serviceName) : factory;
}

type Level = "debug" | "info" | "warn" | "error";

function write(level: Level, service: string, prefix: string, ctx: object, msg: string): void {
  const line = JSON.stringify({ level, service, prefix, ...ctx, msg });
  if (level === "error" || level === "warn") {
    console.error(line);
  } else {
    console.log(line);
  }
}

/**
 * Create a JSON-lines logger factory. get(prefix) returns a logger that tags
 * every entry with the service name and prefix.
 */
export function createJsonLogger(
  serviceName: string,
  options?: { debug?: boolean },
): { get(prefix: string): Logger } {
  return {
    get(prefix: string): Logger {
      return {
        debug: options?.debug
          ? (ctx, msg) => write("debug", serviceName, prefix, ctx, msg)
          : undefined,
        info: (ctx, msg) => write("info", serviceName, prefix, ctx, msg),
        warn: (ctx, msg) => write("warn", serviceName, prefix, ctx, msg),
        error: (ctx, msg) => write("error", serviceName, prefix, ctx, msg),
      };
    },
  };
}
