import crypto from "node:crypto";
import pino, { stdTimeFunctions, type Logger, type LoggerOptions, type TransportSingleOptions } from "pino";

/** Fields bound onto child loggers. */
export type LogContext = {
  component?: string;
  requestId?: string;
  route?: string;
  method?: string;
  domain?: string;
  service?: string;
  entityId?: string;
};

// Long-lived access tokens travel as `token` in config and as the Authorization header.
export const redactionPaths = [
  "token",
  "access_token",
  "authorization",
  "headers.Authorization",
  "config.token",
  "*.token",
  "*.authorization"
];

function prettyTransport(): TransportSingleOptions | undefined {
  if (process.env["LOG_PRETTY"] !== "true" && process.env["NODE_ENV"] !== "development") {
    return undefined;
  }
  return {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "SYS:standard",
      singleLine: true,
      ignore: "pid,hostname"
    }
  };
}

const transport = prettyTransport();
const version = process.env["npm_package_version"];

const options: LoggerOptions = {
  level: process.env["LOG_LEVEL"] ?? "info",
  base: {
    service: process.env["SERVICE_NAME"] ?? "home-assistant-skill",
    env: process.env["NODE_ENV"] ?? "development",
    ...(version ? { version } : {})
  },
  redact: { paths: redactionPaths, censor: "[redacted]" },
  formatters: {
    level(label) {
      return { level: label };
    }
  },
  timestamp: stdTimeFunctions.isoTime,
  ...(transport ? { transport } : {})
};

export const logger = pino(options);

/**
 * Child of `base` carrying the defined fields of `context`. Returns `base`
 * itself when nothing is left to bind.
 */
export function childLogger(context: LogContext, base: Logger = logger): Logger {
  const bindings = Object.fromEntries(Object.entries(context).filter(([, value]) => value !== undefined));
  if (!Object.keys(bindings).length) return base;
  return base.child(bindings);
}

/**
 * Logger for one REST round trip, tagged with a fresh request id.
 */
export function requestLogger(base: Logger, request: { route: string; method: string }): Logger {
  return childLogger({ ...request, requestId: crypto.randomUUID() }, base);
}

export function elapsedTimer(): () => { durationMs: number } {
  const start = Date.now();
  return () => ({ durationMs: Date.now() - start });
}

export function toErrorObject(err: unknown): { message: string; stack?: string; name?: string } {
  if (err instanceof Error) {
    return {
      message: err.message,
      ...(err.stack ? { stack: err.stack } : {}),
      name: err.name
    };
  }
  if (typeof err === "string") return { message: err };
  return { message: JSON.stringify(err) };
}
