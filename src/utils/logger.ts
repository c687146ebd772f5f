// ============================================================================
// STRUCTURED LOGGER
// Pino-based logger with automatic context injection and sensitive data masking
// ============================================================================

import pino from "pino";
import { config } from "../config/index.js";
import { context } from "./context.js";
import type { WindowSummary } from "../types/sweep.types.js";

// ----------------------------------------------------------------------------
// SENSITIVE DATA PATTERNS FOR REDACTION
// ----------------------------------------------------------------------------

const redactPaths = [
  "password",
  "pin",
  "params.password",
  "params.pin",
  "guest.email",
  "guest.phoneNumber",
  "data.guest.email",
  "data.guest.phoneNumber",
  "req.headers.authorization",
];

// ----------------------------------------------------------------------------
// PINO CONFIGURATION
// ----------------------------------------------------------------------------

const pinoOptions: pino.LoggerOptions = {
  level: config.logging.level,
  redact: config.logging.maskSensitiveData
    ? {
        paths: redactPaths,
        censor: "[REDACTED]",
      }
    : undefined,
  formatters: {
    level: (label) => ({ level: label }),
    bindings: () => ({}),
  },
  timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
  base: {
    service: config.app.name,
    version: config.app.version,
    env: config.app.env,
  },
};

const transport = config.logging.pretty
  ? pino.transport({
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname,service,version,env",
        messageFormat: "{correlationId} | {msg}",
      },
    })
  : undefined;

const baseLogger = transport ? pino(pinoOptions, transport) : pino(pinoOptions);

// ----------------------------------------------------------------------------
// CONTEXT-AWARE LOGGER WRAPPER
// ----------------------------------------------------------------------------

type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace";

function contextFields(): Record<string, unknown> {
  const ctx = context.get();
  return ctx
    ? {
        correlationId: ctx.correlationId,
        transactionId: ctx.transactionId,
        operation: ctx.operation,
        elapsedMs: Date.now() - ctx.startTime,
      }
    : {};
}

function createLogMethod(level: LogLevel) {
  return (objOrMsg: Record<string, unknown> | string, msg?: string): void => {
    if (typeof objOrMsg === "string") {
      baseLogger[level](contextFields(), objOrMsg);
    } else {
      baseLogger[level]({ ...contextFields(), ...objOrMsg }, msg || "");
    }
  };
}

export const logger = {
  fatal: createLogMethod("fatal"),
  error: createLogMethod("error"),
  warn: createLogMethod("warn"),
  info: createLogMethod("info"),
  debug: createLogMethod("debug"),
  trace: createLogMethod("trace"),

  /**
   * Log one call to the CapCorn backend
   */
  upstreamCall(data: {
    operation: string;
    success: boolean;
    duration: number;
    status?: number;
    requestSize?: number;
    responseSize?: number;
    errorCode?: string;
    errorMessage?: string;
  }) {
    const logData = {
      ...contextFields(),
      ...data,
      type: "upstream_call",
    };

    if (data.success) {
      baseLogger.debug(logData, `CapCorn ${data.operation} completed in ${data.duration}ms`);
    } else {
      baseLogger.warn(logData, `CapCorn ${data.operation} failed: ${data.errorMessage || "Unknown error"}`);
    }
  },

  /**
   * Log the summary of a date-window sweep
   */
  sweep(data: {
    durationDays: number;
    totalQueries: number;
    failedQueries: number;
    totalOptions: number;
    duration: number;
    windows: WindowSummary[];
  }) {
    const logData = {
      ...contextFields(),
      ...data,
      type: "sweep_search",
    };

    const level: LogLevel = data.failedQueries === data.totalQueries ? "warn" : "info";
    baseLogger[level](
      logData,
      `Sweep found ${data.totalOptions} options across ${data.totalQueries} queries (${data.failedQueries} failed)`
    );
  },
};

export type Logger = typeof logger;
