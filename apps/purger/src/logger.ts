import pino from "pino";
import { AsyncLocalStorage } from "node:async_hooks";
import { randomBytes } from "node:crypto";
import { config } from "./config.js";

const isDev = config.NODE_ENV === "development";

// =============================================================================
// Trace Context (Correlation IDs)
// =============================================================================
// AsyncLocalStorage carries the traceId through a whole invalidation request,
// including the background dispatch and every provider call it makes.
//
// Usage:
//   await withTraceAsync(async () => {
//     log.dispatch.info({ requestId }, "dispatching"); // traceId added automatically
//     await dispatcher.dispatch(request);             // nested logs get the same traceId
//   });
// =============================================================================

interface TraceContext {
  traceId: string;
}

const traceStorage = new AsyncLocalStorage<TraceContext>();

/**
 * Generate a short, unique trace ID (12 chars, base64url)
 */
export function generateTraceId(): string {
  return randomBytes(9).toString("base64url").slice(0, 12);
}

export function getTraceId(): string | undefined {
  return traceStorage.getStore()?.traceId;
}

/**
 * Run an async function with a trace context. All logs within will include the traceId.
 * If no traceId is provided, a new one is generated.
 */
export async function withTraceAsync<T>(
  fn: () => Promise<T>,
  traceId?: string
): Promise<T> {
  const ctx: TraceContext = { traceId: traceId ?? generateTraceId() };
  return traceStorage.run(ctx, fn);
}

// =============================================================================
// Structured Logger
// =============================================================================
//
// SUCCESS (short, info level):
//   log.dispatch.info({ requestId, batches: 2 }, "completed")
//
// FAILURE (detailed, error level):
//   log.provider.error({ requestId, batchIndex, errorKind, attempts }, "batch failed")
//
// =============================================================================

const baseConfig: pino.LoggerOptions = {
  level: config.LOG_LEVEL ?? (isDev ? "debug" : "info"),

  formatters: {
    level: (label) => ({ level: label }),
  },

  timestamp: pino.stdTimeFunctions.isoTime,

  // Never let credentials reach the log stream
  redact: {
    paths: [
      "*.secretAccessKey",
      "*.apiToken",
      "*.apiSecret",
      "*.apiKey",
      "*.clientSecret",
      "headers.authorization",
    ],
    censor: "[redacted]",
  },

  mixin() {
    const traceId = traceStorage.getStore()?.traceId;
    return traceId ? { traceId } : {};
  },
};

export const logger = isDev
  ? pino({
      ...baseConfig,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "pid,hostname",
          messageFormat: "{component} | {msg}",
          singleLine: true,
        },
      },
    })
  : pino(baseConfig);

// =============================================================================
// Component Loggers
// =============================================================================

export const log = {
  // Request lifecycle (validation, submission, status)
  request: logger.child({ component: "request" }),

  // Batch dispatch and retries
  dispatch: logger.child({ component: "dispatch" }),

  // CDN provider calls (CloudFront, Cloudflare, ...)
  provider: logger.child({ component: "provider" }),

  // HTTP API
  api: logger.child({ component: "api" }),

  // Idempotency cache (Redis)
  cache: logger.child({ component: "cache" }),

  system: logger.child({ component: "system" }),
};

export type LogComponent = keyof typeof log;

// =============================================================================
// Convenience Functions
// =============================================================================

/**
 * Log a failure with full context for debugging
 */
export function logFailure(
  component: LogComponent,
  event: string,
  error: unknown,
  context: Record<string, unknown>
): void {
  const err = error instanceof Error ? error : new Error(String(error));

  log[component].error(
    {
      ...context,
      error: err.message,
      errorName: err.name,
      ...(isDev && { stack: err.stack }),
    },
    event
  );
}

/**
 * Create a timer for measuring operation duration.
 * Returns elapsed milliseconds.
 */
export function createTimer(): () => number {
  const start = process.hrtime.bigint();
  return () => {
    const end = process.hrtime.bigint();
    return Number(end - start) / 1_000_000;
  };
}
