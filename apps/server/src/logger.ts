import pino from "pino";
import { AsyncLocalStorage } from "node:async_hooks";
import { randomBytes } from "node:crypto";

// The logger is created before config is parsed, so it reads the two
// variables it needs directly.
const nodeEnv = process.env.NODE_ENV ?? "development";
const isDev = nodeEnv === "development";
const level = process.env.LOG_LEVEL ?? (nodeEnv === "production" ? "info" : "debug");

// =============================================================================
// Trace Context (Correlation IDs)
// =============================================================================
// Every HTTP request and every broadcast runs inside withTraceAsync, so all
// logs for one subscribe/confirm/publish share a traceId.
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
 * Run an async function with a trace context. If no traceId is provided,
 * a new one is generated.
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
//   log.subscription.info({ subscriberId }, "pending")
//   log.delivery.info({ subscriberId, kind, attempts }, "sent")
//
// FAILURE (detailed, error level):
//   log.delivery.error({ subscriberId, kind, reason, attempts }, "permanently failed")
//
// =============================================================================

const baseConfig: pino.LoggerOptions = {
  level,

  formatters: {
    level: (label) => ({ level: label }),
  },

  timestamp: pino.stdTimeFunctions.isoTime,

  // Never log signing material or full confirmation links
  redact: ["token", "signature", "*.token", "*.signature"],

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
  // Subscribe / confirm lifecycle
  subscription: logger.child({ component: "subscription" }),

  // Token issuance and verification
  token: logger.child({ component: "token" }),

  // Single-recipient sends (confirmation and issue emails)
  delivery: logger.child({ component: "delivery" }),

  // Newsletter fan-out
  broadcast: logger.child({ component: "broadcast" }),

  // Subscriber persistence
  store: logger.child({ component: "store" }),

  // Idempotency cache (Redis/Dragonfly)
  cache: logger.child({ component: "cache" }),

  // Email providers (Resend, mock)
  provider: logger.child({ component: "provider" }),

  // HTTP requests
  api: logger.child({ component: "api" }),

  // Process lifecycle
  system: logger.child({ component: "system" }),
};

/**
 * Log a failure with full context for debugging
 */
export function logFailure(
  component: keyof typeof log,
  event: string,
  error: unknown,
  context: Record<string, unknown>
): void {
  const err = error instanceof Error ? error : new Error(String(error));

  log[component].error({
    ...context,
    error: err.message,
    errorName: err.name,
    ...(isDev && { stack: err.stack }),
  }, event);
}

/**
 * Create a timer for measuring operation duration
 */
export function createTimer(): () => number {
  const start = process.hrtime.bigint();
  return () => Number(process.hrtime.bigint() - start) / 1_000_000;
}

export default log;
