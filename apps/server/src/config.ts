import { z } from "zod";
import { ConfigurationError } from "./errors.js";

// Helper for parsing string booleans from environment variables
// z.coerce.boolean() treats any non-empty string as true, including "false"
const stringBoolean = z
  .union([z.boolean(), z.string()])
  .transform((val) => {
    if (typeof val === "boolean") return val;
    return val.toLowerCase() === "true";
  });

/**
 * A delivery lease must outlive the send it guards, settle included.
 * Otherwise a waiting caller takes over the lease mid-send and the same
 * email goes out twice.
 */
export const LEASE_MARGIN_MS = 1000;

export const envSchema = z.object({
  // Database
  DATABASE_URL: z.string().url(),
  DATABASE_POOL_MAX: z.coerce.number().int().min(1).default(20),

  // Redis / Dragonfly (idempotency cache)
  REDIS_URL: z.string().default("redis://localhost:6379"),

  // Email provider
  EMAIL_PROVIDER: z.enum(["resend", "mock"]).default("resend"),
  RESEND_API_KEY: z.string().default(""), // Optional when using mock provider
  EMAIL_FROM: z.string().email(),
  EMAIL_FROM_NAME: z.string().default("Newsletter"),

  // Mock provider settings (for testing)
  MOCK_MODE: z.enum(["success", "fail", "transient", "random"]).default("success"),
  MOCK_FAILURE_RATE: z.coerce.number().min(0).max(1).default(0.1),
  MOCK_LATENCY_MS: z.coerce.number().default(50),

  // Server
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().default(8000),
  APP_BASE_URL: z.string().url(),
  MAX_REQUEST_SIZE_BYTES: z.coerce.number().default(1024 * 1024), // 1MB

  // Publishing newsletter issues requires this bearer key
  ADMIN_API_KEY: z.string().min(16),

  // =============================================================================
  // Confirmation Tokens
  // =============================================================================
  HMAC_SECRET: z.string().min(32),
  TOKEN_TTL_SECONDS: z.coerce.number().int().positive().default(24 * 60 * 60), // 24 hours

  // =============================================================================
  // Delivery
  // =============================================================================
  MAX_SEND_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
  BACKOFF_BASE_MS: z.coerce.number().int().positive().default(500),
  BACKOFF_CAP_MS: z.coerce.number().int().positive().default(30000),
  BACKOFF_JITTER: z.coerce.number().min(0).max(1).default(0.5),
  SEND_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  BROADCAST_CONCURRENCY: z.coerce.number().int().min(1).max(500).default(16),
  BROADCAST_PAGE_SIZE: z.coerce.number().int().min(1).default(500),

  // Idempotency leases: in-flight marker TTL and settled outcome TTL
  DELIVERY_LEASE_TTL_MS: z.coerce.number().int().positive().default(2 * 60 * 1000), // 2 minutes
  DELIVERY_OUTCOME_TTL_HOURS: z.coerce.number().positive().default(7 * 24), // 7 days
  IN_FLIGHT_POLL_MS: z.coerce.number().int().positive().default(250),

  // Cache circuit breaker
  CACHE_CIRCUIT_FAILURE_THRESHOLD: z.coerce.number().int().min(1).default(5),
  CACHE_CIRCUIT_RESET_TIMEOUT_MS: z.coerce.number().default(30000),
  CACHE_CIRCUIT_WINDOW_MS: z.coerce.number().default(60000),

  // Environment
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  TRUST_PROXY: stringBoolean.default(false),
}).superRefine((env, ctx) => {
  if (env.DELIVERY_LEASE_TTL_MS < env.SEND_TIMEOUT_MS + LEASE_MARGIN_MS) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["DELIVERY_LEASE_TTL_MS"],
      message: `must be at least SEND_TIMEOUT_MS + ${LEASE_MARGIN_MS}`,
    });
  }
});

export type Config = z.infer<typeof envSchema>;

/**
 * Settings the subscription core receives at construction.
 * Built once at startup and passed explicitly; never looked up globally.
 */
export interface CoreSettings {
  readonly signingSecret: string;
  readonly tokenTtlMs: number;
  readonly maxSendRetries: number;
  readonly backoffBaseMs: number;
  readonly backoffCapMs: number;
  readonly backoffJitter: number;
  readonly broadcastConcurrency: number;
  readonly broadcastPageSize: number;
  readonly sendTimeoutMs: number;
  readonly leaseTtlMs: number;
  readonly outcomeTtlMs: number;
  readonly inFlightPollMs: number;
  readonly baseUrl: string;
  readonly fromEmail: string;
  readonly fromName: string;
}

/**
 * Parse an environment object. Throws ConfigurationError listing every
 * invalid variable.
 */
export function parseConfig(env: Record<string, string | undefined>): Config {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new ConfigurationError("Missing or invalid environment variables", issues);
  }

  return result.data;
}

/**
 * Load config from process.env, exiting the process when it is invalid.
 */
export function loadConfig(): Config {
  try {
    return parseConfig(process.env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`${error.message}:`);
      for (const issue of error.issues) {
        console.error(`  - ${issue}`);
      }
      process.exit(1);
    }
    throw error;
  }
}

export function toCoreSettings(config: Config): CoreSettings {
  return Object.freeze({
    signingSecret: config.HMAC_SECRET,
    tokenTtlMs: config.TOKEN_TTL_SECONDS * 1000,
    maxSendRetries: config.MAX_SEND_RETRIES,
    backoffBaseMs: config.BACKOFF_BASE_MS,
    backoffCapMs: config.BACKOFF_CAP_MS,
    backoffJitter: config.BACKOFF_JITTER,
    broadcastConcurrency: config.BROADCAST_CONCURRENCY,
    broadcastPageSize: config.BROADCAST_PAGE_SIZE,
    sendTimeoutMs: config.SEND_TIMEOUT_MS,
    leaseTtlMs: config.DELIVERY_LEASE_TTL_MS,
    outcomeTtlMs: config.DELIVERY_OUTCOME_TTL_HOURS * 60 * 60 * 1000,
    inFlightPollMs: config.IN_FLIGHT_POLL_MS,
    baseUrl: config.APP_BASE_URL.replace(/\/+$/, ""),
    fromEmail: config.EMAIL_FROM,
    fromName: config.EMAIL_FROM_NAME,
  });
}
