import { Redis } from "ioredis";
import { createDb } from "@letterbox/db";
import { loadConfig, toCoreSettings } from "./config.js";
import { log } from "./logger.js";
import { buildApp } from "./http/app.js";
import { createEmailProvider } from "./providers/index.js";
import { TokenCodec } from "./domain/token/codec.js";
import { withTimeout } from "./domain/utils/timeout.js";
import { DeliveryPipeline } from "./services/delivery-pipeline.js";
import { DrizzleSubscriberStore } from "./services/drizzle-subscriber-store.js";
import { RedisIdempotencyCache } from "./services/redis-idempotency-cache.js";
import { SubscriptionService } from "./services/subscription-service.js";

const config = loadConfig();
const settings = toCoreSettings(config);

const { db, close: closeDb } = createDb(config.DATABASE_URL, { max: config.DATABASE_POOL_MAX });

const redis = new Redis(config.REDIS_URL, {
  maxRetriesPerRequest: 3,
  retryStrategy: (times) => Math.min(times * 100, 2000),
  reconnectOnError: (err) => err.message.includes("READONLY"),
});

redis.on("connect", () => log.cache.info({}, "connected"));
redis.on("error", (error) => log.cache.error({ error: error.message }, "connection error"));

const cache = new RedisIdempotencyCache(RedisIdempotencyCache.fromRedis(redis), {
  circuit: {
    threshold: config.CACHE_CIRCUIT_FAILURE_THRESHOLD,
    resetMs: config.CACHE_CIRCUIT_RESET_TIMEOUT_MS,
    windowMs: config.CACHE_CIRCUIT_WINDOW_MS,
  },
});

const store = new DrizzleSubscriberStore(db);
const provider = createEmailProvider(config);
const delivery = new DeliveryPipeline({ provider, cache, store, settings });
const service = new SubscriptionService({
  store,
  tokens: new TokenCodec(settings.signingSecret),
  delivery,
  settings,
});

// Aborting stops running broadcasts from dispatching more recipients
const shutdownController = new AbortController();

const app = buildApp({
  service,
  cache,
  adminApiKey: config.ADMIN_API_KEY,
  maxRequestSizeBytes: config.MAX_REQUEST_SIZE_BYTES,
  trustProxy: config.TRUST_PROXY,
  production: config.NODE_ENV === "production",
  shutdownSignal: shutdownController.signal,
});

try {
  await redis.ping();
  log.system.info({ service: "redis" }, "connected");

  await app.listen({ port: config.PORT, host: config.HOST });

  log.system.info({
    port: config.PORT,
    env: config.NODE_ENV,
    provider: provider.name,
    broadcastConcurrency: settings.broadcastConcurrency,
  }, "server started");
} catch (err) {
  log.system.error({ error: err instanceof Error ? err.message : String(err) }, "startup failed");
  process.exit(1);
}

// Graceful shutdown with timeout protection
const SHUTDOWN_TIMEOUT_MS = 30000;

async function step(promise: Promise<unknown>, timeoutMs: number, name: string): Promise<void> {
  try {
    await withTimeout(promise, timeoutMs, name);
  } catch (error) {
    log.system.warn({ error: error instanceof Error ? error.message : String(error), component: name }, "shutdown step failed");
  }
}

async function shutdown(): Promise<void> {
  log.system.info({}, "shutting down (30s timeout)");
  const shutdownStart = Date.now();

  // Phase 1: stop broadcasts dispatching, then let in-flight requests finish
  shutdownController.abort();
  await step(app.close(), 15000, "Fastify");

  // Phase 2: close connections
  await step(redis.quit(), 2000, "Redis");
  await step(closeDb(), 5000, "Postgres");

  log.system.info({ durationMs: Date.now() - shutdownStart }, "shutdown complete");
  process.exit(0);
}

let shutdownInProgress = false;
function initiateShutdown(): void {
  if (shutdownInProgress) {
    log.system.warn({}, "shutdown already in progress, forcing exit");
    process.exit(1);
  }
  shutdownInProgress = true;

  const forceExitTimer = setTimeout(() => {
    log.system.error({}, "shutdown timeout exceeded, forcing exit");
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);
  forceExitTimer.unref();

  shutdown().catch((error: unknown) => {
    log.system.error({ error: error instanceof Error ? error.message : String(error) }, "shutdown failed");
    process.exit(1);
  });
}

process.on("SIGTERM", initiateShutdown);
process.on("SIGINT", initiateShutdown);
