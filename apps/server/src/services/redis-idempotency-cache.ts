import { randomUUID } from "node:crypto";
import type { Redis } from "ioredis";
import { z } from "zod";
import { CacheUnavailableError } from "../errors.js";
import { log } from "../logger.js";
import { CircuitBreaker } from "../domain/circuit-breaker/circuit-breaker.js";
import type { CircuitBreakerConfig, CircuitBreakerStatus } from "../domain/circuit-breaker/types.js";
import type {
  DeliveryOutcome,
  IdempotencyCache,
  IdempotencyRecord,
  Lease,
  LeaseResult,
} from "../domain/idempotency/types.js";
import { SystemTimeProvider, type TimeProvider } from "../domain/utils/time.js";

/**
 * Idempotency records live in Redis/Dragonfly as one JSON string per
 * fingerprint. Every state change is a Lua script, so check-and-set is
 * atomic across all server processes sharing the cache.
 */

// Returns the existing record, or nil after writing the in-flight marker
const TRY_BEGIN_SCRIPT = `
  local current = redis.call("GET", KEYS[1])
  if current then
    return current
  end
  redis.call("SET", KEYS[1], ARGV[1], "PX", ARGV[2])
  return false
`;

// Replaces the marker only if this lease still owns it (or it lapsed)
const SETTLE_SCRIPT = `
  local current = redis.call("GET", KEYS[1])
  if current then
    local record = cjson.decode(current)
    if record.state ~= "in_flight" or record.leaseId ~= ARGV[1] then
      return 0
    end
  end
  redis.call("SET", KEYS[1], ARGV[2], "PX", ARGV[3])
  return 1
`;

const RELEASE_SCRIPT = `
  local current = redis.call("GET", KEYS[1])
  if not current then
    return 0
  end
  local record = cjson.decode(current)
  if record.state == "in_flight" and record.leaseId == ARGV[1] then
    redis.call("DEL", KEYS[1])
    return 1
  end
  return 0
`;

const outcomeSchema = z.object({
  status: z.enum(["sent", "permanently_failed"]),
  at: z.number(),
  reason: z.string().optional(),
  attempts: z.number().int().optional(),
});

const recordSchema = z.discriminatedUnion("state", [
  z.object({ state: z.literal("in_flight"), leaseId: z.string(), at: z.number() }),
  z.object({ state: z.literal("settled"), outcome: outcomeSchema }),
]);

/**
 * The two Redis commands the cache needs. ioredis satisfies it through
 * `fromRedis`; tests pass a fake.
 */
export interface ScriptRunner {
  eval(script: string, numKeys: number, ...args: Array<string | number>): Promise<unknown>;
  get(key: string): Promise<string | null>;
}

export interface RedisIdempotencyCacheOptions {
  circuit: CircuitBreakerConfig;
  /** Prepended to every fingerprint (default: none) */
  keyPrefix?: string;
  time?: TimeProvider;
  generateLeaseId?: () => string;
}

export class RedisIdempotencyCache implements IdempotencyCache {
  private readonly breaker: CircuitBreaker;
  private readonly keyPrefix: string;
  private readonly time: TimeProvider;
  private readonly generateLeaseId: () => string;

  constructor(
    private readonly redis: ScriptRunner,
    options: RedisIdempotencyCacheOptions
  ) {
    this.keyPrefix = options.keyPrefix ?? "";
    this.time = options.time ?? new SystemTimeProvider();
    this.generateLeaseId = options.generateLeaseId ?? randomUUID;
    this.breaker = new CircuitBreaker(options.circuit, this.time, ({ from, to }) => {
      if (to === "open") {
        log.cache.error({ from, to }, "circuit opened, deliveries refused");
      } else {
        log.cache.info({ from, to }, "circuit state changed");
      }
    });
  }

  static fromRedis(redis: Redis): ScriptRunner {
    return {
      eval: (script, numKeys, ...args) => redis.eval(script, numKeys, ...args),
      get: (key) => redis.get(key),
    };
  }

  async tryBegin(fingerprint: string, leaseTtlMs: number): Promise<LeaseResult> {
    const leaseId = this.generateLeaseId();
    const marker: IdempotencyRecord = { state: "in_flight", leaseId, at: this.time.now() };

    const existing = await this.run("tryBegin", () =>
      this.redis.eval(
        TRY_BEGIN_SCRIPT,
        1,
        this.key(fingerprint),
        JSON.stringify(marker),
        Math.max(1, Math.ceil(leaseTtlMs))
      )
    );

    if (existing === null || existing === undefined) {
      return { status: "granted", lease: { fingerprint, leaseId } };
    }

    const record = this.parse(existing);
    return record.state === "settled"
      ? { status: "settled", outcome: record.outcome }
      : { status: "in_flight" };
  }

  async settle(lease: Lease, outcome: DeliveryOutcome, ttlMs: number): Promise<boolean> {
    const record: IdempotencyRecord = { state: "settled", outcome };

    const result = await this.run("settle", () =>
      this.redis.eval(
        SETTLE_SCRIPT,
        1,
        this.key(lease.fingerprint),
        lease.leaseId,
        JSON.stringify(record),
        Math.max(1, Math.ceil(ttlMs))
      )
    );

    return result === 1;
  }

  async release(lease: Lease): Promise<void> {
    await this.run("release", () =>
      this.redis.eval(RELEASE_SCRIPT, 1, this.key(lease.fingerprint), lease.leaseId)
    );
  }

  async peek(fingerprint: string): Promise<IdempotencyRecord | null> {
    const raw = await this.run("peek", () => this.redis.get(this.key(fingerprint)));
    return raw === null ? null : this.parse(raw);
  }

  isAvailable(): boolean {
    return this.breaker.status().isAvailable;
  }

  circuitStatus(): CircuitBreakerStatus {
    return this.breaker.status();
  }

  private key(fingerprint: string): string {
    return `${this.keyPrefix}${fingerprint}`;
  }

  /**
   * Run a cache command behind the circuit breaker. Any failure surfaces
   * as CacheUnavailableError; callers never send without a lease.
   */
  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    if (!this.breaker.canProceed()) {
      throw new CacheUnavailableError("Idempotency cache unavailable (circuit open)");
    }

    try {
      const result = await fn();
      this.breaker.recordSuccess();
      return result;
    } catch (error) {
      this.breaker.recordFailure();
      log.cache.warn(
        { operation, error: error instanceof Error ? error.message : String(error) },
        "cache command failed"
      );
      throw new CacheUnavailableError("Idempotency cache unavailable", { cause: error });
    }
  }

  private parse(raw: unknown): IdempotencyRecord {
    if (typeof raw !== "string") {
      throw new CacheUnavailableError(`Unexpected cache reply of type ${typeof raw}`);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new CacheUnavailableError("Corrupt idempotency record", { cause: error });
    }

    const parsed = recordSchema.safeParse(json);
    if (!parsed.success) {
      throw new CacheUnavailableError("Corrupt idempotency record", { cause: parsed.error });
    }
    return parsed.data;
  }
}
