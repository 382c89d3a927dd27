import { createHash } from "node:crypto";
import { describe, it, expect, beforeEach } from "vitest";
import {
  computeFingerprint,
  FINGERPRINT_PREFIX,
  InMemoryIdempotencyCache,
  type DeliveryOutcome,
  type Lease,
} from "../../../domain/idempotency/index.js";
import { MockTimeProvider } from "../../../domain/utils/time.js";

describe("computeFingerprint", () => {
  it("should hash kind, subscriber and content version", () => {
    const expected = createHash("sha256").update('["issue","sub-1","2024-06"]').digest("hex");

    expect(computeFingerprint({ kind: "issue", subscriberId: "sub-1", contentVersion: "2024-06" })).toBe(
      `${FINGERPRINT_PREFIX}${expected}`
    );
  });

  it("should be deterministic", () => {
    const intent = { kind: "confirmation" as const, subscriberId: "sub-1", contentVersion: 1234 };
    expect(computeFingerprint(intent)).toBe(computeFingerprint({ ...intent }));
  });

  it("should treat numeric and string versions alike", () => {
    expect(computeFingerprint({ kind: "confirmation", subscriberId: "sub-1", contentVersion: 1234 })).toBe(
      computeFingerprint({ kind: "confirmation", subscriberId: "sub-1", contentVersion: "1234" })
    );
  });

  it("should separate kinds, subscribers and versions", () => {
    const base = computeFingerprint({ kind: "issue", subscriberId: "sub-1", contentVersion: "v1" });

    expect(computeFingerprint({ kind: "confirmation", subscriberId: "sub-1", contentVersion: "v1" })).not.toBe(base);
    expect(computeFingerprint({ kind: "issue", subscriberId: "sub-2", contentVersion: "v1" })).not.toBe(base);
    expect(computeFingerprint({ kind: "issue", subscriberId: "sub-1", contentVersion: "v2" })).not.toBe(base);
  });

  it("should not collide when a separator moves between parts", () => {
    expect(computeFingerprint({ kind: "issue", subscriberId: "a:b", contentVersion: "c" })).not.toBe(
      computeFingerprint({ kind: "issue", subscriberId: "a", contentVersion: "b:c" })
    );
  });
});

describe("InMemoryIdempotencyCache", () => {
  const LEASE_TTL = 1000;
  const OUTCOME_TTL = 60_000;
  const sent: DeliveryOutcome = { status: "sent", at: 5, attempts: 1 };

  let time: MockTimeProvider;
  let cache: InMemoryIdempotencyCache;
  let leaseCounter: number;

  beforeEach(() => {
    time = new MockTimeProvider(0);
    leaseCounter = 0;
    cache = new InMemoryIdempotencyCache(time, () => `lease-${++leaseCounter}`);
  });

  async function grant(fingerprint: string): Promise<Lease> {
    const result = await cache.tryBegin(fingerprint, LEASE_TTL);
    if (result.status !== "granted") {
      throw new Error(`expected a lease, got ${result.status}`);
    }
    return result.lease;
  }

  it("should grant the first caller and report in_flight to the next", async () => {
    expect(await cache.tryBegin("fp", LEASE_TTL)).toEqual({
      status: "granted",
      lease: { fingerprint: "fp", leaseId: "lease-1" },
    });
    expect(await cache.tryBegin("fp", LEASE_TTL)).toEqual({ status: "in_flight" });
  });

  it("should grant exactly one of many concurrent callers", async () => {
    const results = await Promise.all(Array.from({ length: 10 }, () => cache.tryBegin("fp", LEASE_TTL)));

    expect(results.filter((r) => r.status === "granted")).toHaveLength(1);
    expect(results.filter((r) => r.status === "in_flight")).toHaveLength(9);
  });

  it("should return the settled outcome to later callers", async () => {
    const lease = await grant("fp");

    expect(await cache.settle(lease, sent, OUTCOME_TTL)).toBe(true);
    expect(await cache.tryBegin("fp", LEASE_TTL)).toEqual({ status: "settled", outcome: sent });
  });

  it("should never overwrite a settled record", async () => {
    const lease = await grant("fp");
    await cache.settle(lease, sent, OUTCOME_TTL);

    const failed: DeliveryOutcome = { status: "permanently_failed", at: 9, reason: "late" };
    expect(await cache.settle(lease, failed, OUTCOME_TTL)).toBe(false);
    expect(await cache.peek("fp")).toEqual({ state: "settled", outcome: sent });
  });

  it("should refuse to settle with a lease that was lost", async () => {
    const stale = await grant("fp");
    time.advanceBy(LEASE_TTL);
    const current = await grant("fp");

    expect(await cache.settle(stale, sent, OUTCOME_TTL)).toBe(false);
    expect(await cache.peek("fp")).toEqual({ state: "in_flight", leaseId: current.leaseId, at: LEASE_TTL });
  });

  it("should let a lease that lapsed unclaimed still settle", async () => {
    const lease = await grant("fp");
    time.advanceBy(LEASE_TTL + 1);

    expect(await cache.settle(lease, sent, OUTCOME_TTL)).toBe(true);
  });

  it("should free the key for a new lease on release", async () => {
    const lease = await grant("fp");
    await cache.release(lease);

    expect(await cache.peek("fp")).toBeNull();
    expect((await cache.tryBegin("fp", LEASE_TTL)).status).toBe("granted");
  });

  it("should ignore a release from a lease that no longer holds the key", async () => {
    const stale = await grant("fp");
    time.advanceBy(LEASE_TTL);
    await grant("fp");

    await cache.release(stale);

    expect(await cache.tryBegin("fp", LEASE_TTL)).toEqual({ status: "in_flight" });
  });

  it("should expire in-flight markers after the lease TTL", async () => {
    await grant("fp");

    time.advanceBy(LEASE_TTL - 1);
    expect(await cache.tryBegin("fp", LEASE_TTL)).toEqual({ status: "in_flight" });

    time.advanceBy(1);
    expect((await cache.tryBegin("fp", LEASE_TTL)).status).toBe("granted");
  });

  it("should expire settled outcomes after the outcome TTL", async () => {
    const lease = await grant("fp");
    await cache.settle(lease, sent, OUTCOME_TTL);

    time.advanceBy(OUTCOME_TTL);

    expect(await cache.peek("fp")).toBeNull();
  });

  it("should keep fingerprints independent", async () => {
    await grant("fp-a");

    expect((await cache.tryBegin("fp-b", LEASE_TTL)).status).toBe("granted");
  });
});
