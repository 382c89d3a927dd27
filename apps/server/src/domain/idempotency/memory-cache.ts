/**
 * In-memory idempotency cache (for testing and single-process runs).
 *
 * Every operation completes synchronously inside one call, which gives the
 * same check-and-set atomicity the Redis scripts provide.
 */

import { randomUUID } from "node:crypto";
import { SystemTimeProvider, type TimeProvider } from "../utils/time.js";
import type {
  DeliveryOutcome,
  IdempotencyCache,
  IdempotencyRecord,
  Lease,
  LeaseResult,
} from "./types.js";

interface Entry {
  record: IdempotencyRecord;
  expiresAt: number;
}

export class InMemoryIdempotencyCache implements IdempotencyCache {
  private entries = new Map<string, Entry>();

  constructor(
    private readonly time: TimeProvider = new SystemTimeProvider(),
    private readonly generateLeaseId: () => string = randomUUID
  ) {}

  async tryBegin(fingerprint: string, leaseTtlMs: number): Promise<LeaseResult> {
    const current = this.read(fingerprint);

    if (current?.state === "settled") {
      return { status: "settled", outcome: { ...current.outcome } };
    }
    if (current?.state === "in_flight") {
      return { status: "in_flight" };
    }

    const now = this.time.now();
    const leaseId = this.generateLeaseId();
    this.entries.set(fingerprint, {
      record: { state: "in_flight", leaseId, at: now },
      expiresAt: now + leaseTtlMs,
    });

    return { status: "granted", lease: { fingerprint, leaseId } };
  }

  async settle(lease: Lease, outcome: DeliveryOutcome, ttlMs: number): Promise<boolean> {
    const current = this.read(lease.fingerprint);

    if (current?.state === "settled") return false;
    if (current?.state === "in_flight" && current.leaseId !== lease.leaseId) return false;

    this.entries.set(lease.fingerprint, {
      record: { state: "settled", outcome: { ...outcome } },
      expiresAt: this.time.now() + ttlMs,
    });
    return true;
  }

  async release(lease: Lease): Promise<void> {
    const current = this.read(lease.fingerprint);
    if (current?.state === "in_flight" && current.leaseId === lease.leaseId) {
      this.entries.delete(lease.fingerprint);
    }
  }

  async peek(fingerprint: string): Promise<IdempotencyRecord | null> {
    return this.read(fingerprint);
  }

  isAvailable(): boolean {
    return true;
  }

  private read(fingerprint: string): IdempotencyRecord | null {
    const entry = this.entries.get(fingerprint);
    if (!entry) return null;

    if (this.time.now() >= entry.expiresAt) {
      this.entries.delete(fingerprint);
      return null;
    }
    return entry.record;
  }
}
