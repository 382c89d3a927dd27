/**
 * Delivery idempotency types.
 *
 * A delivery is identified by a fingerprint of (kind, subscriberId,
 * contentVersion). For one fingerprint at most one email is transmitted:
 * callers race for a lease, the winner sends, and everyone else observes
 * the settled outcome.
 */

export type DeliveryKind = "confirmation" | "issue";

export interface DeliveryIntent {
  kind: DeliveryKind;
  subscriberId: string;
  /** Token expiry for confirmations, issue version for newsletters */
  contentVersion: string | number;
}

export type SettledStatus = "sent" | "permanently_failed";

export interface DeliveryOutcome {
  status: SettledStatus;
  /** Epoch milliseconds when the outcome was settled */
  at: number;
  /** Transport error for permanent failures */
  reason?: string;
  /** Transport attempts made by the lease holder */
  attempts?: number;
}

export interface Lease {
  fingerprint: string;
  /** Identifies the holder so a lost lease cannot clobber a newer one */
  leaseId: string;
}

export type LeaseResult =
  | { status: "granted"; lease: Lease }
  | { status: "in_flight" }
  | { status: "settled"; outcome: DeliveryOutcome };

export type IdempotencyRecord =
  | { state: "in_flight"; leaseId: string; at: number }
  | { state: "settled"; outcome: DeliveryOutcome };

/**
 * Idempotency cache interface for dependency injection.
 * Allows swapping implementations for testing.
 */
export interface IdempotencyCache {
  /**
   * Atomic check-and-set. Grants the lease to exactly one caller per
   * fingerprint until it is settled, released, or its TTL lapses.
   */
  tryBegin(fingerprint: string, leaseTtlMs: number): Promise<LeaseResult>;

  /**
   * Record the terminal outcome in place of the lease's in-flight marker.
   * @returns false if the lease was lost to another holder or the key is
   *   already settled
   */
  settle(lease: Lease, outcome: DeliveryOutcome, ttlMs: number): Promise<boolean>;

  /** Drop the in-flight marker if this lease still owns it */
  release(lease: Lease): Promise<void>;

  /** Read the current record without changing it */
  peek(fingerprint: string): Promise<IdempotencyRecord | null>;

  /** Whether the backing store is reachable (circuit not open) */
  isAvailable(): boolean;
}
