/**
 * Delivery pipeline result types.
 */

import type { DeliveryOutcome } from "../idempotency/types.js";

export type DeliveryResult =
  | {
      status: "settled";
      outcome: DeliveryOutcome;
      /** True when the outcome was settled by an earlier or concurrent caller */
      deduplicated: boolean;
    }
  | { status: "cancelled" };

export interface BroadcastFailure {
  subscriberId: string;
  reason: string;
}

export interface BroadcastReport {
  issueVersion: string;
  /** Recipients whose issue email is settled as sent (including earlier runs) */
  sent: number;
  /** Recipients whose outcome was already settled before this run touched them */
  deduplicated: number;
  failed: BroadcastFailure[];
  /** In-flight recipients that released their lease because of an abort */
  cancelled: number;
  /** Whether dispatching stopped early because the broadcast was aborted */
  aborted: boolean;
  /** Set when listing subscribers failed partway; counts cover who was reached */
  sourceError?: string;
  durationMs: number;
}

export interface BroadcastOptions {
  signal?: AbortSignal;
}
