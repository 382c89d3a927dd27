/**
 * Confirmation token types.
 */

export type TokenErrorReason = "malformed" | "signature_mismatch" | "expired";

/** A signed, self-contained confirmation token. Never persisted. */
export interface ConfirmationToken {
  subscriberId: string;
  /** Epoch milliseconds */
  issuedAt: number;
  /** Epoch milliseconds; the token is valid while now <= expiresAt */
  expiresAt: number;
  /** Lowercase hex HMAC-SHA256 over subscriberId and expiresAt */
  signature: string;
  /** Wire form embedded in confirmation links */
  value: string;
}

export type TokenVerification =
  | { valid: true; subscriberId: string; issuedAt: number; expiresAt: number }
  | { valid: false; reason: TokenErrorReason };
