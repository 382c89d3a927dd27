/**
 * Confirmation token codec.
 *
 * Wire form: base64url(subscriberId).issuedAt.expiresAt.signature
 *
 * The signature is HMAC-SHA256(secret, "<subscriberId>:<expiresAt>") in
 * lowercase hex. Tokens are stateless: there is no server-side table, so
 * a token stays usable until it expires.
 */

import { createHmac, timingSafeEqual } from "node:crypto";
import { ConfigurationError } from "../../errors.js";
import { SystemTimeProvider, type TimeProvider } from "../utils/time.js";
import type { ConfirmationToken, TokenVerification } from "./types.js";

const SIGNATURE_PATTERN = /^[0-9a-f]{64}$/;
const TIMESTAMP_PATTERN = /^\d{1,15}$/;
const BASE64URL_PATTERN = /^[A-Za-z0-9_-]+$/;

interface DecodedToken {
  subscriberId: string;
  issuedAt: number;
  expiresAt: number;
  signature: string;
}

export class TokenCodec {
  private readonly secret: string;

  constructor(
    secret: string | undefined,
    private readonly time: TimeProvider = new SystemTimeProvider()
  ) {
    if (!secret) {
      throw new ConfigurationError("Token signing secret is not configured");
    }
    this.secret = secret;
  }

  issue(subscriberId: string, ttlMs: number): ConfirmationToken {
    if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
      throw new RangeError(`Token TTL must be positive, got ${ttlMs}`);
    }

    const issuedAt = this.time.now();
    const expiresAt = issuedAt + ttlMs;
    const signature = this.sign(subscriberId, expiresAt);

    return {
      subscriberId,
      issuedAt,
      expiresAt,
      signature,
      value: TokenCodec.encode({ subscriberId, issuedAt, expiresAt, signature }),
    };
  }

  /**
   * Verify a token's wire form. Malformed input is reported before the
   * signature is checked; expiry is only checked for authentic tokens.
   */
  verify(value: string): TokenVerification {
    const decoded = TokenCodec.decode(value);
    if (!decoded) {
      return { valid: false, reason: "malformed" };
    }

    const expected = Buffer.from(this.sign(decoded.subscriberId, decoded.expiresAt), "hex");
    const provided = Buffer.from(decoded.signature, "hex");

    if (expected.length !== provided.length || !timingSafeEqual(expected, provided)) {
      return { valid: false, reason: "signature_mismatch" };
    }

    if (this.time.now() > decoded.expiresAt) {
      return { valid: false, reason: "expired" };
    }

    return {
      valid: true,
      subscriberId: decoded.subscriberId,
      issuedAt: decoded.issuedAt,
      expiresAt: decoded.expiresAt,
    };
  }

  private sign(subscriberId: string, expiresAt: number): string {
    return createHmac("sha256", this.secret)
      .update(`${subscriberId}:${expiresAt}`)
      .digest("hex");
  }

  static encode(token: DecodedToken): string {
    const id = Buffer.from(token.subscriberId, "utf8").toString("base64url");
    return `${id}.${token.issuedAt}.${token.expiresAt}.${token.signature}`;
  }

  /** Parse the wire form; returns null for anything non-canonical. */
  static decode(value: string): DecodedToken | null {
    const parts = value.split(".");
    if (parts.length !== 4) return null;

    const [encodedId, issuedAtRaw, expiresAtRaw, signature] = parts;

    if (!BASE64URL_PATTERN.test(encodedId)) return null;
    if (!TIMESTAMP_PATTERN.test(issuedAtRaw) || !TIMESTAMP_PATTERN.test(expiresAtRaw)) return null;
    if (!SIGNATURE_PATTERN.test(signature)) return null;

    const subscriberId = Buffer.from(encodedId, "base64url").toString("utf8");
    // Reject alternative encodings of the same id
    if (!subscriberId || Buffer.from(subscriberId, "utf8").toString("base64url") !== encodedId) {
      return null;
    }

    const issuedAt = Number(issuedAtRaw);
    const expiresAt = Number(expiresAtRaw);
    if (issuedAt > expiresAt) return null;

    return { subscriberId, issuedAt, expiresAt, signature };
  }
}
