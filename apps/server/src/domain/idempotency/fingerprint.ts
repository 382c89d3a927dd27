import { createHash } from "node:crypto";
import type { DeliveryIntent } from "./types.js";

export const FINGERPRINT_PREFIX = "delivery:";

/**
 * Deterministic key for a delivery intent. The parts are JSON-encoded
 * before hashing so no separator inside an id can collide two intents.
 */
export function computeFingerprint(intent: DeliveryIntent): string {
  const material = JSON.stringify([intent.kind, intent.subscriberId, String(intent.contentVersion)]);
  return FINGERPRINT_PREFIX + createHash("sha256").update(material).digest("hex");
}
