/**
 * ID helpers.
 */

import { createHash, randomUUID } from "node:crypto";

/** Claim identifiers look like CLAIM_1A2B3C4D_20260105 */
export const CLAIM_ID_PATTERN = /\bCLAIM_[0-9A-F]{8}_\d{8}\b/;

/**
 * New fulfillment identifier, e.g. FULFILL_9F86D081.
 */
export function generateFulfillmentId(): string {
  return `FULFILL_${randomUUID().replace(/-/g, "").slice(0, 8).toUpperCase()}`;
}

/**
 * Deterministic claim identifier for a message that does not reference an
 * existing claim. The same message always yields the same identifier.
 */
export function deriveClaimId(
  senderAddress: string,
  messageId: string,
  receivedAt: Date
): string {
  const digest = createHash("sha256")
    .update(`${senderAddress.toLowerCase()}\n${messageId}`)
    .digest("hex")
    .slice(0, 8)
    .toUpperCase();
  const day = receivedAt.toISOString().slice(0, 10).replace(/-/g, "");
  return `CLAIM_${digest}_${day}`;
}
