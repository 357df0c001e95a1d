/**
 * Claim correlation.
 *
 * Replies to a follow-up email carry the claim reference in their subject
 * (we put it there) or quote it in the body. The first reference found, in
 * the subject before the body, names the claim the message belongs to.
 */

import { CLAIM_ID_PATTERN, deriveClaimId } from "./ids.js";
import type { ClaimSubmission } from "../types/submission.js";

export function findClaimReference(subject: string, body: string): string | null {
  const match = CLAIM_ID_PATTERN.exec(subject) ?? CLAIM_ID_PATTERN.exec(body);
  return match ? match[0] : null;
}

/**
 * Claim identifier for a submission before any lookup: its reference if it
 * has one, otherwise the identifier derived from the message itself.
 */
export function provisionalClaimId(submission: ClaimSubmission): string {
  return (
    findClaimReference(submission.subject, submission.body) ??
    deriveClaimId(submission.senderAddress, submission.messageId, submission.receivedAt)
  );
}
