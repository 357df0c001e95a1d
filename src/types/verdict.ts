/**
 * Completeness assessment types.
 */

/** Requirements every claim submission is judged against. */
export const COMPLETENESS_REQUIREMENTS = [
  "Reason for claim: a clear description of what happened",
  "Claim amount: any monetary amount the claim is for",
  "Supporting proofs: attachments such as bills, photos or reports that support the claim",
] as const;

export interface CompletenessVerdict {
  complete: boolean;
  missingItems: string[];
  claimId: string;
}

export interface EvidenceAttachment {
  filename: string;
  contentType: string;
  sizeBytes: number;

  /** data: URL for images the model can look at */
  imageDataUrl?: string;
}

export interface AssessmentEvidence {
  claimId: string;
  senderAddress: string;
  policyType: string;
  policyIssuedDate: string;
  subject: string;
  content: string;
  attachments: EvidenceAttachment[];
  requirements: readonly string[];
}
